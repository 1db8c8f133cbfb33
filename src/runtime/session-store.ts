import type { Turn } from "../types/chat.js";

/**
 * 파일 목적:
 * - 한 대화의 턴 기록(transcript)을 메모리에 순서대로 보관한다.
 * - 추가만 가능하며, 새 대화 시작 시에만 비운다.
 *
 * 역의존성:
 * - runtime/chat-service.ts (턴 추가, 컨텍스트 구성)
 * - src/cli/* (transcript 표시)
 */
export class SessionStore {
  private turns: Turn[] = [];

  get size(): number {
    return this.turns.length;
  }

  append(turn: Turn): Turn {
    const stored: Turn = Object.freeze(
      turn.timestamp === undefined
        ? { role: turn.role, text: turn.text }
        : { role: turn.role, text: turn.text, timestamp: turn.timestamp },
    );
    this.turns.push(stored);
    return stored;
  }

  /**
   * 호출 시점까지의 턴을 삽입 순서대로 돌려주는 지연 iterable.
   * 여러 번 순회할 수 있고, 이후 append 된 턴은 포함하지 않는다.
   * limit 을 주면 가장 최근 limit 개만 돌려준다.
   */
  asContext(limit?: number): Iterable<Turn> {
    const source = this.turns;
    const end = source.length;
    const start = limit !== undefined && limit > 0 ? Math.max(0, end - limit) : 0;

    return {
      *[Symbol.iterator]() {
        for (let i = start; i < end; i += 1) {
          yield source[i];
        }
      },
    };
  }

  snapshot(): readonly Turn[] {
    return [...this.turns];
  }

  clear(): void {
    // 기존 asContext() 뷰가 옛 배열을 계속 가리키도록 새 배열로 교체한다.
    this.turns = [];
  }
}
