import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";

/**
 * 파일 목적:
 * - 성공한 질문/답변 쌍을 JSON Lines 파일에 누적하고 키워드로 검색한다.
 * - HISTORY_FILE 이 설정된 경우에만 사용된다.
 */

export const DEFAULT_SEARCH_LIMIT = 50;

export interface HistoryEntry {
  question: string;
  answer: string;
  createdAt: string;
}

function isHistoryEntry(value: unknown): value is HistoryEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "question" in value &&
    typeof value.question === "string" &&
    "answer" in value &&
    typeof value.answer === "string" &&
    "createdAt" in value &&
    typeof value.createdAt === "string"
  );
}

export class HistoryArchive {
  constructor(readonly filePath: string) {}

  async record(question: string, answer: string, at: Date = new Date()): Promise<HistoryEntry> {
    const entry: HistoryEntry = { question, answer, createdAt: at.toISOString() };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf-8");
    return entry;
  }

  async readAll(): Promise<HistoryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const entries: HistoryEntry[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      try {
        const parsed: unknown = JSON.parse(line);
        if (isHistoryEntry(parsed)) {
          entries.push(parsed);
        }
      } catch {
        // 깨진 줄(쓰기 도중 종료 등)은 건너뛴다.
        continue;
      }
    }
    return entries;
  }

  /**
   * 질문 또는 답변에 term 이 포함된(대소문자 무시) 기록을 최신순으로 limit 개까지 돌려준다.
   */
  async search(term: string, limit = DEFAULT_SEARCH_LIMIT): Promise<HistoryEntry[]> {
    const needle = term.trim().toLowerCase();
    if (!needle) {
      return [];
    }

    const entries = await this.readAll();
    // 같은 시각의 기록은 나중에 쓴 줄이 먼저 오도록 뒤집은 뒤 안정 정렬한다.
    return entries
      .reverse()
      .filter(
        (entry) => entry.question.toLowerCase().includes(needle) || entry.answer.toLowerCase().includes(needle),
      )
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0))
      .slice(0, limit);
  }
}
