import { resolveChatCompletionApi } from "../adapter/api/index.js";
import type { AppConfig } from "../config/env.js";
import type { ChatCompletionApi, CompletionRequest, FetchLike, StreamHandler } from "../core/api/chat-completion.js";
import { ConversationBusyError, errorMessage } from "../core/errors.js";
import type { ChatMessage, Turn } from "../types/chat.js";
import { HistoryArchive, type HistoryEntry } from "./history-archive.js";
import { type LogSink, logLine, stderrSink } from "./log.js";
import { SessionStore } from "./session-store.js";

/**
 * 파일 목적:
 * - 단일 chat turn 실행 경로를 제공한다.
 *
 * 주요 의존성:
 * - adapter/api: provider 호출
 * - session-store: 턴 추가 및 컨텍스트 구성
 * - history-archive: 성공한 질문/답변 기록(선택)
 *
 * 역의존성:
 * - src/cli/chat.ts, src/cli/chat-tui.ts
 *
 * 상태:
 * - idle → awaiting-reply → idle. awaiting-reply 중 submit 은 ConversationBusyError 로 거절한다.
 * - provider 호출이 실패해도 이미 추가된 user 턴은 되돌리지 않는다.
 */

export type ControllerState = "idle" | "awaiting-reply";

export type SubmitOutcome =
  | { status: "replied"; reply: Turn }
  | { status: "skipped"; reason: "empty-input" };

export interface ConversationControllerOptions {
  api: ChatCompletionApi;
  store?: SessionStore;
  systemPrompt?: string;
  /** 0 또는 미설정이면 전체 transcript 를 보낸다. */
  contextMaxTurns?: number;
  stream?: boolean;
  archive?: HistoryArchive;
  log?: LogSink;
  now?: () => Date;
}

export function buildContextMessages(turns: Iterable<Turn>, systemPrompt?: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemPrompt && systemPrompt.trim()) {
    messages.push({ role: "system", content: systemPrompt.trim() });
  }
  for (const turn of turns) {
    messages.push({ role: turn.role, content: turn.text });
  }
  return messages;
}

export class ConversationController {
  readonly store: SessionStore;

  private readonly api: ChatCompletionApi;
  private readonly systemPrompt?: string;
  private readonly contextMaxTurns: number;
  private readonly streamReplies: boolean;
  private readonly archive?: HistoryArchive;
  private readonly log: LogSink;
  private readonly now: () => Date;
  private currentState: ControllerState = "idle";

  constructor(options: ConversationControllerOptions) {
    this.api = options.api;
    this.store = options.store ?? new SessionStore();
    this.systemPrompt = options.systemPrompt;
    this.contextMaxTurns = Math.max(0, Math.floor(options.contextMaxTurns ?? 0));
    this.streamReplies = options.stream ?? false;
    this.archive = options.archive;
    this.log = options.log ?? stderrSink;
    this.now = options.now ?? (() => new Date());
  }

  get state(): ControllerState {
    return this.currentState;
  }

  get archiveEnabled(): boolean {
    return this.archive !== undefined;
  }

  async submit(userText: string, handlers?: StreamHandler): Promise<SubmitOutcome> {
    const question = userText.trim();
    if (!question) {
      return { status: "skipped", reason: "empty-input" };
    }
    if (this.currentState !== "idle") {
      throw new ConversationBusyError();
    }

    this.currentState = "awaiting-reply";
    try {
      this.store.append({ role: "user", text: question, timestamp: this.now().toISOString() });

      const request: CompletionRequest = {
        messages: buildContextMessages(
          this.store.asContext(this.contextMaxTurns > 0 ? this.contextMaxTurns : undefined),
          this.systemPrompt,
        ),
        debugTag: `turn-${Math.ceil(this.store.size / 2)}`,
      };
      const completion = this.streamReplies
        ? await this.api.stream(request, handlers)
        : await this.api.complete(request);

      const reply = this.store.append({
        role: "assistant",
        text: completion.content,
        timestamp: this.now().toISOString(),
      });
      await this.archiveTurn(question, reply);
      return { status: "replied", reply };
    } finally {
      this.currentState = "idle";
    }
  }

  /** 새 대화 시작. 응답 대기 중에는 거절한다. */
  reset(): void {
    if (this.currentState !== "idle") {
      throw new ConversationBusyError();
    }
    this.store.clear();
  }

  async searchHistory(term: string): Promise<HistoryEntry[]> {
    return this.archive ? this.archive.search(term) : [];
  }

  private async archiveTurn(question: string, reply: Turn): Promise<void> {
    if (!this.archive) {
      return;
    }
    try {
      await this.archive.record(question, reply.text, this.now());
    } catch (error) {
      // 기록 실패는 대화를 막지 않는다.
      logLine(this.log, "archive", {
        status: "failed",
        file: this.archive.filePath,
        error: errorMessage(error),
      });
    }
  }
}

/**
 * AppConfig 로부터 provider adapter, archive 를 조립해 controller 를 만든다.
 */
export function createConversationController(
  config: AppConfig,
  options: { log?: LogSink; fetchImpl?: FetchLike } = {},
): ConversationController {
  const log = options.log ?? stderrSink;
  const api = resolveChatCompletionApi(config.candidate, {
    fetchImpl: options.fetchImpl,
    debug: config.debugLlmRequests,
    log,
  });

  return new ConversationController({
    api,
    systemPrompt: config.systemPrompt,
    contextMaxTurns: config.contextMaxTurns,
    stream: config.stream,
    archive: config.historyFile ? new HistoryArchive(config.historyFile) : undefined,
    log,
  });
}
