import type { AppConfig } from "../config/env.js";
import type { HistoryEntry } from "../runtime/history-archive.js";

/**
 * 파일 목적:
 * - 채팅 창의 표시 상태(로그 라인, 응답 대기 라인)와 텍스트 포맷 유틸을 모아 제공한다.
 * - blessed 에 의존하지 않으므로 readline CLI 와 TUI 가 함께 쓴다.
 *
 * 역의존성:
 * - src/cli/chat-tui.ts, src/cli/chat.ts
 */

export type ChatMode = "chat" | "search";

export const SEARCH_SEPARATOR = "=".repeat(50);
export const QUESTION_PREVIEW_CHARS = 100;
export const ANSWER_PREVIEW_CHARS = 200;

const MAX_LOG_LINES = 2400;

export interface ChatViewState {
  mode: ChatMode;
  lines: string[];
  pendingLine?: number;
  pendingText: string;
}

export function createViewState(): ChatViewState {
  return { mode: "chat", lines: [], pendingLine: undefined, pendingText: "" };
}

export function toggleMode(mode: ChatMode): ChatMode {
  return mode === "chat" ? "search" : "chat";
}

export function clip(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
}

/** ISO 시각을 `YYYY-MM-DD HH:MM:SS` (UTC) 로 줄인다. */
export function formatTimestamp(iso: string): string {
  return iso.slice(0, 19).replace("T", " ");
}

/** 시작 시 어떤 모델과 env 파일로 실행 중인지 보여준다. */
export function setupLines(config: Pick<AppConfig, "candidate" | "envFile" | "envFileLoaded">): string[] {
  const { id, provider, model } = config.candidate;
  return [
    `model: ${provider}/${model} (${id})`,
    config.envFileLoaded ? `env: ${config.envFile}` : `env: ${config.envFile} not found, using the process environment`,
  ];
}

export function greeting(assistantName: string, searchEnabled: boolean): string[] {
  const lines = [`Ask ${assistantName} anything.`];
  lines.push(
    searchEnabled
      ? "Press Ctrl+T (or type /mode search) to search earlier questions and answers."
      : "Search mode is off: set HISTORY_FILE to keep a searchable history.",
  );
  lines.push("commands: /exit, /new, /mode chat|search");
  return lines;
}

export function formatSearchResults(term: string, entries: HistoryEntry[]): string[] {
  const clean = term.trim();
  if (!clean) {
    return ["enter a search term."];
  }
  if (entries.length === 0) {
    return [`no records matching '${clean}'.`];
  }

  const lines = [`found ${entries.length} record(s) for '${clean}':`];
  for (const entry of entries) {
    lines.push(
      SEARCH_SEPARATOR,
      `date: ${formatTimestamp(entry.createdAt)}`,
      `question: ${clip(entry.question, QUESTION_PREVIEW_CHARS)}`,
      `answer: ${clip(entry.answer, ANSWER_PREVIEW_CHARS)}`,
    );
  }
  return lines;
}

export function pushLine(state: ChatViewState, line: string): void {
  state.lines.push(line);
  const overflow = state.lines.length - MAX_LOG_LINES;
  if (overflow > 0) {
    state.lines.splice(0, overflow);
    if (state.pendingLine !== undefined) {
      state.pendingLine = state.pendingLine >= overflow ? state.pendingLine - overflow : undefined;
    }
  }
}

export function resetLines(state: ChatViewState): void {
  state.lines = [];
  state.pendingLine = undefined;
  state.pendingText = "";
}

/** 질문 라인과 "응답 생성 중" 자리 라인을 추가한다. 이후 토큰/결과가 이 자리를 덮어쓴다. */
export function beginReply(state: ChatViewState, assistantName: string, question: string): void {
  pushLine(state, "");
  pushLine(state, `[you] ${question}`);
  pushLine(state, `[${assistantName}] generating a reply...`);
  state.pendingLine = state.lines.length - 1;
  state.pendingText = "";
}

function replacePending(state: ChatViewState, line: string): void {
  if (state.pendingLine === undefined) {
    pushLine(state, line);
    return;
  }
  state.lines[state.pendingLine] = line;
}

export function appendReplyToken(state: ChatViewState, assistantName: string, token: string): void {
  state.pendingText += token;
  replacePending(state, `[${assistantName}] ${state.pendingText}`);
}

export function completeReply(state: ChatViewState, assistantName: string, answer: string): void {
  replacePending(state, `[${assistantName}] ${answer}`);
  state.pendingLine = undefined;
  state.pendingText = "";
}

export function failReply(state: ChatViewState, message: string): void {
  replacePending(state, `[error] ${message}`);
  state.pendingLine = undefined;
  state.pendingText = "";
}
