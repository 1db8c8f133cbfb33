/**
 * 파일 목적:
 * - 채팅 경로에서 발생하는 오류 종류를 구분 가능한 클래스로 정의한다.
 *
 * 역의존성:
 * - config/env.ts (MissingCredentialError)
 * - adapter/api/* (provider 오류)
 * - runtime/chat-service.ts (ConversationBusyError)
 */
export type ChatErrorCode =
  | "missing-credential"
  | "provider-unavailable"
  | "provider-auth"
  | "provider-rate-limited"
  | "provider-rejected"
  | "malformed-response"
  | "conversation-busy";

export class ChatError extends Error {
  readonly code: ChatErrorCode;

  constructor(code: ChatErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 시작 단계에서만 발생하며 창을 띄우기 전에 치명 오류로 처리된다. */
export class MissingCredentialError extends ChatError {
  constructor(
    readonly variable: string,
    readonly envFile: string,
  ) {
    super("missing-credential", `Missing required env var ${variable} (checked ${envFile} and the process environment)`);
  }
}

export class ProviderUnavailableError extends ChatError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("provider-unavailable", message, options);
  }
}

export class ProviderAuthError extends ChatError {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super("provider-auth", message);
  }
}

export class ProviderRateLimitedError extends ChatError {
  constructor(
    message: string,
    readonly retryAfterSeconds?: number,
  ) {
    super("provider-rate-limited", message);
  }
}

export class ProviderRequestError extends ChatError {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super("provider-rejected", message);
  }
}

export class MalformedResponseError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed-response", message, options);
  }
}

export class ConversationBusyError extends ChatError {
  constructor() {
    super("conversation-busy", "a reply is still pending; wait for it before sending another message");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
