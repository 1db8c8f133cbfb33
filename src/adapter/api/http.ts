import type { AdapterOptions, FetchLike, StreamHandler } from "../../core/api/chat-completion.js";
import {
  type ChatError,
  MalformedResponseError,
  ProviderAuthError,
  ProviderRateLimitedError,
  ProviderRequestError,
  ProviderUnavailableError,
  errorMessage,
} from "../../core/errors.js";
import { logLine, stderrSink, toOneLine } from "../../runtime/log.js";
import type { ChatMessage } from "../../types/chat.js";
import type { ResolvedModelCandidate } from "../../types/model.js";

/**
 * 파일 목적:
 * - provider adapter 들이 공유하는 HTTP 경로(요청 전송, 상태코드 → 오류 매핑, SSE 읽기, 디버그 로그)를 제공한다.
 *
 * 역의존성:
 * - adapter/api/gemini.ts, adapter/api/openai.ts
 */

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export function resolveFetch(options?: AdapterOptions): FetchLike {
  return options?.fetchImpl ?? defaultFetch;
}

/** provider 응답 JSON 을 필드 단위로 확인할 때 쓴다. 배열과 null 은 제외한다. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `list` 가 배열이면 첫 원소를, 그 원소가 객체일 때만 돌려준다. */
export function firstRecord(list: unknown): Record<string, unknown> | undefined {
  if (!Array.isArray(list)) {
    return undefined;
  }
  const first: unknown = list[0];
  return isRecord(first) ? first : undefined;
}

function parseRetryAfter(raw: string | null): number | undefined {
  if (!raw || !raw.trim()) {
    return undefined;
  }
  const seconds = Number(raw.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export async function toProviderError(label: string, response: Response): Promise<ChatError> {
  const body = await response
    .text()
    .catch((error: unknown) => `<unreadable body: ${errorMessage(error)}>`);
  const status = response.status;
  const detail = `${label} request failed (${status}): ${toOneLine(body, 300) || "<empty body>"}`;

  if (status === 429) {
    return new ProviderRateLimitedError(detail, parseRetryAfter(response.headers.get("retry-after")));
  }
  if (status === 401 || status === 403 || body.includes("API_KEY_INVALID")) {
    return new ProviderAuthError(detail, status);
  }
  if (status === 408 || status >= 500) {
    return new ProviderUnavailableError(detail, status);
  }
  return new ProviderRequestError(detail, status);
}

/**
 * JSON POST 를 보내고 2xx 가 아니면 분류된 provider 오류를 던진다.
 * fetch 자체가 실패하면(DNS, 연결 끊김) ProviderUnavailableError 로 감싼다.
 */
export async function postJson(
  fetchImpl: FetchLike,
  label: string,
  url: string,
  headers: Record<string, string>,
  body: Record<string, unknown>,
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  } catch (error) {
    throw new ProviderUnavailableError(`${label} is unreachable: ${errorMessage(error)}`, undefined, { cause: error });
  }

  if (!response.ok) {
    throw await toProviderError(label, response);
  }
  return response;
}

export async function readJson(label: string, response: Response): Promise<unknown> {
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new ProviderUnavailableError(`${label} response was interrupted: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(`${label} returned a body that is not JSON: ${toOneLine(text, 120)}`, {
      cause: error,
    });
  }
}

function parseJsonOrUndefined(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
}

/**
 * `data:` 라인 단위로 SSE 본문을 읽어 토큰을 누적한다.
 * JSON 이 아닌 keepalive 라인은 건너뛰고, `[DONE]` 을 만나면 종료한다.
 * 읽기 실패만 ProviderUnavailableError 로 바꾸고, onToken 이 던진 오류는 그대로 전파한다.
 */
export async function readSSEStream(
  label: string,
  response: Response,
  extractToken: (chunk: unknown) => string,
  handlers?: StreamHandler,
): Promise<string> {
  if (!response.body) {
    throw new MalformedResponseError(`${label} stream response body is unavailable`);
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let done = false;
  let readFailed = false;
  let finished = false;
  let pending = "";
  let fullText = "";

  try {
    while (!done && !finished) {
      const result = await reader.read().catch((error: unknown) => {
        readFailed = true;
        throw new ProviderUnavailableError(`${label} stream was interrupted: ${errorMessage(error)}`, undefined, {
          cause: error,
        });
      });
      done = result.done;
      pending += decoder.decode(result.value ?? new Uint8Array(), { stream: !done });
      if (done) {
        pending += "\n";
      }

      let idx = pending.indexOf("\n");
      while (idx >= 0 && !finished) {
        const line = pending.slice(0, idx).trim();
        pending = pending.slice(idx + 1);

        if (line.startsWith("data:")) {
          const payload = line.slice(5).trim();
          if (payload === "[DONE]") {
            finished = true;
            break;
          }

          const parsed = parseJsonOrUndefined(payload);
          const token = parsed === undefined ? "" : extractToken(parsed);
          if (token) {
            fullText += token;
            handlers?.onToken?.(token);
          }
        }

        idx = pending.indexOf("\n");
      }
    }
  } finally {
    // 끝까지 읽지 않고 빠져나가면([DONE], onToken 오류) 연결을 닫는다.
    if (!done && !readFailed) {
      await reader.cancel();
    }
  }

  return fullText.trim();
}

export function debugLogRequest(
  options: AdapterOptions | undefined,
  params: {
    candidate: ResolvedModelCandidate;
    messages: ChatMessage[];
    stream: boolean;
    tag?: string;
  },
): void {
  if (options?.debug !== true) {
    return;
  }

  const roleSeq = params.messages.map((m) => m.role).join(">");
  const preview = params.messages
    .slice(-3)
    .map((m, i) => `${i}:${m.role}:${toOneLine(m.content, 80)}`)
    .join(" | ");

  logLine(options.log ?? stderrSink, "llm-debug", {
    tag: params.tag ?? "unknown",
    provider: params.candidate.provider,
    model: params.candidate.model,
    stream: params.stream,
    messages: params.messages.length,
    roleSeq,
    preview,
  });
}
