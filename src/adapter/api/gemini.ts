import type {
  AdapterOptions,
  ChatCompletionAdapter,
  ChatCompletionApi,
  CompletionRequest,
  StreamHandler,
} from "../../core/api/chat-completion.js";
import { MalformedResponseError } from "../../core/errors.js";
import type { ChatCompletionResponse, ChatMessage } from "../../types/chat.js";
import type { ResolvedModelCandidate } from "../../types/model.js";
import { debugLogRequest, firstRecord, isRecord, postJson, readJson, readSSEStream, resolveFetch } from "./http.js";

/**
 * 파일 목적:
 * - Gemini generateContent REST API 를 ChatCompletionApi 로 감싼다.
 *
 * 메시지 매핑:
 * - system → systemInstruction (여러 개면 빈 줄로 연결)
 * - user → "user", assistant → "model"
 */

interface GeminiPart {
  text: string;
}

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

const LABEL = "gemini";

function toEndpoint(candidate: ResolvedModelCandidate, stream: boolean): string {
  const base = candidate.baseUrl.replace(/\/$/, "");
  const model = encodeURIComponent(candidate.model);
  return stream
    ? `${base}/models/${model}:streamGenerateContent?alt=sse`
    : `${base}/models/${model}:generateContent`;
}

export function toGeminiContents(messages: ChatMessage[]): {
  contents: GeminiContent[];
  systemInstruction?: { parts: GeminiPart[] };
} {
  const system = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content.trim())
    .filter((text) => text.length > 0);

  const contents: GeminiContent[] = messages
    .filter((m) => m.role !== "system")
    .map((m): GeminiContent => ({
      role: m.role === "assistant" ? "model" : "user",
      parts: [{ text: m.content }],
    }));

  return system.length > 0 ? { contents, systemInstruction: { parts: [{ text: system.join("\n\n") }] } } : { contents };
}

function toRequestBody(candidate: ResolvedModelCandidate, request: CompletionRequest): Record<string, unknown> {
  const maxTokens = request.maxTokens ?? candidate.maxTokens;
  return {
    ...toGeminiContents(request.messages),
    generationConfig: {
      temperature: request.temperature ?? candidate.temperature ?? 0.2,
      ...(maxTokens ? { maxOutputTokens: maxTokens } : {}),
    },
  };
}

function partText(part: unknown): string {
  if (!isRecord(part) || part.thought === true) {
    return "";
  }
  return typeof part.text === "string" ? part.text : "";
}

/** 첫 candidate 의 text part 를 이어 붙인다. 모양이 다른 chunk 는 빈 문자열이 된다. */
export function extractGeminiText(chunk: unknown): string {
  const candidate = isRecord(chunk) ? firstRecord(chunk.candidates) : undefined;
  const content = candidate?.content;
  if (!isRecord(content) || !Array.isArray(content.parts)) {
    return "";
  }
  const parts: unknown[] = content.parts;
  return parts.map(partText).join("");
}

function describeEmptyResponse(data: unknown): string {
  if (!isRecord(data)) {
    return "Gemini response did not contain text";
  }
  const blockReason = isRecord(data.promptFeedback) ? data.promptFeedback.blockReason : undefined;
  if (typeof blockReason === "string" && blockReason) {
    return `Gemini blocked the prompt (${blockReason})`;
  }
  const finishReason = firstRecord(data.candidates)?.finishReason;
  return typeof finishReason === "string" && finishReason
    ? `Gemini response did not contain text (finishReason=${finishReason})`
    : "Gemini response did not contain text";
}

class GeminiChatCompletionApi implements ChatCompletionApi {
  constructor(
    private readonly candidate: ResolvedModelCandidate,
    private readonly options?: AdapterOptions,
  ) {}

  private headers(): Record<string, string> {
    return { "x-goog-api-key": this.candidate.apiKey };
  }

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    debugLogRequest(this.options, { candidate: this.candidate, messages: request.messages, stream: false, tag: request.debugTag });

    const response = await postJson(
      resolveFetch(this.options),
      LABEL,
      toEndpoint(this.candidate, false),
      this.headers(),
      toRequestBody(this.candidate, request),
    );
    const data = await readJson(LABEL, response);
    const content = extractGeminiText(data).trim();

    if (!content) {
      throw new MalformedResponseError(describeEmptyResponse(data));
    }

    return { content, raw: data };
  }

  async stream(request: CompletionRequest, handlers?: StreamHandler): Promise<ChatCompletionResponse> {
    debugLogRequest(this.options, { candidate: this.candidate, messages: request.messages, stream: true, tag: request.debugTag });

    const response = await postJson(
      resolveFetch(this.options),
      LABEL,
      toEndpoint(this.candidate, true),
      this.headers(),
      toRequestBody(this.candidate, request),
    );
    const content = await readSSEStream(LABEL, response, extractGeminiText, handlers);
    if (!content) {
      throw new MalformedResponseError("Gemini stream did not contain text");
    }

    return { content, raw: { streamed: true } };
  }
}

export class GeminiAdapter implements ChatCompletionAdapter {
  readonly provider = "gemini" as const;

  create(candidate: ResolvedModelCandidate, options?: AdapterOptions): ChatCompletionApi {
    return new GeminiChatCompletionApi(candidate, options);
  }
}
