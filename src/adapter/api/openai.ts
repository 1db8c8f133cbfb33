import type {
  AdapterOptions,
  ChatCompletionAdapter,
  ChatCompletionApi,
  CompletionRequest,
  StreamHandler,
} from "../../core/api/chat-completion.js";
import { MalformedResponseError } from "../../core/errors.js";
import type { ChatCompletionResponse } from "../../types/chat.js";
import type { ResolvedModelCandidate } from "../../types/model.js";
import { debugLogRequest, firstRecord, isRecord, postJson, readJson, readSSEStream, resolveFetch } from "./http.js";

const LABEL = "openai-compatible";

function toEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/$/, "")}/chat/completions`;
}

function toRequestBody(candidate: ResolvedModelCandidate, request: CompletionRequest, stream: boolean): Record<string, unknown> {
  const maxTokens = request.maxTokens ?? candidate.maxTokens;
  return {
    model: candidate.model,
    messages: request.messages,
    ...(stream ? { stream: true } : {}),
    temperature: request.temperature ?? candidate.temperature ?? 0.2,
    ...(maxTokens ? { max_tokens: maxTokens } : {}),
  };
}

/** `{ content: string }` 모양일 때만 content 를 돌려준다. (일부 서버는 content 를 part 배열로 보낸다) */
function contentOf(message: unknown): string | undefined {
  return isRecord(message) && typeof message.content === "string" ? message.content : undefined;
}

function firstChoice(data: unknown): Record<string, unknown> | undefined {
  return isRecord(data) ? firstRecord(data.choices) : undefined;
}

function extractChunkToken(chunk: unknown): string {
  const choice = firstChoice(chunk);
  return contentOf(choice?.delta) ?? contentOf(choice?.message) ?? "";
}

class OpenAIChatCompletionApi implements ChatCompletionApi {
  constructor(
    private readonly candidate: ResolvedModelCandidate,
    private readonly options?: AdapterOptions,
  ) {}

  private headers(): Record<string, string> {
    return { authorization: `Bearer ${this.candidate.apiKey}` };
  }

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    const body = toRequestBody(this.candidate, request, false);
    debugLogRequest(this.options, { candidate: this.candidate, messages: request.messages, stream: false, tag: request.debugTag });

    const response = await postJson(resolveFetch(this.options), LABEL, toEndpoint(this.candidate.baseUrl), this.headers(), body);
    const data = await readJson(LABEL, response);
    const content = contentOf(firstChoice(data)?.message)?.trim();

    if (!content) {
      throw new MalformedResponseError("LLM response did not contain assistant content");
    }

    return { content, raw: data };
  }

  async stream(request: CompletionRequest, handlers?: StreamHandler): Promise<ChatCompletionResponse> {
    const body = toRequestBody(this.candidate, request, true);
    debugLogRequest(this.options, { candidate: this.candidate, messages: request.messages, stream: true, tag: request.debugTag });

    const response = await postJson(resolveFetch(this.options), LABEL, toEndpoint(this.candidate.baseUrl), this.headers(), body);
    const content = await readSSEStream(LABEL, response, extractChunkToken, handlers);
    if (!content) {
      throw new MalformedResponseError("LLM stream did not contain assistant content");
    }

    return { content, raw: { streamed: true } };
  }
}

export class OpenAICompatibleAdapter implements ChatCompletionAdapter {
  readonly provider = "openai-compatible" as const;

  create(candidate: ResolvedModelCandidate, options?: AdapterOptions): ChatCompletionApi {
    return new OpenAIChatCompletionApi(candidate, options);
  }
}
