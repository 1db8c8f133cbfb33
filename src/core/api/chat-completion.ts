import type { ChatCompletionResponse, ChatMessage } from "../../types/chat.js";
import type { ProviderType, ResolvedModelCandidate } from "../../types/model.js";
import type { LogSink } from "../../runtime/log.js";

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  debugTag?: string;
}

export interface StreamHandler {
  onToken?: (token: string) => void;
}

export interface ChatCompletionApi {
  complete(request: CompletionRequest): Promise<ChatCompletionResponse>;
  stream(request: CompletionRequest, handlers?: StreamHandler): Promise<ChatCompletionResponse>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface AdapterOptions {
  fetchImpl?: FetchLike;
  debug?: boolean;
  log?: LogSink;
}

export interface ChatCompletionAdapter {
  readonly provider: ProviderType;
  create(candidate: ResolvedModelCandidate, options?: AdapterOptions): ChatCompletionApi;
}
