import type { AdapterOptions, ChatCompletionAdapter, ChatCompletionApi } from "../../core/api/chat-completion.js";
import type { ProviderType, ResolvedModelCandidate } from "../../types/model.js";
import { GeminiAdapter } from "./gemini.js";
import { OpenAICompatibleAdapter } from "./openai.js";

const adapters: Record<ProviderType, ChatCompletionAdapter> = {
  gemini: new GeminiAdapter(),
  "openai-compatible": new OpenAICompatibleAdapter(),
};

export function resolveChatCompletionApi(candidate: ResolvedModelCandidate, options?: AdapterOptions): ChatCompletionApi {
  const adapter = adapters[candidate.provider];
  if (!adapter) {
    throw new Error(`Unsupported provider: ${String(candidate.provider)}`);
  }
  return adapter.create(candidate, options);
}
