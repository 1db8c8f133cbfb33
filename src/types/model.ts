export type ProviderType = "gemini" | "openai-compatible";

export interface ResolvedModelCandidate {
  id: string;
  provider: ProviderType;
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}
