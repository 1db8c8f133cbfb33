export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type TurnRole = Exclude<ChatRole, "system">;

export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
  readonly timestamp?: string;
}

export interface ChatCompletionResponse {
  content: string;
  raw: unknown;
}
