export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type MessageContent = string | ContentPart[];

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: MessageContent;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface ModelInfo {
  id: string;
  name: string;
  contextLength: number | null;
}

/** Chat-completion backend. Errors are `ProviderRequestError` with a `transient` flag. */
export interface LlmProvider {
  complete(request: CompletionRequest, model: string, signal?: AbortSignal): Promise<string>;
  listModels(signal?: AbortSignal): Promise<ModelInfo[]>;
}
