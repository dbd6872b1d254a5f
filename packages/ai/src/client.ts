export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string }

export type ResponseFormat = 'json_object' | 'text'

export interface CompleteOptions {
  responseFormat?: ResponseFormat
}

/** Minimal chat interface the assistant needs from a model provider. */
export interface LLMClient {
  complete(messages: ChatMessage[], options?: CompleteOptions): Promise<string>
}
