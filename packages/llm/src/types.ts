export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerationRequest {
  system?: string;
  messages: ChatMessage[];
  format?: 'json' | 'text';
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Text-generation backend. Implementations reject on transport errors and
 * timeouts; an aborted `signal` rejects with an AbortError.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}
