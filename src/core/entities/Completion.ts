/**
 * Completion-provider entities
 */
export interface CompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  prompt: string;
  temperature?: number;
}
