export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

export interface CompletionMessage {
  role: 'system' | TurnRole;
  content: string;
}

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  topP: number;
  frequencyPenalty: number;
  presencePenalty: number;
}

export interface CompletionResult {
  success: boolean;
  text?: string;
  error?: string;
}

/**
 * Generative text provider: role-tagged messages in, one completion out
 */
export interface CompletionClient {
  complete(messages: CompletionMessage[], options: CompletionOptions): Promise<CompletionResult>;
}
