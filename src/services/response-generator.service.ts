import { SYSTEM_DIRECTIVE } from '../constants/persona';
import { FALLBACK_REPLY } from '../constants/replies';
import { CompletionClient, CompletionMessage, CompletionOptions } from '../types';
import { HistoryService } from './history.service';
import logger from '../utils/logger';
import { errorMessage, preview } from '../utils/helpers';

export const CONTEXT_WINDOW = 12;

// Sampling tuned against repeated openings between consecutive replies
export const GENERATION_OPTIONS: CompletionOptions = {
  maxTokens: 350,
  temperature: 0.8,
  topP: 0.9,
  frequencyPenalty: 0.6,
  presencePenalty: 0.5
};

/**
 * Generative replies over the recent conversation window
 */
export class ResponseGeneratorService {
  constructor(
    private readonly history: HistoryService,
    private readonly completionClient: CompletionClient,
    private readonly systemDirective: string = SYSTEM_DIRECTIVE
  ) {}

  public buildMessages(chatId: string): CompletionMessage[] {
    return [
      { role: 'system', content: this.systemDirective },
      ...this.history.window(chatId, CONTEXT_WINDOW)
    ];
  }

  /**
   * Records the user turn and answers it. Resolves with the fallback text on any failure.
   */
  async generate(chatId: string, userText: string): Promise<string> {
    this.history.appendTurn(chatId, 'user', userText);

    try {
      const result = await this.completionClient.complete(this.buildMessages(chatId), GENERATION_OPTIONS);
      const answer = result.success && result.text ? result.text.trim() : '';

      if (!answer) {
        logger.error('Generative reply failed, sending fallback', {
          chatId,
          error: result.error || 'Empty completion'
        });
        return FALLBACK_REPLY;
      }

      this.history.appendTurn(chatId, 'assistant', answer);

      logger.info('Generative reply ready', {
        chatId,
        answer: preview(answer)
      });

      return answer;
    } catch (error) {
      logger.error('Error generating reply, sending fallback', {
        chatId,
        error: errorMessage(error)
      });
      return FALLBACK_REPLY;
    }
  }
}
