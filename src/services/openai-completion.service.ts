import OpenAI from 'openai';
import { CompletionClient, CompletionMessage, CompletionOptions, CompletionResult } from '../types';
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';

function toChatMessage(message: CompletionMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export interface OpenAiCompletionSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * Chat completions through the OpenAI SDK; failures come back as results, never as throws
 */
export class OpenAiCompletionService implements CompletionClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(settings: OpenAiCompletionSettings) {
    this.model = settings.model;
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 1
    });
  }

  async complete(messages: CompletionMessage[], options: CompletionOptions): Promise<CompletionResult> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toChatMessage),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        top_p: options.topP,
        frequency_penalty: options.frequencyPenalty,
        presence_penalty: options.presencePenalty
      });

      const content = response.choices[0]?.message?.content;

      if (typeof content !== 'string' || !content.trim()) {
        logger.warn('OpenAI returned an empty completion', {
          model: this.model,
          finishReason: response.choices[0]?.finish_reason
        });

        return {
          success: false,
          error: 'Empty completion'
        };
      }

      logger.info('OpenAI completion received', {
        model: this.model,
        duration: `${Date.now() - startTime}ms`,
        totalTokens: response.usage?.total_tokens
      });

      return {
        success: true,
        text: content
      };
    } catch (error) {
      logger.error('Error calling OpenAI', {
        error: errorMessage(error),
        status: error instanceof OpenAI.APIError ? error.status : undefined,
        model: this.model,
        duration: `${Date.now() - startTime}ms`
      });

      return {
        success: false,
        error: errorMessage(error)
      };
    }
  }
}
