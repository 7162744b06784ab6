import { BOOKING_FORM_REPLY, GREETING_REPLY } from '../constants/replies';
import logger from '../utils/logger';

const GREETINGS = new Set([
  'привет',
  'здравствуйте',
  'салам',
  'hi',
  'hello',
  'добрый день',
  'добрый вечер',
]);

const BOOKING_KEYWORDS = [
  'записаться',
  'консультац',
  'созвон',
  'перезвон',
  'запишите меня',
  'appointment',
];

export type IntentName = 'greeting' | 'booking';

export interface RoutedIntent {
  intent: IntentName;
  reply: string;
}

/**
 * Deterministic fast path answered without the language model
 */
export class IntentRouterService {
  public static classify(text: string): RoutedIntent | null {
    const lowered = text.toLowerCase().trim();
    const normalized = lowered.replace(/!+$/, '').trim();

    if (GREETINGS.has(normalized)) {
      return { intent: 'greeting', reply: GREETING_REPLY };
    }

    if (BOOKING_KEYWORDS.some(keyword => lowered.includes(keyword))) {
      return { intent: 'booking', reply: BOOKING_FORM_REPLY };
    }

    return null;
  }

  /**
   * Canned reply for the text, or null when the generative path should answer
   */
  public static route(text: string): string | null {
    const routed = this.classify(text);

    logger.debug('Intent routing', {
      textLength: text.length,
      intent: routed ? routed.intent : 'none'
    });

    return routed ? routed.reply : null;
  }
}
