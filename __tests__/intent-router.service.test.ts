import { IntentRouterService } from '../src/services/intent-router.service';
import { BOOKING_FORM_REPLY, GREETING_REPLY } from '../src/constants/replies';

describe('IntentRouterService', () => {
  describe('greetings', () => {
    it.each(['привет', 'привет!', 'Привет!!', '  hello  ', 'Добрый день!', 'салам'])(
      'answers "%s" with the greeting',
      text => {
        expect(IntentRouterService.route(text)).toBe(GREETING_REPLY);
      }
    );

    it('needs an exact greeting', () => {
      expect(IntentRouterService.route('привет, сколько стоит бот?')).toBeNull();
    });
  });

  describe('booking keywords', () => {
    it.each(['Хочу записаться', 'Нужна консультация', 'давайте созвон завтра', 'Перезвоните мне', 'APPOINTMENT please'])(
      'answers "%s" with the intake form',
      text => {
        expect(IntentRouterService.route(text)).toBe(BOOKING_FORM_REPLY);
      }
    );

    it('finds keywords after a greeting', () => {
      expect(IntentRouterService.classify('привет, хочу созвон')).toEqual({
        intent: 'booking',
        reply: BOOKING_FORM_REPLY
      });
    });
  });

  it('checks greetings before booking keywords', () => {
    expect(IntentRouterService.classify('hello')?.intent).toBe('greeting');
  });

  it('returns null for free text', () => {
    expect(IntentRouterService.route('Сколько стоит интеграция с amoCRM?')).toBeNull();
  });
});
