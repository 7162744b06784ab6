/**
 * Fixed user-facing texts. The bot talks Russian.
 */

export const GREETING_REPLY =
  'Привет! Я помогу с чат-ботами и автоматизацией. Могу рассказать, что умею, ' +
  'или сразу записать на бесплатную консультацию. Что удобнее? 🙂';

export const BOOKING_FORM_REPLY =
  'Отлично! Запишу вас на бесплатную консультацию. Заполните, пожалуйста, кратко:\n' +
  'Имя: \n' +
  'Компания: \n' +
  'Телефон: \n' +
  'Задача (что автоматизировать): ';

export const LEAD_FORMAT_HINT = 'Имя: ...\nКомпания: ...\nТелефон: ...\nЗадача: ...';

export const FALLBACK_REPLY = 'Простите, произошёл технический сбой. Попробуйте ещё раз через минуту 🙏';

export const LEAD_SAVE_FAILED_REPLY =
  'Не получилось сохранить заявку из-за технического сбоя. Пожалуйста, отправьте её ещё раз через минуту 🙏';

export const ACCESS_DENIED_REPLY = 'У вас нет доступа к этой команде';

export const RESET_CONFIRMED_REPLY = '✅ История чата очищена';

export const NO_LEADS_REPLY = '📭 Записей пока нет';

export const LEADS_UNAVAILABLE_REPLY = '⚠️ Не удалось загрузить записи, попробуйте позже';

export const NOT_SPECIFIED = 'Не указано';

export const ADMIN_COMMANDS = {
  listClients: '/list-clients',
  reset: '/reset',
} as const;
