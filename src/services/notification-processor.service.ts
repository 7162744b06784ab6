import Joi from 'joi';
import {
  ACCESS_DENIED_REPLY,
  ADMIN_COMMANDS,
  LEAD_SAVE_FAILED_REPLY,
  LEADS_UNAVAILABLE_REPLY,
  NO_LEADS_REPLY,
  NOT_SPECIFIED,
  RESET_CONFIRMED_REPLY
} from '../constants/replies';
import {
  GreenApiNotification,
  IncomingTextMessage,
  LeadEntry,
  MessageSender,
  NotificationSource,
  WebhookBody
} from '../types';
import { HistoryService } from './history.service';
import { IntentRouterService } from './intent-router.service';
import { LeadExtractorService } from './lead-extractor.service';
import { LeadStoreService } from './lead-store.service';
import { ProcessedMessageRegistry } from './processed-message.registry';
import logger from '../utils/logger';
import { errorMessage, normalizePhone, preview } from '../utils/helpers';

export const INCOMING_TEXT_WEBHOOK = 'incomingMessageReceived';

export const RECENT_LEADS_LIMIT = 3;

export type ProcessingOutcome =
  | 'skipped'
  | 'ignored'
  | 'duplicate'
  | 'admin'
  | 'lead'
  | 'reset'
  | 'canned'
  | 'generated'
  | 'failed';

export interface ReplyGenerator {
  generate(chatId: string, userText: string): Promise<string>;
}

export interface NotificationProcessorDeps {
  source: NotificationSource;
  sender: MessageSender;
  history: HistoryService;
  processed: ProcessedMessageRegistry;
  leadStore: LeadStoreService;
  generator: ReplyGenerator;
  adminPhones: string[];
}

const incomingTextSchema = Joi.object<WebhookBody>({
  idMessage: Joi.string().allow(''),
  senderData: Joi.object({
    chatId: Joi.string().allow(''),
    sender: Joi.string().allow(''),
    senderName: Joi.string().allow('')
  }).unknown(true),
  messageData: Joi.object({
    idMessage: Joi.string().allow(''),
    textMessageData: Joi.object({
      textMessage: Joi.string().allow('').required()
    }).unknown(true),
    extendedTextMessageData: Joi.object({
      text: Joi.string().allow('').required()
    }).unknown(true)
  })
    .or('textMessageData', 'extendedTextMessageData')
    .unknown(true)
    .required()
}).unknown(true);

/**
 * Reduces an incoming message body to its text fields, or null when it carries no text
 */
export function parseIncomingText(body: WebhookBody): IncomingTextMessage | null {
  const { error, value } = incomingTextSchema.validate(body);
  if (error) {
    logger.debug('Incoming message has no text payload', { reason: error.message });
    return null;
  }

  const messageData = value.messageData;
  const text = messageData?.textMessageData?.textMessage ?? messageData?.extendedTextMessageData?.text ?? '';

  return {
    messageId: value.idMessage || messageData?.idMessage || undefined,
    chatId: value.senderData?.chatId ?? '',
    sender: value.senderData?.sender ?? '',
    senderName: value.senderData?.senderName,
    text
  };
}

/**
 * Handles one gateway notification: deduplication, admin commands, lead intake,
 * canned replies and the generative fallback, then acknowledges it exactly once
 */
export class NotificationProcessorService {
  private readonly adminPhones: Set<string>;

  constructor(private readonly deps: NotificationProcessorDeps) {
    this.adminPhones = new Set(
      deps.adminPhones.map(normalizePhone).filter(phone => phone.length > 0)
    );
  }

  public isAdmin(sender: string): boolean {
    const phone = normalizePhone(sender);
    return phone.length > 0 && this.adminPhones.has(phone);
  }

  /**
   * Never rejects. Acknowledgement happens after any reply was attempted.
   */
  async process(notification: GreenApiNotification | null | undefined): Promise<ProcessingOutcome> {
    if (!notification || !notification.body) {
      return 'skipped';
    }

    const { receiptId, body } = notification;
    let outcome: ProcessingOutcome = 'failed';

    try {
      outcome = await this.handle(body);
    } catch (error) {
      logger.error('Error processing notification', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
        receiptId
      });
    } finally {
      await this.acknowledge(receiptId);
    }

    return outcome;
  }

  private async handle(body: WebhookBody): Promise<ProcessingOutcome> {
    if (body.typeWebhook !== INCOMING_TEXT_WEBHOOK) {
      logger.debug('Ignoring notification', { typeWebhook: body.typeWebhook });
      return 'ignored';
    }

    const message = parseIncomingText(body);
    if (!message) {
      return 'ignored';
    }

    const { messageId, chatId, sender, text } = message;
    if (!text || !chatId) {
      return 'ignored';
    }

    if (messageId && this.deps.processed.has(messageId)) {
      logger.info('Duplicate message skipped', { messageId, chatId });
      return 'duplicate';
    }

    logger.info('Message received', {
      messageId,
      chatId,
      sender,
      senderName: message.senderName,
      text: preview(text)
    });

    const trimmed = text.trim();
    let outcome: ProcessingOutcome;

    if (trimmed.startsWith(ADMIN_COMMANDS.listClients)) {
      await this.handleListClients(chatId, sender);
      outcome = 'admin';
    } else if (LeadExtractorService.hasLeadMarker(text)) {
      await this.handleLeadSubmission(chatId, sender, text);
      outcome = 'lead';
    } else if (trimmed === ADMIN_COMMANDS.reset) {
      await this.handleReset(chatId, sender);
      outcome = 'reset';
    } else {
      const canned = IntentRouterService.route(text);
      if (canned) {
        await this.sendUnique(chatId, canned);
        outcome = 'canned';
      } else {
        const reply = await this.deps.generator.generate(chatId, text);
        await this.sendUnique(chatId, reply);
        outcome = 'generated';
      }
    }

    if (messageId) {
      this.deps.processed.add(messageId);
    }

    logger.info('Message handled', { messageId, chatId, outcome });
    return outcome;
  }

  private async handleListClients(chatId: string, sender: string): Promise<void> {
    if (!this.isAdmin(sender)) {
      logger.warn('Admin command denied', { command: ADMIN_COMMANDS.listClients, sender });
      await this.sendUnique(chatId, ACCESS_DENIED_REPLY);
      return;
    }

    const result = await this.deps.leadStore.listRecent(RECENT_LEADS_LIMIT);
    if (!result.success) {
      await this.sendUnique(chatId, LEADS_UNAVAILABLE_REPLY);
      return;
    }

    await this.sendUnique(chatId, result.leads.length > 0 ? formatLeadList(result.leads) : NO_LEADS_REPLY);
  }

  private async handleLeadSubmission(chatId: string, sender: string, text: string): Promise<void> {
    const lead = LeadExtractorService.extract(text);

    if (!LeadExtractorService.isComplete(lead)) {
      const missing = LeadExtractorService.missingFields(lead);
      logger.info('Lead incomplete, asking for missing fields', { chatId, missing });
      await this.sendUnique(chatId, LeadExtractorService.buildFollowUp(missing));
      return;
    }

    const saved = await this.deps.leadStore.save(sender, lead);
    await this.sendUnique(chatId, saved ? LeadExtractorService.buildConfirmation(lead) : LEAD_SAVE_FAILED_REPLY);
  }

  private async handleReset(chatId: string, sender: string): Promise<void> {
    if (!this.isAdmin(sender)) {
      logger.warn('Admin command ignored', { command: ADMIN_COMMANDS.reset, sender });
      return;
    }

    this.deps.history.clear(chatId);
    await this.sendUnique(chatId, RESET_CONFIRMED_REPLY);
  }

  /**
   * Sends unless the same text was the last reply to this chat; a suppressed send counts as success
   */
  async sendUnique(chatId: string, text: string): Promise<boolean> {
    if (this.deps.history.isDuplicateReply(chatId, text)) {
      logger.info('Identical consecutive reply suppressed', { chatId });
      return true;
    }

    const result = await this.deps.sender.sendMessage(chatId, text);
    if (result.success) {
      this.deps.history.rememberReply(chatId, text);
    }
    return result.success;
  }

  private async acknowledge(receiptId: number | undefined): Promise<void> {
    if (typeof receiptId !== 'number') {
      logger.warn('Notification without receipt id cannot be acknowledged');
      return;
    }

    try {
      await this.deps.source.deleteNotification(receiptId);
    } catch (error) {
      logger.error('Error acknowledging notification', {
        error: errorMessage(error),
        receiptId
      });
    }
  }
}

export function formatLeadList(leads: LeadEntry[]): string {
  const blocks = leads.map(({ sender, record }) => [
    `📱 ${sender}`,
    `👤 ${record.name || NOT_SPECIFIED}`,
    `🏢 ${record.company || NOT_SPECIFIED}`,
    `📞 ${record.phone || NOT_SPECIFIED}`,
    `🧩 ${record.task || NOT_SPECIFIED}`,
    `📅 ${record.recordedAt.split('T')[0]}`
  ].join('\n'));

  return ['📋 Последние записи:', ...blocks].join('\n\n');
}
