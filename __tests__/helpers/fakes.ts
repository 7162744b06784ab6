import {
  CompletionClient,
  CompletionMessage,
  CompletionOptions,
  CompletionResult,
  GreenApiNotification,
  LeadCollection,
  LeadRepository,
  MessageSender,
  NotificationSource,
  ReceiveResult,
  SendMessageResult
} from '../../src/types';

export const CHAT_ID = '77001112233@c.us';
export const ADMIN_CHAT_ID = '77000000000@c.us';

/**
 * In-process stand-in for the Green API gateway; records sends and acknowledgements in order
 */
export class FakeGateway implements NotificationSource, MessageSender {
  public queue: ReceiveResult[] = [];
  public sent: Array<{ chatId: string; message: string }> = [];
  public acknowledged: number[] = [];
  public events: string[] = [];
  public sendResult: SendMessageResult = { success: true, idMessage: 'OUT-1' };
  public sendError: Error | null = null;

  async receiveNotification(): Promise<ReceiveResult> {
    return this.queue.shift() ?? { success: true, notification: null };
  }

  async deleteNotification(receiptId: number): Promise<boolean> {
    this.events.push(`ack:${receiptId}`);
    this.acknowledged.push(receiptId);
    return true;
  }

  async sendMessage(chatId: string, message: string): Promise<SendMessageResult> {
    this.events.push(`send:${chatId}`);
    if (this.sendError) {
      throw this.sendError;
    }
    this.sent.push({ chatId, message });
    return this.sendResult;
  }
}

export class InMemoryLeadRepository implements LeadRepository {
  public leads: LeadCollection = {};
  public failReads = false;
  public failWrites = false;
  public writes = 0;

  async readAll(): Promise<LeadCollection> {
    if (this.failReads) {
      throw new Error('disk unavailable');
    }
    return { ...this.leads };
  }

  async writeAll(leads: LeadCollection): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.writes += 1;
    this.leads = { ...leads };
  }
}

export class FakeCompletionClient implements CompletionClient {
  public calls: Array<{ messages: CompletionMessage[]; options: CompletionOptions }> = [];
  public result: CompletionResult = { success: true, text: 'Ответ модели' };
  public error: Error | null = null;

  async complete(messages: CompletionMessage[], options: CompletionOptions): Promise<CompletionResult> {
    this.calls.push({ messages, options });
    if (this.error) {
      throw this.error;
    }
    return this.result;
  }
}

interface TextNotificationOptions {
  receiptId?: number;
  messageId?: string;
  chatId?: string;
  sender?: string;
}

export function textNotification(text: string, options: TextNotificationOptions = {}): GreenApiNotification {
  const chatId = options.chatId ?? CHAT_ID;

  return {
    receiptId: options.receiptId ?? 1,
    body: {
      typeWebhook: 'incomingMessageReceived',
      idMessage: options.messageId ?? 'MSG-1',
      timestamp: 1760000000,
      senderData: {
        chatId,
        sender: options.sender ?? chatId,
        senderName: 'Test User'
      },
      messageData: {
        typeMessage: 'textMessage',
        textMessageData: { textMessage: text }
      }
    }
  };
}
