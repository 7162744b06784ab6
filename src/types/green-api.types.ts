/**
 * Green API notification types (receiveNotification queue)
 */

export type WebhookType =
  | 'incomingMessageReceived'
  | 'outgoingMessageReceived'
  | 'outgoingAPIMessageReceived'
  | 'outgoingMessageStatus'
  | 'stateInstanceChanged'
  | 'deviceInfo'
  | 'incomingCall';

export interface SenderData {
  chatId: string;
  sender: string;
  senderName?: string;
  chatName?: string;
}

export interface MessageData {
  typeMessage?: string;
  idMessage?: string;
  textMessageData?: {
    textMessage: string;
  };
  extendedTextMessageData?: {
    text: string;
    description?: string;
    title?: string;
  };
}

export interface WebhookBody {
  typeWebhook?: WebhookType | string;
  idMessage?: string;
  timestamp?: number;
  instanceData?: {
    idInstance: number;
    wid: string;
    typeInstance: string;
  };
  senderData?: SenderData;
  messageData?: MessageData;
}

export interface GreenApiNotification {
  receiptId?: number;
  body?: WebhookBody | null;
}

/**
 * Incoming text message reduced to the fields the bot routes on
 */
export interface IncomingTextMessage {
  messageId?: string;
  chatId: string;
  sender: string;
  senderName?: string;
  text: string;
}

export type ReceiveResult =
  | { success: true; notification: GreenApiNotification | null }
  | { success: false; error: string };

export interface SendMessageResult {
  success: boolean;
  idMessage?: string;
  error?: string;
}

/**
 * Source of queued notifications; every fetched notification must be deleted
 * by receipt id or the gateway delivers it again
 */
export interface NotificationSource {
  receiveNotification(): Promise<ReceiveResult>;
  deleteNotification(receiptId: number): Promise<boolean>;
}

export interface MessageSender {
  sendMessage(chatId: string, message: string): Promise<SendMessageResult>;
}
