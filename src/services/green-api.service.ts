import axios from 'axios';
import {
  GreenApiNotification,
  MessageSender,
  NotificationSource,
  ReceiveResult,
  SendMessageResult
} from '../types';
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';

export interface GreenApiSettings {
  apiUrl: string;
  instanceId: string;
  token: string;
  receiveTimeout: number;
}

interface SendMessageResponse {
  idMessage?: string;
}

interface StateInstanceResponse {
  stateInstance?: string;
}

function responseStatus(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * HTTP client of the Green API WhatsApp gateway
 */
export class GreenApiService implements NotificationSource, MessageSender {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly receiveTimeout: number;

  constructor(settings: GreenApiSettings) {
    this.baseUrl = `${settings.apiUrl.replace(/\/+$/, '')}/waInstance${settings.instanceId}`;
    this.token = settings.token;
    this.receiveTimeout = settings.receiveTimeout;

    if (!settings.instanceId || !settings.token) {
      logger.warn('Green API configuration incomplete', {
        hasInstanceId: !!settings.instanceId,
        hasToken: !!settings.token
      });
    }
  }

  private methodUrl(method: string, suffix: string = ''): string {
    return `${this.baseUrl}/${method}/${this.token}${suffix}`;
  }

  /**
   * Takes the next queued notification; the gateway hands them out one per call
   */
  async receiveNotification(): Promise<ReceiveResult> {
    try {
      const response = await axios.get<GreenApiNotification | null>(this.methodUrl('receiveNotification'), {
        params: { receiveTimeout: this.receiveTimeout },
        timeout: (this.receiveTimeout + 10) * 1000
      });

      if (response.status !== 200) {
        logger.error('receiveNotification returned non-success status', {
          status: response.status,
          data: response.data
        });

        return {
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`
        };
      }

      return {
        success: true,
        notification: response.data ?? null
      };
    } catch (error) {
      logger.error('Error receiving notification', {
        error: errorMessage(error),
        responseStatus: responseStatus(error)
      });

      return {
        success: false,
        error: errorMessage(error)
      };
    }
  }

  /**
   * Removes a notification from the queue; until then it is redelivered
   */
  async deleteNotification(receiptId: number): Promise<boolean> {
    try {
      const response = await axios.delete(this.methodUrl('deleteNotification', `/${receiptId}`), {
        timeout: 10000
      });

      if (response.status !== 200) {
        logger.error('deleteNotification returned non-success status', {
          receiptId,
          status: response.status,
          data: response.data
        });
        return false;
      }

      logger.debug('Notification deleted', { receiptId });
      return true;
    } catch (error) {
      logger.error('Error deleting notification', {
        error: errorMessage(error),
        receiptId,
        responseStatus: responseStatus(error)
      });
      return false;
    }
  }

  async sendMessage(chatId: string, message: string): Promise<SendMessageResult> {
    try {
      const response = await axios.post<SendMessageResponse>(
        this.methodUrl('sendMessage'),
        { chatId, message },
        {
          headers: { 'Content-Type': 'application/json' },
          timeout: 10000
        }
      );

      if (response.status !== 200) {
        logger.error('sendMessage returned non-success status', {
          chatId,
          status: response.status,
          data: response.data
        });

        return {
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`
        };
      }

      logger.info('WhatsApp message sent successfully', {
        chatId,
        textLength: message.length,
        idMessage: response.data?.idMessage
      });

      return {
        success: true,
        idMessage: response.data?.idMessage
      };
    } catch (error) {
      logger.error('Error sending WhatsApp message', {
        error: errorMessage(error),
        chatId,
        textLength: message.length,
        responseStatus: responseStatus(error)
      });

      return {
        success: false,
        error: errorMessage(error)
      };
    }
  }

  /**
   * Enables the incoming message notifications the bot polls for
   */
  async applySettings(): Promise<boolean> {
    try {
      await axios.post(
        this.methodUrl('setSettings'),
        { incomingWebhook: 'yes', pollMessageWebhook: 'yes' },
        { timeout: 10000 }
      );

      logger.info('Green API settings applied');
      return true;
    } catch (error) {
      logger.warn('Could not apply Green API settings', {
        error: errorMessage(error),
        responseStatus: responseStatus(error)
      });
      return false;
    }
  }

  /**
   * Instance authorization state ("authorized", "notAuthorized", ...), or null when unreachable
   */
  async getInstanceState(): Promise<string | null> {
    try {
      const response = await axios.get<StateInstanceResponse>(this.methodUrl('getStateInstance'), {
        timeout: 10000
      });

      return response.data?.stateInstance ?? null;
    } catch (error) {
      logger.error('Green API state check failed', {
        error: errorMessage(error),
        responseStatus: responseStatus(error)
      });
      return null;
    }
  }
}
