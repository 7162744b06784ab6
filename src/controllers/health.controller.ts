import { Request, Response } from 'express';
import { PollerStats } from '../services/poller.service';

export interface BotStatusProvider {
  pollerStats(): PollerStats;
  conversationCount(): number;
  processedMessageCount(): number;
}

export interface HealthReport {
  statusCode: number;
  body: {
    success: boolean;
    status: 'polling' | 'stopped';
    poller: PollerStats;
    conversations: number;
    processedMessages: number;
    timestamp: string;
  };
}

/**
 * Liveness and polling statistics
 */
export class HealthController {
  constructor(
    private readonly status: BotStatusProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  public report(): HealthReport {
    const poller = this.status.pollerStats();

    return {
      statusCode: poller.running ? 200 : 503,
      body: {
        success: poller.running,
        status: poller.running ? 'polling' : 'stopped',
        poller,
        conversations: this.status.conversationCount(),
        processedMessages: this.status.processedMessageCount(),
        timestamp: this.now().toISOString()
      }
    };
  }

  /**
   * GET /api/health
   */
  public health(req: Request, res: Response): void {
    const { statusCode, body } = this.report();
    res.status(statusCode).json(body);
  }
}
