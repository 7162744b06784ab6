import { NotificationSource } from '../types';
import { NotificationProcessorService } from './notification-processor.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';

export interface PollerOptions {
  idleDelayMs: number;
  errorDelayMs: number;
}

export interface PollerStats {
  running: boolean;
  polls: number;
  notifications: number;
  fetchFailures: number;
  lastPollAt: string | null;
}

/**
 * Serial polling loop: one notification is fully handled before the next fetch
 */
export class PollerService {
  private running = false;
  private loop: Promise<void> | null = null;
  private wakeUp: (() => void) | null = null;
  private restartRequested = false;
  private counters: Omit<PollerStats, 'running'> = {
    polls: 0,
    notifications: 0,
    fetchFailures: 0,
    lastPollAt: null
  };

  constructor(
    private readonly source: NotificationSource,
    private readonly processor: Pick<NotificationProcessorService, 'process'>,
    private readonly options: PollerOptions
  ) {}

  /**
   * Starts the loop; the returned promise settles once the loop has stopped.
   * Called while a stopped loop is still finishing, it starts a new loop after that one ends.
   */
  public start(): Promise<void> {
    if (this.loop) {
      if (this.running) {
        return this.loop;
      }
      this.restartRequested = true;
      return this.loop.then(() => (this.restartRequested ? this.start() : undefined));
    }

    this.restartRequested = false;
    this.running = true;
    logger.info('Poller started', {
      idleDelayMs: this.options.idleDelayMs,
      errorDelayMs: this.options.errorDelayMs
    });

    this.loop = this.run().finally(() => {
      this.loop = null;
      logger.info('Poller stopped', { polls: this.counters.polls });
    });
    return this.loop;
  }

  /**
   * Lets the notification in progress finish, then ends the loop
   */
  public async stop(): Promise<void> {
    this.running = false;
    this.restartRequested = false;
    this.wakeUp?.();
    if (this.loop) {
      await this.loop;
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public stats(): PollerStats {
    return {
      running: this.running,
      ...this.counters
    };
  }

  /**
   * One fetch-and-dispatch round; resolves with the pause to take before the next one
   */
  async pollOnce(): Promise<number> {
    this.counters.polls += 1;
    this.counters.lastPollAt = new Date().toISOString();

    try {
      const result = await this.source.receiveNotification();

      if (!result.success) {
        this.counters.fetchFailures += 1;
        return this.options.errorDelayMs;
      }

      if (!result.notification) {
        return this.options.idleDelayMs;
      }

      this.counters.notifications += 1;
      await this.processor.process(result.notification);
      return 0;
    } catch (error) {
      logger.error('Error in polling loop', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined
      });
      return this.options.errorDelayMs;
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      const delay = await this.pollOnce();
      if (delay > 0 && this.running) {
        await this.pause(delay);
      }
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, ms);

      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }
}
