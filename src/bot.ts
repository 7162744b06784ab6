import BotHttpApp from './app';
import { Config } from './config';
import { HealthController } from './controllers';
import { JsonFileLeadRepository } from './repositories/lead.repository';
import { GreenApiService } from './services/green-api.service';
import { HistoryService } from './services/history.service';
import { LeadStoreService } from './services/lead-store.service';
import { NotificationProcessorService } from './services/notification-processor.service';
import { OpenAiCompletionService } from './services/openai-completion.service';
import { PollerService } from './services/poller.service';
import { ProcessedMessageRegistry } from './services/processed-message.registry';
import { ResponseGeneratorService } from './services/response-generator.service';
import { logger } from './utils';

/**
 * Every stateful piece of one bot instance. State lives from start to process exit.
 */
export interface Bot {
  greenApi: GreenApiService;
  history: HistoryService;
  processed: ProcessedMessageRegistry;
  processor: NotificationProcessorService;
  poller: PollerService;
  http: BotHttpApp;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createBot(config: Config): Bot {
  const greenApi = new GreenApiService(config.greenApi);
  const history = new HistoryService();
  const processed = new ProcessedMessageRegistry(config.bot.processedCacheSize);
  const leadStore = new LeadStoreService(new JsonFileLeadRepository(config.bot.leadsFile));
  const generator = new ResponseGeneratorService(history, new OpenAiCompletionService(config.openai));

  const processor = new NotificationProcessorService({
    source: greenApi,
    sender: greenApi,
    history,
    processed,
    leadStore,
    generator,
    adminPhones: config.bot.adminPhones
  });

  const poller = new PollerService(greenApi, processor, config.polling);

  const http = new BotHttpApp(new HealthController({
    pollerStats: () => poller.stats(),
    conversationCount: () => history.conversationCount(),
    processedMessageCount: () => processed.size
  }), config.app.env);

  let loop: Promise<void> | null = null;

  return {
    greenApi,
    history,
    processed,
    processor,
    poller,
    http,

    async start(): Promise<void> {
      const state = await greenApi.getInstanceState();
      logger.info('Green API instance state', { state: state ?? 'unknown' });

      await greenApi.applySettings();
      await http.listen(config.app.port);

      loop = poller.start();
      logger.info('Bot started', {
        model: config.openai.model,
        admins: config.bot.adminPhones.length,
        leadsFile: config.bot.leadsFile
      });
    },

    async stop(): Promise<void> {
      await poller.stop();
      if (loop) {
        await loop;
      }
      await http.close();
      logger.info('Bot stopped');
    }
  };
}
