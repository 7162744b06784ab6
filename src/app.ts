import { Server } from 'http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { HealthController } from './controllers';
import routes from './routes';
import { logger } from './utils';
import { errorHandler, notFound, requestLogger } from './middlewares';

/**
 * HTTP surface of the bot: health and status only, messages arrive by polling
 */
class BotHttpApp {
  public app: express.Application;
  private server: Server | null = null;

  constructor(healthController: HealthController, private readonly env: string) {
    this.app = express();
    this.initializeMiddlewares();
    this.initializeRoutes(healthController);
    this.initializeErrorHandling();
  }

  private initializeMiddlewares(): void {
    this.app.use(helmet());

    this.app.use(cors({
      origin: this.env === 'production' ? false : true,
      credentials: true
    }));

    this.app.use(requestLogger);
  }

  private initializeRoutes(healthController: HealthController): void {
    this.app.use('/api', routes(healthController));

    this.app.get('/', (req, res) => {
      res.json({
        success: true,
        message: 'Consultant bot is running',
        version: process.env.npm_package_version || '1.0.0',
        timestamp: new Date().toISOString()
      });
    });

    this.app.use(notFound);
  }

  private initializeErrorHandling(): void {
    this.app.use(errorHandler);
  }

  public listen(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        logger.info('Health server listening', {
          port,
          env: this.env,
          nodeVersion: process.version,
          pid: process.pid
        });
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  public close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}

export default BotHttpApp;
