import { logger } from '../logger';

export interface ShutdownHandler {
  name: string;
  priority: number;
  handler: () => Promise<void>;
}

/**
 * Runs registered handlers in ascending priority on SIGTERM/SIGINT, then
 * exits. A handler that throws is logged and the rest still run.
 */
export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown = false;
  private readonly FORCE_EXIT_TIMEOUT = 30000;

  register(name: string, priority: number, handler: () => Promise<void>): void {
    this.handlers.push({ name, priority, handler });
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info('Graceful shutdown initiated');

    const timeout = setTimeout(() => {
      logger.error('Force exit timeout reached, exiting with error');
      process.exit(1);
    }, this.FORCE_EXIT_TIMEOUT);

    const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);

    for (const { name, handler } of sortedHandlers) {
      try {
        logger.info(`Running shutdown handler: ${name}`);
        await handler();
        logger.info(`Shutdown handler completed: ${name}`);
      } catch (error) {
        logger.error({ err: error }, `Shutdown handler failed: ${name}`);
      }
    }

    clearTimeout(timeout);
    logger.info('Graceful shutdown completed');
    process.exit(0);
  }

  registerDefaults(deps: {
    httpServer?: { close: (callback?: (err?: Error) => void) => void };
    bullmqWorkers?: { close: () => Promise<void> }[];
    container?: { close: () => Promise<void> };
  }): void {
    const { httpServer, bullmqWorkers, container } = deps;

    if (httpServer) {
      this.register('httpServer', 0, () => {
        return new Promise<void>((resolve, reject) => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    }

    if (bullmqWorkers) {
      this.register('bullmqWorkers', 10, async () => {
        await Promise.all(bullmqWorkers.map((worker) => worker.close()));
      });
    }

    if (container) {
      this.register('container', 20, () => container.close());
    }
  }

  setup(): void {
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`${signal} received`);
      this.shutdown().catch((err: unknown) => {
        logger.fatal({ err }, 'Graceful shutdown crashed');
        process.exit(1);
      });
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
  }
}

export const gracefulShutdown = new GracefulShutdown();
