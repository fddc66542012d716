import process from 'node:process';
import { createApp } from './bootstrap/app.js';
import { serializeError } from './errors.js';

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const main = async (): Promise<void> => {
  const probe = createApp();
  const { logger } = probe;
  let stopping: Promise<void> | null = null;

  const stop = (reason: string): Promise<void> => {
    if (!stopping) {
      logger.info({ reason }, 'stopping autoscale probe');
      stopping = probe.stop().then(
        () => {
          process.exitCode = 0;
        },
        (error: unknown) => {
          logger.error({ err: serializeError(error) }, 'autoscale probe did not stop cleanly');
          process.exitCode = 1;
        }
      );
    }
    return stopping;
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      void stop(signal).then(() => process.exit());
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.error({ err: serializeError(reason) }, 'unhandled promise rejection');
  });
  process.on('uncaughtException', (error) => {
    logger.fatal({ err: serializeError(error) }, 'uncaught exception');
    void stop('uncaughtException').then(() => process.exit(1));
  });

  try {
    await probe.start();
  } catch (error) {
    logger.fatal({ err: serializeError(error) }, 'autoscale probe failed to start');
    await stop('startup failure');
    process.exit(1);
  }
};

main().catch((error: unknown) => {
  process.stderr.write(`autoscale probe could not be created: ${String(error)}\n`);
  process.exit(1);
});
