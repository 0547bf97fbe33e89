import process from 'node:process';

import { createApplication } from './application';

export { createApplication } from './application';

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    console.error('Failed to start Telegram gateway', error);
    process.exitCode = 1;
  });
}

async function bootstrap(): Promise<void> {
  const app = await createApplication();

  try {
    await app.start();
  } catch (error) {
    app.logger.error({ error }, 'Telegram gateway failed to start');
    await app.stop();
    throw error;
  }
  app.logger.info({ port: app.config.port }, 'Telegram gateway started');

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    app.logger.info({ signal }, 'Shutting down Telegram gateway');
    try {
      await app.stop();
      app.logger.info('Shutdown complete');
    } catch (error) {
      app.logger.error({ error }, 'Error during shutdown');
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
