import 'dotenv/config';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createServer } from './server.js';

let container: AppContainer;
try {
  container = new AppContainer();
} catch (error) {
  console.error('❌ Startup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
}

const { logger, config } = container;
const app = createServer(container);

const server = app.listen(config.http.port, () => {
  logger.info(`🚀 Balance Watch API listening on port ${config.http.port}`);
  logger.info(`📨 Telegram configured: ${container.hasTelegram()}`);
  logger.info(`💾 Storage: ${config.storage.databaseFile ?? 'in-memory'}`);
});

container.scheduler.start();

let shuttingDown = false;

const shutdown = async (signal: NodeJS.Signals) => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down`);

  server.close();
  try {
    await container.shutdown();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
};

process.on('SIGINT', (signal) => void shutdown(signal));
process.on('SIGTERM', (signal) => void shutdown(signal));
