import 'dotenv/config';
import { DatabaseClient, createDataContext, loadConfig } from '@carewatch/shared';
import { AgentService } from './services/AgentService.js';
import { AgentRunWorker } from './workers/AgentRunWorker.js';

const config = loadConfig();
const databaseClient = DatabaseClient.getInstance(config.databasePath);
const agentService = AgentService.fromConfig(config, createDataContext(databaseClient.db));
const worker = new AgentRunWorker(agentService, config.queue.redisUrl);

worker.scheduleSweep(config.queue.sweepIntervalMinutes)
  .then(() => console.log('[Agents Worker] Listening for agent runs'))
  .catch(error => console.error('[Agents Worker] Failed to schedule monitoring sweep:', error));

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.log(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }

  isShuttingDown = true;
  console.log(`\n${signal} received - Shutting down gracefully...`);

  let exitCode = 0;

  try {
    await worker.close();
    console.log('Worker closed');

    databaseClient.close();
    console.log('Database closed');

    console.log('Graceful shutdown complete');
  } catch (error) {
    console.error('Error during shutdown:', error);
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  void gracefulShutdown('UNHANDLED_REJECTION');
});
