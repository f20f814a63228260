import 'dotenv/config';
import http from 'http';
import { AgentService } from '@carewatch/agents';
import {
  CsvImportService,
  DatabaseClient,
  DeviceInventoryService,
  createDataContext,
  loadConfig
} from '@carewatch/shared';
import { createApp } from './app.js';
import { AgentRunQueue, connectAgentRunQueue } from './queues/AgentRunQueue.js';
import { BullBoardRouter, QUEUE_DASHBOARD_PATH } from './routes/BullBoardRoute.js';

const config = loadConfig();
const databaseClient = DatabaseClient.getInstance(config.databasePath);
const data = createDataContext(databaseClient.db);

const bullQueue = config.queue.enabled ? await connectAgentRunQueue(config.queue.redisUrl) : null;
const agentQueue = bullQueue ? new AgentRunQueue(bullQueue) : null;

const app = createApp({
  config,
  data,
  agentService: AgentService.fromConfig(config, data),
  importService: new CsvImportService(data, config.dataDir),
  inventory: new DeviceInventoryService(data),
  agentQueue,
  queueDashboard: bullQueue ? BullBoardRouter(bullQueue) : null
});

const server = http.createServer(app);

server.listen(config.port, () => {
  console.log(`CareWatch server running on http://localhost:${config.port}`);
  console.log(agentQueue
    ? `Queue dashboard available at http://localhost:${config.port}${QUEUE_DASHBOARD_PATH}`
    : 'Agent queue disabled - background runs unavailable');
});

let isShuttingDown = false;

function closeServer(): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err && !('code' in err && err.code === 'ERR_SERVER_NOT_RUNNING')) {
        console.error('Error closing HTTP server:', err);
        reject(err);
      } else {
        console.log('HTTP server closed');
        resolve();
      }
    });
  });
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.log(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }

  isShuttingDown = true;
  console.log(`\n${signal} received - Shutting down gracefully...`);

  let exitCode = 0;

  try {
    await closeServer();

    if (agentQueue) {
      console.log('Closing agent queue...');
      await agentQueue.close();
      console.log('Agent queue closed');
    }

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
