import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createServices } from './container.js';

const config = loadConfig();
const services = createServices(config);

const app = createApp({
  store: services.db,
  queue: services.queue,
  analysis: services.analysis,
  qa: services.qa,
  queueProbeTimeoutMs: config.queueProbeTimeoutMs,
});

async function startServer(): Promise<void> {
  await services.db.connect();
  console.log('Database connection established');

  const server = app.listen(config.port, () => {
    console.log(`Code query API running on port ${config.port}`);
  });

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`Received ${signal}, shutting down server...`);
    server.close();
    try {
      await services.queue.close();
      await services.db.disconnect();
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
