import { Job, Worker } from 'bullmq';
import { loadConfig } from './config.js';
import { createServices } from './container.js';
import { AnalysisRunResult } from './services/pipeline.js';
import { AnalysisJobPayload, createRedisConnection } from './services/queue.js';

const config = loadConfig();
const services = createServices(config);

async function startWorker(): Promise<void> {
  await services.db.connect();

  // One analysis at a time per worker process.
  const worker = new Worker<AnalysisJobPayload, AnalysisRunResult>(
    config.queueName,
    async (job: Job<AnalysisJobPayload, AnalysisRunResult>) => {
      console.log(`Worker picked up task ${job.id} for repository ${job.data.repositoryId}`);
      return services.pipeline.run(job.data.repositoryId, job.id ?? null);
    },
    {
      connection: createRedisConnection(config.redisUrl),
      concurrency: 1,
    },
  );

  worker.on('completed', (job) => {
    console.log(`Task ${job.id} completed for repository ${job.data.repositoryId}`);
  });
  worker.on('failed', (job, error) => {
    console.error(`Task ${job?.id ?? 'unknown'} failed:`, error.message);
  });
  worker.on('error', (error) => {
    console.error('Worker error:', error);
  });

  console.log(`Analysis worker listening on queue "${config.queueName}"`);

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`Received ${signal}, shutting down worker...`);
    try {
      await worker.close();
      await services.db.disconnect();
      process.exit(0);
    } catch (error) {
      console.error('Error during worker shutdown:', error);
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

startWorker().catch((error: unknown) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
