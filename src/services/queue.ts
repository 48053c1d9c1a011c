import { Queue } from 'bullmq';
import { Redis } from 'ioredis';

export interface AnalysisJobPayload {
  repositoryId: number;
}

/**
 * Durable work queue used to hand pipeline runs to worker processes.
 */
export interface QueueClient {
  probe(timeoutMs: number): Promise<boolean>;
  enqueue(payload: AnalysisJobPayload, taskId: string): Promise<string>;
  close(): Promise<void>;
}

export const ANALYSIS_JOB_NAME = 'analyze-repository';

export function createRedisConnection(redisUrl: string): Redis {
  // BullMQ workers block on Redis and require unlimited retries per request.
  return new Redis(redisUrl, { maxRetriesPerRequest: null });
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class BullQueueClient implements QueueClient {
  private queue: Queue<AnalysisJobPayload> | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly queueName: string,
  ) {}

  /**
   * One bounded PING on a throwaway connection. Never throws.
   */
  async probe(timeoutMs: number): Promise<boolean> {
    const client = new Redis(this.redisUrl, {
      lazyConnect: true,
      connectTimeout: timeoutMs,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      retryStrategy: () => null,
    });
    client.on('error', (error: Error) => {
      console.warn(`Redis probe error: ${error.message}`);
    });

    try {
      await withTimeout(
        client.connect().then(() => client.ping()),
        timeoutMs,
        'Redis probe',
      );
      return true;
    } catch (error) {
      console.log('Queue unavailable:', error instanceof Error ? error.message : error);
      return false;
    } finally {
      client.disconnect();
    }
  }

  async enqueue(payload: AnalysisJobPayload, taskId: string): Promise<string> {
    const job = await this.getQueue().add(ANALYSIS_JOB_NAME, payload, {
      jobId: taskId,
      removeOnComplete: 1000,
      removeOnFail: 1000,
    });
    return job.id ?? taskId;
  }

  async close(): Promise<void> {
    if (this.queue) {
      await this.queue.close();
      this.queue = null;
    }
  }

  private getQueue(): Queue<AnalysisJobPayload> {
    if (!this.queue) {
      this.queue = new Queue<AnalysisJobPayload>(this.queueName, {
        connection: createRedisConnection(this.redisUrl),
      });
      this.queue.on('error', (error: Error) => {
        console.error('Analysis queue error:', error);
      });
    }
    return this.queue;
  }
}
