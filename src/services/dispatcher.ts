import { v4 as uuidv4 } from 'uuid';
import { AnalysisJob } from '../models/analysis-job.js';
import { QueueClient } from './queue.js';
import { AnalysisStore } from './store.js';

export const LOCAL_TASK_ID = 'local-task';

export type DispatchMode = 'queued' | 'deferred' | 'synchronous';

/** Runs a task after the current request has been answered. */
export type Defer = (task: () => Promise<void>) => void;

export type LocalRunner = (repositoryId: number, taskId: string) => Promise<unknown>;

export interface DispatchResult {
  taskId: string;
  mode: DispatchMode;
  job: AnalysisJob;
}

export interface AnalysisDispatcherOptions {
  store: AnalysisStore;
  queue: QueueClient;
  runLocal: LocalRunner;
  probeTimeoutMs?: number;
}

/**
 * Hands a pipeline run to the queue, or runs it in this process when the
 * queue cannot be reached. Exactly one of the three paths runs per call.
 */
export class AnalysisDispatcher {
  private readonly store: AnalysisStore;
  private readonly queue: QueueClient;
  private readonly runLocal: LocalRunner;
  private readonly probeTimeoutMs: number;

  constructor(options: AnalysisDispatcherOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.runLocal = options.runLocal;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 1000;
  }

  async dispatch(repositoryId: number, defer?: Defer): Promise<DispatchResult> {
    const reachable = await this.probe();
    const taskId = reachable ? uuidv4() : LOCAL_TASK_ID;

    // Placeholder so a status query made before the run starts finds a job.
    let job = await this.store.createJob({
      repositoryId,
      status: 'queued',
      taskId,
      progressPercentage: 0,
      startedAt: null,
    });

    if (reachable) {
      try {
        const queuedId = await this.queue.enqueue({ repositoryId }, taskId);
        console.log(`Queued analysis for repository ${repositoryId} → task ${queuedId}`);
        return { taskId: queuedId, mode: 'queued', job };
      } catch (error) {
        console.warn(`Enqueue failed for repository ${repositoryId}, running locally:`, error);
        job = await this.store.updateJob(job.id, { taskId: LOCAL_TASK_ID });
      }
    }

    const task = () => this.runLocally(repositoryId);
    if (defer) {
      console.log(`Queue unavailable; analysis of repository ${repositoryId} deferred to this process`);
      defer(task);
      return { taskId: LOCAL_TASK_ID, mode: 'deferred', job };
    }

    console.log(`Queue unavailable; analysing repository ${repositoryId} synchronously`);
    await task();
    return { taskId: LOCAL_TASK_ID, mode: 'synchronous', job };
  }

  private async probe(): Promise<boolean> {
    try {
      return await this.queue.probe(this.probeTimeoutMs);
    } catch (error) {
      console.log('Queue probe failed:', error);
      return false;
    }
  }

  // The pipeline records its own failure on the repository and job rows.
  private async runLocally(repositoryId: number): Promise<void> {
    try {
      await this.runLocal(repositoryId, LOCAL_TASK_ID);
    } catch (error) {
      console.error(`Local analysis task failed for repository ${repositoryId}:`, error);
    }
  }
}
