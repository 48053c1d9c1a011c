import { AnalysisJob } from '../models/analysis-job.js';
import { AnalysisStore } from './store.js';

export type PipelineStage = 'cloning' | 'discovering' | 'chunking' | 'embedding' | 'storing' | 'done';

export const STAGE_PROGRESS: Readonly<Record<PipelineStage, number>> = {
  cloning: 10,
  discovering: 20,
  chunking: 40,
  embedding: 60,
  storing: 85,
  done: 100,
};

export interface ProgressReporter {
  report(stage: PipelineStage): Promise<AnalysisJob>;
}

/**
 * Keeps the in-memory view of a run and its persisted job row in step: every
 * checkpoint is written before `report` resolves, and progress never moves
 * backwards.
 */
export class JobProgressTracker implements ProgressReporter {
  private current: AnalysisJob;

  constructor(
    private readonly store: AnalysisStore,
    job: AnalysisJob,
  ) {
    this.current = job;
  }

  get job(): AnalysisJob {
    return this.current;
  }

  async report(stage: PipelineStage): Promise<AnalysisJob> {
    const progress = STAGE_PROGRESS[stage];
    if (progress < this.current.progressPercentage) {
      throw new Error(
        `Job ${this.current.id} cannot move back to ${stage} (${progress}%) from ${this.current.progressPercentage}%`,
      );
    }

    this.current =
      stage === 'done'
        ? await this.store.updateJob(this.current.id, {
            status: 'completed',
            progressPercentage: progress,
            completedAt: new Date(),
          })
        : await this.store.updateJob(this.current.id, { progressPercentage: progress });

    console.log(`Job ${this.current.id}: ${stage} (${progress}%)`);
    return this.current;
  }
}
