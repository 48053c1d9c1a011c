import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import { AnalysisJob } from '../models/analysis-job.js';
import { Repository, RepositoryFilter } from '../models/repository.js';
import { Defer, AnalysisDispatcher } from './dispatcher.js';
import { AnalysisStore, DeletedCounts, Page } from './store.js';

export interface SubmitRepositoryInput {
  repoUrl: string;
  branch?: string;
  name?: string;
  description?: string;
}

export interface UpdateRepositoryInput {
  name?: string;
  branch?: string;
  description?: string;
  action?: 'reanalyze';
}

export interface SubmissionResult {
  repository: Repository;
  jobId: string | null;
  message: string;
}

export interface RepositoryStatistics {
  repositoryId: number;
  codeStatistics: {
    totalFiles: number;
    totalLines: number;
    totalFunctions: number;
    totalClasses: number;
    languages: Record<string, number>;
  };
  usageStatistics: {
    totalQuestionsAsked: number;
    averageResponseTimeMs: number | null;
  };
}

export function deriveRepositoryName(repoUrl: string): string {
  const segments = repoUrl.replace(/\/+$/, '').split('/');
  return segments[segments.length - 1] || repoUrl;
}

/**
 * Repository lifecycle behind the HTTP API: submission, re-analysis,
 * deletion, and status/statistics reads.
 */
export class AnalysisService {
  constructor(
    private readonly store: AnalysisStore,
    private readonly dispatcher: AnalysisDispatcher,
  ) {}

  async submit(input: SubmitRepositoryInput, defer?: Defer): Promise<SubmissionResult> {
    const repoUrl = input.repoUrl.trim();
    if (!repoUrl) {
      throw new ValidationError('Repository URL is required');
    }

    const existing = await this.store.findRepositoryByUrl(repoUrl);
    if (existing) {
      throw new ConflictError('Repository already exists', { repository_id: existing.id });
    }

    const repository = await this.store.createRepository({
      name: input.name?.trim() || deriveRepositoryName(repoUrl),
      repoUrl,
      branch: input.branch?.trim() || 'main',
      description: input.description ?? null,
    });

    const { taskId } = await this.dispatcher.dispatch(repository.id, defer);
    return {
      repository: await this.require(repository.id),
      jobId: taskId,
      message: 'Repository analysis job queued',
    };
  }

  list(filter: RepositoryFilter): Promise<Page<Repository>> {
    return this.store.listRepositories(filter);
  }

  get(id: number): Promise<Repository> {
    return this.require(id);
  }

  async update(id: number, input: UpdateRepositoryInput, defer?: Defer): Promise<SubmissionResult> {
    const repository = await this.require(id);

    // Only a settled repository can start over; pending and analyzing ones already have a run.
    if (input.action === 'reanalyze' && repository.status !== 'ready' && repository.status !== 'failed') {
      throw new ConflictError('Repository analysis already in progress', {
        repository_id: id,
        status: repository.status,
      });
    }

    await this.store.updateRepository(id, {
      ...(input.name ? { name: input.name } : {}),
      ...(input.branch ? { branch: input.branch } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
      ...(input.action === 'reanalyze' ? { status: 'pending' as const } : {}),
    });

    if (input.action !== 'reanalyze') {
      return { repository: await this.require(id), jobId: null, message: 'Repository updated' };
    }

    const { taskId } = await this.dispatcher.dispatch(id, defer);
    return { repository: await this.require(id), jobId: taskId, message: 'Re-analysis job queued' };
  }

  async remove(id: number): Promise<DeletedCounts> {
    const deleted = await this.store.deleteRepository(id);
    if (!deleted) {
      throw new NotFoundError('Repository', { repository_id: id });
    }
    console.log(`Deleted repository ${id} (${deleted.codeChunks} chunks, ${deleted.questions} questions)`);
    return deleted;
  }

  async getStatus(id: number): Promise<AnalysisJob> {
    const job = await this.store.getLatestJob(id);
    if (!job) {
      throw new NotFoundError('Analysis job', { repository_id: id });
    }
    return job;
  }

  async getStatistics(id: number): Promise<RepositoryStatistics> {
    const repository = await this.require(id);
    const [totalFunctions, totalClasses, usage] = await Promise.all([
      this.store.countChunks(id, 'function'),
      this.store.countChunks(id, 'class'),
      this.store.getQuestionUsage(id),
    ]);

    return {
      repositoryId: id,
      codeStatistics: {
        totalFiles: repository.totalFiles,
        totalLines: repository.totalLines,
        totalFunctions,
        totalClasses,
        languages: repository.languages,
      },
      usageStatistics: {
        totalQuestionsAsked: usage.totalQuestions,
        averageResponseTimeMs: usage.averageResponseTimeMs,
      },
    };
  }

  private async require(id: number): Promise<Repository> {
    const repository = await this.store.getRepository(id);
    if (!repository) {
      throw new NotFoundError('Repository', { repository_id: id });
    }
    return repository;
  }
}
