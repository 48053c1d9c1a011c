import { NotFoundError, errorMessage } from '../errors.js';
import { AnalysisJob } from '../models/analysis-job.js';
import { CodeChunkDraft } from '../models/code-chunk.js';
import { ChunkingService } from './chunking.js';
import { EmbeddingService } from './embedding.js';
import { JobProgressTracker } from './job-tracker.js';
import { detectLanguage } from './languages.js';
import { SourceWorkspace } from './repository.js';
import { AnalysisStore } from './store.js';

export interface AnalysisPipelineOptions {
  store: AnalysisStore;
  workspace: SourceWorkspace;
  chunker: ChunkingService;
  embedder: EmbeddingService;
}

export interface AnalysisRunResult {
  status: 'completed';
  repositoryId: number;
  jobId: number;
  totalFiles: number;
  totalLines: number;
  totalChunks: number;
}

export function countLines(chunks: CodeChunkDraft[]): number {
  return chunks.reduce((sum, chunk) => sum + (chunk.lineEnd - chunk.lineStart + 1), 0);
}

export function languageBreakdown(files: string[]): Record<string, number> {
  const languages: Record<string, number> = {};
  for (const file of files) {
    const language = detectLanguage(file);
    languages[language] = (languages[language] ?? 0) + 1;
  }
  return languages;
}

/**
 * Full repository analysis: clone, discover, chunk, embed, store.
 *
 * The repository moves pending → analyzing → ready | failed; the job row is
 * updated at each checkpoint. The checkout is removed on every exit path and
 * a failure is re-thrown after it has been recorded.
 */
export class AnalysisPipeline {
  private readonly store: AnalysisStore;
  private readonly workspace: SourceWorkspace;
  private readonly chunker: ChunkingService;
  private readonly embedder: EmbeddingService;

  constructor(options: AnalysisPipelineOptions) {
    this.store = options.store;
    this.workspace = options.workspace;
    this.chunker = options.chunker;
    this.embedder = options.embedder;
  }

  async run(repositoryId: number, taskId: string | null): Promise<AnalysisRunResult> {
    let checkout: string | null = null;

    try {
      const repository = await this.store.getRepository(repositoryId);
      if (!repository) {
        throw new NotFoundError('Repository', { repository_id: repositoryId });
      }

      const progress = new JobProgressTracker(this.store, await this.openJob(repositoryId, taskId));
      await this.store.updateRepository(repositoryId, { status: 'analyzing' });

      await progress.report('cloning');
      checkout = await this.workspace.clone(repository.repoUrl, repository.branch);

      await progress.report('discovering');
      const files = await this.workspace.discoverFiles(checkout);

      await progress.report('chunking');
      const drafts: CodeChunkDraft[] = [];
      for (const file of files) {
        drafts.push(...(await this.chunker.chunkFile(file, checkout)));
      }
      console.log(`Total chunks for repository ${repositoryId}: ${drafts.length}`);

      await progress.report('embedding');
      const embeddings = await this.embedder.embedBatch(drafts.map((draft) => draft.chunkText));
      if (embeddings.length !== drafts.length) {
        throw new Error(`Embedding count mismatch: expected ${drafts.length}, received ${embeddings.length}`);
      }

      await progress.report('storing');
      await this.store.replaceChunks(
        repositoryId,
        drafts.map((draft, index) => ({ ...draft, embedding: embeddings[index] ?? null })),
      );

      const totalLines = countLines(drafts);
      await this.store.updateRepository(repositoryId, {
        status: 'ready',
        totalFiles: files.length,
        totalLines,
        languages: languageBreakdown(files),
        analyzedAt: new Date(),
      });
      const job = await progress.report('done');

      console.log(`Analysis complete for repository ${repositoryId}`);
      return {
        status: 'completed',
        repositoryId,
        jobId: job.id,
        totalFiles: files.length,
        totalLines,
        totalChunks: drafts.length,
      };
    } catch (error) {
      console.error(`Analysis failed for repository ${repositoryId}:`, error);
      await this.recordFailure(repositoryId, error);
      throw error;
    } finally {
      if (checkout) {
        await this.workspace.cleanup(checkout);
      }
    }
  }

  // Adopts the placeholder created when the request was accepted, if there is one.
  private async openJob(repositoryId: number, taskId: string | null): Promise<AnalysisJob> {
    const startedAt = new Date();
    const latest = await this.store.getLatestJob(repositoryId);
    if (latest && latest.status === 'queued') {
      return this.store.updateJob(latest.id, {
        status: 'processing',
        taskId: taskId ?? latest.taskId,
        progressPercentage: 0,
        startedAt,
      });
    }
    return this.store.createJob({
      repositoryId,
      status: 'processing',
      taskId,
      progressPercentage: 0,
      startedAt,
    });
  }

  private async recordFailure(repositoryId: number, cause: unknown): Promise<void> {
    try {
      await this.store.updateRepository(repositoryId, { status: 'failed' });
      const job = await this.store.getLatestJob(repositoryId);
      if (job) {
        await this.store.updateJob(job.id, { status: 'failed', errorMessage: errorMessage(cause) });
      }
    } catch (error) {
      console.error(`Could not record failure for repository ${repositoryId}:`, error);
    }
  }
}
