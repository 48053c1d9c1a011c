import { AnalysisJob, AnalysisJobPatch, NewAnalysisJob } from '../../models/analysis-job.js';
import { ChunkType, CodeChunk, NewCodeChunk, RetrievedChunk } from '../../models/code-chunk.js';
import { NewQuestion, Question, QuestionUsage } from '../../models/question.js';
import { NewRepository, Repository, RepositoryFilter, RepositoryPatch } from '../../models/repository.js';
import { EmbeddingModel } from '../embedding-model.js';
import { AnalysisJobPayload, QueueClient } from '../queue.js';
import { SourceWorkspace } from '../repository.js';
import { AnalysisStore, DeletedCounts, Page } from '../store.js';
import { rankBySimilarity } from '../vector.js';

/**
 * AnalysisStore kept in plain arrays, with the same ordering and cascade
 * rules as the PostgreSQL store.
 */
export class InMemoryStore implements AnalysisStore {
  repositories: Repository[] = [];
  jobs: AnalysisJob[] = [];
  chunks: CodeChunk[] = [];
  questions: Question[] = [];
  private nextId = { repository: 1, job: 1, chunk: 1, question: 1 };
  private clock = Date.UTC(2024, 0, 1);

  // Strictly increasing timestamps so "latest" is well defined.
  private now(): Date {
    this.clock += 1000;
    return new Date(this.clock);
  }

  async createRepository(input: NewRepository): Promise<Repository> {
    const createdAt = this.now();
    const repository: Repository = {
      id: this.nextId.repository++,
      ...input,
      status: 'pending',
      totalFiles: 0,
      totalLines: 0,
      languages: {},
      analyzedAt: null,
      createdAt,
      updatedAt: createdAt,
    };
    this.repositories.push(repository);
    return { ...repository };
  }

  async getRepository(id: number): Promise<Repository | null> {
    const repository = this.repositories.find((candidate) => candidate.id === id);
    return repository ? { ...repository } : null;
  }

  async findRepositoryByUrl(repoUrl: string): Promise<Repository | null> {
    const repository = this.repositories.find((candidate) => candidate.repoUrl === repoUrl);
    return repository ? { ...repository } : null;
  }

  async listRepositories(filter: RepositoryFilter): Promise<Page<Repository>> {
    const search = filter.search?.toLowerCase();
    const matching = this.repositories
      .filter((repository) => !filter.status || repository.status === filter.status)
      .filter(
        (repository) =>
          !search ||
          repository.name.toLowerCase().includes(search) ||
          repository.repoUrl.toLowerCase().includes(search),
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
    return {
      total: matching.length,
      items: matching.slice(filter.offset, filter.offset + filter.limit).map((repository) => ({ ...repository })),
    };
  }

  async updateRepository(id: number, patch: RepositoryPatch): Promise<Repository | null> {
    const repository = this.repositories.find((candidate) => candidate.id === id);
    if (!repository) {
      return null;
    }
    const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
    Object.assign(repository, defined, { updatedAt: this.now() });
    return { ...repository };
  }

  async deleteRepository(id: number): Promise<DeletedCounts | null> {
    if (!this.repositories.some((repository) => repository.id === id)) {
      return null;
    }
    const counts: DeletedCounts = {
      codeChunks: this.chunks.filter((chunk) => chunk.repositoryId === id).length,
      questions: this.questions.filter((question) => question.repositoryId === id).length,
    };
    this.repositories = this.repositories.filter((repository) => repository.id !== id);
    this.jobs = this.jobs.filter((job) => job.repositoryId !== id);
    this.chunks = this.chunks.filter((chunk) => chunk.repositoryId !== id);
    this.questions = this.questions.filter((question) => question.repositoryId !== id);
    return counts;
  }

  async createJob(input: NewAnalysisJob): Promise<AnalysisJob> {
    const job: AnalysisJob = {
      id: this.nextId.job++,
      ...input,
      errorMessage: null,
      completedAt: null,
      createdAt: this.now(),
    };
    this.jobs.push(job);
    return { ...job };
  }

  async updateJob(id: number, patch: AnalysisJobPatch): Promise<AnalysisJob> {
    const job = this.jobs.find((candidate) => candidate.id === id);
    if (!job) {
      throw new Error(`Analysis job ${id} not found`);
    }
    const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
    Object.assign(job, defined);
    return { ...job };
  }

  async getLatestJob(repositoryId: number): Promise<AnalysisJob | null> {
    const jobs = this.jobs
      .filter((job) => job.repositoryId === repositoryId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
    const latest = jobs[0];
    return latest ? { ...latest } : null;
  }

  async replaceChunks(repositoryId: number, chunks: NewCodeChunk[]): Promise<number> {
    this.chunks = this.chunks.filter((chunk) => chunk.repositoryId !== repositoryId);
    for (const chunk of chunks) {
      this.chunks.push({ ...chunk, id: this.nextId.chunk++, repositoryId, createdAt: this.now() });
    }
    return chunks.length;
  }

  async countChunks(repositoryId: number, chunkType?: ChunkType): Promise<number> {
    return this.chunks.filter(
      (chunk) => chunk.repositoryId === repositoryId && (!chunkType || chunk.chunkType === chunkType),
    ).length;
  }

  async searchSimilarChunks(repositoryId: number, queryVector: number[], limit: number): Promise<RetrievedChunk[]> {
    return rankBySimilarity(
      this.chunks.filter((chunk) => chunk.repositoryId === repositoryId),
      queryVector,
      limit,
    );
  }

  async createQuestion(input: NewQuestion): Promise<Question> {
    const question: Question = { id: this.nextId.question++, ...input, createdAt: this.now() };
    this.questions.push(question);
    return { ...question };
  }

  async getQuestion(id: number): Promise<Question | null> {
    const question = this.questions.find((candidate) => candidate.id === id);
    return question ? { ...question } : null;
  }

  async listQuestions(repositoryId: number, limit: number, offset: number): Promise<Page<Question>> {
    const matching = this.questions
      .filter((question) => question.repositoryId === repositoryId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
    return { total: matching.length, items: matching.slice(offset, offset + limit) };
  }

  async deleteQuestion(id: number): Promise<boolean> {
    const before = this.questions.length;
    this.questions = this.questions.filter((question) => question.id !== id);
    return this.questions.length < before;
  }

  async getQuestionUsage(repositoryId: number): Promise<QuestionUsage> {
    const times = this.questions
      .filter((question) => question.repositoryId === repositoryId)
      .map((question) => question.processingTimeMs)
      .filter((time): time is number => time !== null);
    const total = this.questions.filter((question) => question.repositoryId === repositoryId).length;
    return {
      totalQuestions: total,
      averageResponseTimeMs: times.length > 0 ? times.reduce((sum, time) => sum + time, 0) / times.length : null,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

/**
 * Bag-of-characters embedding: each character adds to the bucket of its code
 * point modulo the dimension. Identical texts get identical vectors.
 */
export class HashingEmbeddingModel implements EmbeddingModel {
  readonly name = 'hashing-test-model';
  readonly calls: string[][] = [];

  constructor(readonly dimension: number = 8) {}

  async encode(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const vector = new Array<number>(this.dimension).fill(0);
      for (const char of text) {
        const bucket = (char.codePointAt(0) ?? 0) % this.dimension;
        vector[bucket] = (vector[bucket] ?? 0) + 1;
      }
      return vector;
    });
  }
}

export class FakeQueue implements QueueClient {
  reachable = true;
  probeError: Error | null = null;
  enqueueError: Error | null = null;
  readonly enqueued: Array<{ payload: AnalysisJobPayload; taskId: string }> = [];
  probes = 0;

  async probe(): Promise<boolean> {
    this.probes += 1;
    if (this.probeError) {
      throw this.probeError;
    }
    return this.reachable;
  }

  async enqueue(payload: AnalysisJobPayload, taskId: string): Promise<string> {
    if (this.enqueueError) {
      throw this.enqueueError;
    }
    this.enqueued.push({ payload, taskId });
    return taskId;
  }

  async close(): Promise<void> {}
}

/**
 * Workspace over a fixed directory: "cloning" hands back that directory and
 * cleanup is only recorded.
 */
export class FixedWorkspace implements SourceWorkspace {
  readonly cloned: Array<{ repoUrl: string; branch: string }> = [];
  readonly cleaned: string[] = [];
  cloneError: Error | null = null;

  constructor(
    private readonly root: string,
    private readonly discover: (root: string) => Promise<string[]>,
  ) {}

  async clone(repoUrl: string, branch: string): Promise<string> {
    this.cloned.push({ repoUrl, branch });
    if (this.cloneError) {
      throw this.cloneError;
    }
    return this.root;
  }

  discoverFiles(repoPath: string): Promise<string[]> {
    return this.discover(repoPath);
  }

  async cleanup(repoPath: string): Promise<void> {
    this.cleaned.push(repoPath);
  }
}
