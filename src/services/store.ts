import { AnalysisJob, AnalysisJobPatch, NewAnalysisJob } from '../models/analysis-job.js';
import { ChunkType, NewCodeChunk, RetrievedChunk } from '../models/code-chunk.js';
import { NewQuestion, Question, QuestionUsage } from '../models/question.js';
import { NewRepository, Repository, RepositoryFilter, RepositoryPatch } from '../models/repository.js';

export interface Page<T> {
  total: number;
  items: T[];
}

export interface DeletedCounts {
  codeChunks: number;
  questions: number;
}

/**
 * Persistence seam for everything the pipeline and the QA engine touch.
 * `DatabaseService` is the PostgreSQL implementation.
 */
export interface AnalysisStore {
  createRepository(input: NewRepository): Promise<Repository>;
  getRepository(id: number): Promise<Repository | null>;
  findRepositoryByUrl(repoUrl: string): Promise<Repository | null>;
  listRepositories(filter: RepositoryFilter): Promise<Page<Repository>>;
  updateRepository(id: number, patch: RepositoryPatch): Promise<Repository | null>;
  /** Cascades to chunks, jobs and questions. Returns null when the repository does not exist. */
  deleteRepository(id: number): Promise<DeletedCounts | null>;

  createJob(input: NewAnalysisJob): Promise<AnalysisJob>;
  updateJob(id: number, patch: AnalysisJobPatch): Promise<AnalysisJob>;
  getLatestJob(repositoryId: number): Promise<AnalysisJob | null>;

  /** Drops every chunk of the repository and inserts the new set atomically. */
  replaceChunks(repositoryId: number, chunks: NewCodeChunk[]): Promise<number>;
  countChunks(repositoryId: number, chunkType?: ChunkType): Promise<number>;
  searchSimilarChunks(repositoryId: number, queryVector: number[], limit: number): Promise<RetrievedChunk[]>;

  createQuestion(input: NewQuestion): Promise<Question>;
  getQuestion(id: number): Promise<Question | null>;
  listQuestions(repositoryId: number, limit: number, offset: number): Promise<Page<Question>>;
  deleteQuestion(id: number): Promise<boolean>;
  getQuestionUsage(repositoryId: number): Promise<QuestionUsage>;

  ping(): Promise<boolean>;
}
