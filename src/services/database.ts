import { Pool, PoolClient, QueryResultRow } from 'pg';
import { AnalysisJob, AnalysisJobPatch, NewAnalysisJob, isJobStatus } from '../models/analysis-job.js';
import { ChunkType, CodeChunk, NewCodeChunk, RetrievedChunk, isChunkType } from '../models/code-chunk.js';
import { NewQuestion, Question, QuestionUsage, SourceCitation } from '../models/question.js';
import {
  NewRepository,
  Repository,
  RepositoryFilter,
  RepositoryPatch,
  isRepositoryStatus,
} from '../models/repository.js';
import { AnalysisStore, DeletedCounts, Page } from './store.js';
import { parseVector, rankBySimilarity, toSimilarity, toVectorLiteral } from './vector.js';

export interface DatabaseServiceOptions {
  connectionString: string;
  embeddingDimension: number;
}

interface RepositoryRow {
  id: number;
  name: string;
  repoUrl: string;
  branch: string;
  description: string | null;
  status: string;
  totalFiles: number;
  totalLines: number;
  languages: unknown;
  analyzedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

interface JobRow {
  id: number;
  repositoryId: number;
  status: string;
  taskId: string | null;
  progressPercentage: number;
  errorMessage: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

interface ChunkRow {
  id: number;
  repositoryId: number;
  filePath: string;
  chunkText: string;
  chunkType: string;
  lineStart: number;
  lineEnd: number;
  language: string;
  embedding: unknown;
  createdAt: Date;
}

interface QuestionRow {
  id: number;
  repositoryId: number;
  questionText: string;
  answerText: string | null;
  confidenceScore: number | null;
  sources: unknown;
  modelUsed: string | null;
  processingTimeMs: number | null;
  createdAt: Date;
}

const REPOSITORY_COLUMNS = `
  id, name, repo_url AS "repoUrl", branch, description, status,
  total_files AS "totalFiles", total_lines AS "totalLines", languages,
  analyzed_at AS "analyzedAt", created_at AS "createdAt", updated_at AS "updatedAt"`;

const JOB_COLUMNS = `
  id, repository_id AS "repositoryId", status, task_id AS "taskId",
  progress_percentage AS "progressPercentage", error_message AS "errorMessage",
  started_at AS "startedAt", completed_at AS "completedAt", created_at AS "createdAt"`;

const CHUNK_COLUMNS = `
  id, repository_id AS "repositoryId", file_path AS "filePath", chunk_text AS "chunkText",
  chunk_type AS "chunkType", line_start AS "lineStart", line_end AS "lineEnd", language,
  embedding, created_at AS "createdAt"`;

const QUESTION_COLUMNS = `
  id, repository_id AS "repositoryId", question_text AS "questionText", answer_text AS "answerText",
  confidence_score AS "confidenceScore", sources, model_used AS "modelUsed",
  processing_time_ms AS "processingTimeMs", created_at AS "createdAt"`;

function repositoryColumns(patch: RepositoryPatch): Array<[string, unknown]> {
  return [
    ['name', patch.name],
    ['branch', patch.branch],
    ['description', patch.description],
    ['status', patch.status],
    ['total_files', patch.totalFiles],
    ['total_lines', patch.totalLines],
    ['languages', patch.languages === undefined ? undefined : JSON.stringify(patch.languages)],
    ['analyzed_at', patch.analyzedAt],
  ];
}

function jobColumns(patch: AnalysisJobPatch): Array<[string, unknown]> {
  return [
    ['status', patch.status],
    ['task_id', patch.taskId],
    ['progress_percentage', patch.progressPercentage],
    ['error_message', patch.errorMessage],
    ['started_at', patch.startedAt],
    ['completed_at', patch.completedAt],
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLanguages(value: unknown): Record<string, number> {
  const languages: Record<string, number> = {};
  if (isRecord(value)) {
    for (const [language, count] of Object.entries(value)) {
      if (typeof count === 'number') {
        languages[language] = count;
      }
    }
  }
  return languages;
}

function toSources(value: unknown): SourceCitation[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map((source) => ({
    file: String(source.file ?? ''),
    lineStart: Number(source.lineStart ?? 0),
    lineEnd: Number(source.lineEnd ?? 0),
    relevance: Number(source.relevance ?? 0),
    snippet: String(source.snippet ?? ''),
  }));
}

function toRepository(row: RepositoryRow): Repository {
  if (!isRepositoryStatus(row.status)) {
    throw new Error(`Repository ${row.id} has unknown status "${row.status}"`);
  }
  return { ...row, status: row.status, languages: toLanguages(row.languages) };
}

function toJob(row: JobRow): AnalysisJob {
  if (!isJobStatus(row.status)) {
    throw new Error(`Analysis job ${row.id} has unknown status "${row.status}"`);
  }
  return { ...row, status: row.status };
}

function toChunk(row: ChunkRow): CodeChunk {
  if (!isChunkType(row.chunkType)) {
    throw new Error(`Code chunk ${row.id} has unknown type "${row.chunkType}"`);
  }
  return { ...row, chunkType: row.chunkType, embedding: parseVector(row.embedding) };
}

function toQuestion(row: QuestionRow): Question {
  return { ...row, sources: toSources(row.sources) };
}

/**
 * PostgreSQL store. Embeddings live in a pgvector column when the extension
 * is available and in JSONB otherwise; similarity search follows suit.
 */
export class DatabaseService implements AnalysisStore {
  private pool: Pool;
  private readonly embeddingDimension: number;
  private initialized: boolean = false;
  private vectorEnabled: boolean = false;

  constructor(options: DatabaseServiceOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
    });
    this.embeddingDimension = options.embeddingDimension;
  }

  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
      console.log('Connected to PostgreSQL');

      if (!this.initialized) {
        await this.initializeSchema();
        this.initialized = true;
      }
    } catch (error) {
      console.error('Failed to connect to PostgreSQL', error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    console.log('Disconnected from PostgreSQL');
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      console.warn('Database ping failed:', error);
      return false;
    }
  }

  private async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();

    try {
      try {
        const extensionCheck = await client.query(`SELECT 1 FROM pg_available_extensions WHERE name = 'vector'`);
        if (extensionCheck.rows.length > 0) {
          await client.query('CREATE EXTENSION IF NOT EXISTS vector');
          this.vectorEnabled = true;
          console.log('Vector extension enabled');
        } else {
          console.warn('Vector extension is not available. Similarity search will run in process.');
        }
      } catch (error) {
        console.warn('Could not enable vector extension, falling back to JSONB embeddings:', error);
        this.vectorEnabled = false;
      }

      await client.query(`
        CREATE TABLE IF NOT EXISTS repositories (
          id SERIAL PRIMARY KEY,
          name TEXT NOT NULL,
          repo_url TEXT NOT NULL UNIQUE,
          branch TEXT NOT NULL DEFAULT 'main',
          description TEXT,
          status TEXT NOT NULL DEFAULT 'pending',
          total_files INTEGER NOT NULL DEFAULT 0,
          total_lines INTEGER NOT NULL DEFAULT 0,
          languages JSONB NOT NULL DEFAULT '{}'::jsonb,
          analyzed_at TIMESTAMP WITH TIME ZONE,
          created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
          updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
        )
      `);

      await client.query(`
        CREATE TABLE IF NOT EXISTS analysis_jobs (
          id SERIAL PRIMARY KEY,
          repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
          status TEXT NOT NULL DEFAULT 'queued',
          task_id TEXT,
          progress_percentage INTEGER NOT NULL DEFAULT 0 CHECK (progress_percentage BETWEEN 0 AND 100),
          error_message TEXT,
          started_at TIMESTAMP WITH TIME ZONE,
          completed_at TIMESTAMP WITH TIME ZONE,
          created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
        )
      `);

      const embeddingType = this.vectorEnabled ? `vector(${this.embeddingDimension})` : 'JSONB';
      await client.query(`
        CREATE TABLE IF NOT EXISTS code_chunks (
          id SERIAL PRIMARY KEY,
          repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
          file_path TEXT NOT NULL,
          chunk_text TEXT NOT NULL,
          chunk_type TEXT NOT NULL,
          line_start INTEGER NOT NULL,
          line_end INTEGER NOT NULL,
          language TEXT NOT NULL,
          embedding ${embeddingType},
          created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
          CHECK (line_start <= line_end)
        )
      `);

      await client.query(`
        CREATE TABLE IF NOT EXISTS questions (
          id SERIAL PRIMARY KEY,
          repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
          question_text TEXT NOT NULL,
          answer_text TEXT,
          confidence_score DOUBLE PRECISION,
          sources JSONB NOT NULL DEFAULT '[]'::jsonb,
          model_used TEXT,
          processing_time_ms INTEGER,
          created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
        )
      `);

      // The table may predate the extension; trust the column type that is actually there.
      const columnType = await client.query<{ dataType: string }>(`
        SELECT udt_name AS "dataType"
        FROM information_schema.columns
        WHERE table_name = 'code_chunks' AND column_name = 'embedding'
      `);
      this.vectorEnabled = columnType.rows[0]?.dataType === 'vector';

      await client.query('CREATE INDEX IF NOT EXISTS idx_repositories_status ON repositories(status)');
      await client.query('CREATE INDEX IF NOT EXISTS idx_analysis_jobs_repository_id ON analysis_jobs(repository_id)');
      await client.query('CREATE INDEX IF NOT EXISTS idx_code_chunks_repository_id ON code_chunks(repository_id)');
      await client.query('CREATE INDEX IF NOT EXISTS idx_questions_repository_id ON questions(repository_id)');

      console.log('Database schema initialized');
    } catch (error) {
      console.error('Failed to initialize database schema:', error);
      throw error;
    } finally {
      client.release();
    }
  }

  private async query<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R[]> {
    const result = await this.pool.query<R>(sql, params);
    return result.rows;
  }

  private async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private buildSet(columns: Array<[string, unknown]>, params: unknown[]): string[] {
    const assignments: string[] = [];
    for (const [column, value] of columns) {
      if (value === undefined) {
        continue;
      }
      params.push(value);
      assignments.push(`${column} = $${params.length}`);
    }
    return assignments;
  }

  // ── Repositories ─────────────────────────────────────

  async createRepository(input: NewRepository): Promise<Repository> {
    const [row] = await this.query<RepositoryRow>(
      `INSERT INTO repositories (name, repo_url, branch, description, status)
       VALUES ($1, $2, $3, $4, 'pending')
       RETURNING ${REPOSITORY_COLUMNS}`,
      [input.name, input.repoUrl, input.branch, input.description],
    );
    if (!row) {
      throw new Error('Repository insert returned no row');
    }
    return toRepository(row);
  }

  async getRepository(id: number): Promise<Repository | null> {
    const [row] = await this.query<RepositoryRow>(`SELECT ${REPOSITORY_COLUMNS} FROM repositories WHERE id = $1`, [id]);
    return row ? toRepository(row) : null;
  }

  async findRepositoryByUrl(repoUrl: string): Promise<Repository | null> {
    const [row] = await this.query<RepositoryRow>(
      `SELECT ${REPOSITORY_COLUMNS} FROM repositories WHERE repo_url = $1`,
      [repoUrl],
    );
    return row ? toRepository(row) : null;
  }

  async listRepositories(filter: RepositoryFilter): Promise<Page<Repository>> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.status) {
      params.push(filter.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filter.search) {
      params.push(`%${filter.search}%`);
      conditions.push(`(name ILIKE $${params.length} OR repo_url ILIKE $${params.length})`);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const [count] = await this.query<{ total: number }>(
      `SELECT COUNT(*)::int AS total FROM repositories ${where}`,
      params,
    );
    const rows = await this.query<RepositoryRow>(
      `SELECT ${REPOSITORY_COLUMNS} FROM repositories ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, filter.limit, filter.offset],
    );

    return { total: count?.total ?? 0, items: rows.map(toRepository) };
  }

  async updateRepository(id: number, patch: RepositoryPatch): Promise<Repository | null> {
    const params: unknown[] = [];
    const assignments = this.buildSet(repositoryColumns(patch), params);
    assignments.push('updated_at = NOW()');
    params.push(id);

    const [row] = await this.query<RepositoryRow>(
      `UPDATE repositories SET ${assignments.join(', ')} WHERE id = $${params.length} RETURNING ${REPOSITORY_COLUMNS}`,
      params,
    );
    return row ? toRepository(row) : null;
  }

  async deleteRepository(id: number): Promise<DeletedCounts | null> {
    return this.transaction(async (client) => {
      const counts = await client.query<{ codeChunks: number; questions: number }>(
        `SELECT
           (SELECT COUNT(*)::int FROM code_chunks WHERE repository_id = $1) AS "codeChunks",
           (SELECT COUNT(*)::int FROM questions WHERE repository_id = $1) AS "questions"`,
        [id],
      );
      const deleted = await client.query('DELETE FROM repositories WHERE id = $1', [id]);
      if (deleted.rowCount === 0) {
        return null;
      }
      return counts.rows[0] ?? { codeChunks: 0, questions: 0 };
    });
  }

  // ── Analysis jobs ────────────────────────────────────

  async createJob(input: NewAnalysisJob): Promise<AnalysisJob> {
    const [row] = await this.query<JobRow>(
      `INSERT INTO analysis_jobs (repository_id, status, task_id, progress_percentage, started_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${JOB_COLUMNS}`,
      [input.repositoryId, input.status, input.taskId, input.progressPercentage, input.startedAt],
    );
    if (!row) {
      throw new Error('Analysis job insert returned no row');
    }
    return toJob(row);
  }

  async updateJob(id: number, patch: AnalysisJobPatch): Promise<AnalysisJob> {
    const params: unknown[] = [];
    const assignments = this.buildSet(jobColumns(patch), params);
    params.push(id);

    const sql =
      assignments.length > 0
        ? `UPDATE analysis_jobs SET ${assignments.join(', ')} WHERE id = $${params.length} RETURNING ${JOB_COLUMNS}`
        : `SELECT ${JOB_COLUMNS} FROM analysis_jobs WHERE id = $${params.length}`;
    const [row] = await this.query<JobRow>(sql, params);
    if (!row) {
      throw new Error(`Analysis job ${id} not found`);
    }
    return toJob(row);
  }

  async getLatestJob(repositoryId: number): Promise<AnalysisJob | null> {
    const [row] = await this.query<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM analysis_jobs
       WHERE repository_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT 1`,
      [repositoryId],
    );
    return row ? toJob(row) : null;
  }

  // ── Code chunks ──────────────────────────────────────

  async replaceChunks(repositoryId: number, chunks: NewCodeChunk[]): Promise<number> {
    const embeddingParam = this.vectorEnabled ? '$8::vector' : '$8::jsonb';

    return this.transaction(async (client) => {
      await client.query('DELETE FROM code_chunks WHERE repository_id = $1', [repositoryId]);

      for (const chunk of chunks) {
        const embedding =
          chunk.embedding === null
            ? null
            : this.vectorEnabled
              ? toVectorLiteral(chunk.embedding)
              : JSON.stringify(chunk.embedding);

        await client.query(
          `INSERT INTO code_chunks (
             repository_id, file_path, chunk_text, chunk_type, line_start, line_end, language, embedding
           )
           VALUES ($1, $2, $3, $4, $5, $6, $7, ${embeddingParam})`,
          [
            repositoryId,
            chunk.filePath,
            chunk.chunkText,
            chunk.chunkType,
            chunk.lineStart,
            chunk.lineEnd,
            chunk.language,
            embedding,
          ],
        );
      }

      console.log(`Stored ${chunks.length} chunks for repository ${repositoryId}`);
      return chunks.length;
    });
  }

  async countChunks(repositoryId: number, chunkType?: ChunkType): Promise<number> {
    const params: unknown[] = [repositoryId];
    let sql = 'SELECT COUNT(*)::int AS total FROM code_chunks WHERE repository_id = $1';
    if (chunkType) {
      params.push(chunkType);
      sql += ' AND chunk_type = $2';
    }
    const [row] = await this.query<{ total: number }>(sql, params);
    return row?.total ?? 0;
  }

  async searchSimilarChunks(repositoryId: number, queryVector: number[], limit: number): Promise<RetrievedChunk[]> {
    if (this.vectorEnabled) {
      const rows = await this.query<ChunkRow & { similarity: number | string }>(
        `SELECT ${CHUNK_COLUMNS}, 1 - (embedding <=> $1::vector) AS similarity
         FROM code_chunks
         WHERE repository_id = $2 AND embedding IS NOT NULL
         ORDER BY embedding <=> $1::vector, id
         LIMIT $3`,
        [toVectorLiteral(queryVector), repositoryId, limit],
      );
      return rows.map(({ similarity, ...row }) => ({ chunk: toChunk(row), similarity: toSimilarity(similarity) }));
    }

    const rows = await this.query<ChunkRow>(
      `SELECT ${CHUNK_COLUMNS} FROM code_chunks WHERE repository_id = $1 AND embedding IS NOT NULL`,
      [repositoryId],
    );
    return rankBySimilarity(rows.map(toChunk), queryVector, limit);
  }

  // ── Questions ────────────────────────────────────────

  async createQuestion(input: NewQuestion): Promise<Question> {
    const [row] = await this.query<QuestionRow>(
      `INSERT INTO questions (
         repository_id, question_text, answer_text, confidence_score, sources, model_used, processing_time_ms
       )
       VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)
       RETURNING ${QUESTION_COLUMNS}`,
      [
        input.repositoryId,
        input.questionText,
        input.answerText,
        input.confidenceScore,
        JSON.stringify(input.sources),
        input.modelUsed,
        input.processingTimeMs,
      ],
    );
    if (!row) {
      throw new Error('Question insert returned no row');
    }
    return toQuestion(row);
  }

  async getQuestion(id: number): Promise<Question | null> {
    const [row] = await this.query<QuestionRow>(`SELECT ${QUESTION_COLUMNS} FROM questions WHERE id = $1`, [id]);
    return row ? toQuestion(row) : null;
  }

  async listQuestions(repositoryId: number, limit: number, offset: number): Promise<Page<Question>> {
    const [count] = await this.query<{ total: number }>(
      'SELECT COUNT(*)::int AS total FROM questions WHERE repository_id = $1',
      [repositoryId],
    );
    const rows = await this.query<QuestionRow>(
      `SELECT ${QUESTION_COLUMNS} FROM questions
       WHERE repository_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2 OFFSET $3`,
      [repositoryId, limit, offset],
    );
    return { total: count?.total ?? 0, items: rows.map(toQuestion) };
  }

  async deleteQuestion(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM questions WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async getQuestionUsage(repositoryId: number): Promise<QuestionUsage> {
    const [row] = await this.query<{ total: number; average: number | null }>(
      `SELECT COUNT(*)::int AS total, AVG(processing_time_ms)::float8 AS average
       FROM questions WHERE repository_id = $1`,
      [repositoryId],
    );
    return { totalQuestions: row?.total ?? 0, averageResponseTimeMs: row?.average ?? null };
  }
}
