import axios, { AxiosInstance } from 'axios';

/**
 * A loaded embedding model. `encode` returns one raw (not yet normalized)
 * vector per input, in input order.
 */
export interface EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  encode(texts: string[]): Promise<number[][]>;
}

export type ModelLoader<T> = () => Promise<T>;

/**
 * Wraps an expensive loader so it runs at most once per process. Concurrent
 * first callers share the same in-flight promise; a rejected load is forgotten
 * so a later call can retry.
 */
export function createLazyLoader<T>(load: ModelLoader<T>): ModelLoader<T> {
  let pending: Promise<T> | null = null;

  return () => {
    if (!pending) {
      pending = load().catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };
}

export interface HttpEmbeddingModelOptions {
  apiUrl: string;
  model: string;
  dimension: number;
  timeoutMs?: number;
}

interface EmbeddingResponse {
  data?: Array<{ index?: number; embedding?: number[] }>;
}

/**
 * Client for an OpenAI-compatible `/embeddings` endpoint.
 */
export class HttpEmbeddingModel implements EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  private readonly api: AxiosInstance;

  private constructor(options: HttpEmbeddingModelOptions) {
    this.name = options.model;
    this.dimension = options.dimension;
    this.api = axios.create({
      baseURL: options.apiUrl,
      timeout: options.timeoutMs ?? 120_000,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  /**
   * Connects and runs one warm-up request, which also makes the server load
   * the model and lets us check the advertised dimension.
   */
  static async load(options: HttpEmbeddingModelOptions): Promise<HttpEmbeddingModel> {
    console.log(`Loading embedding model: ${options.model}`);
    const model = new HttpEmbeddingModel(options);
    const [probe] = await model.encode(['warm-up']);
    if (!probe || probe.length !== options.dimension) {
      throw new Error(
        `Embedding model ${options.model} returned dimension ${probe?.length ?? 0}, expected ${options.dimension}`,
      );
    }
    console.log('Embedding model loaded successfully');
    return model;
  }

  async encode(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.api.post<EmbeddingResponse>('', {
      model: this.name,
      input: texts,
    });

    const rows = response.data.data;
    if (!Array.isArray(rows) || rows.length !== texts.length) {
      throw new Error(`Embedding API returned ${Array.isArray(rows) ? rows.length : 0} vectors for ${texts.length} inputs`);
    }

    const ordered: Array<number[] | undefined> = Array.from({ length: texts.length }, () => undefined);
    rows.forEach((row, position) => {
      ordered[typeof row.index === 'number' ? row.index : position] = row.embedding;
    });

    return ordered.map((vector, index) => {
      if (!Array.isArray(vector)) {
        throw new Error(`Embedding API response is missing the vector for input ${index}`);
      }
      return vector;
    });
  }
}
