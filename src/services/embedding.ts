import { EmbeddingModel, ModelLoader } from './embedding-model.js';
import { normalize } from './vector.js';

export const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

export interface EmbeddingServiceOptions {
  loadModel: ModelLoader<EmbeddingModel>;
  dimension: number;
  batchSize?: number;
}

export class EmbeddingService {
  readonly dimension: number;
  private readonly loadModel: ModelLoader<EmbeddingModel>;
  private readonly batchSize: number;

  constructor(options: EmbeddingServiceOptions) {
    this.loadModel = options.loadModel;
    this.dimension = options.dimension;
    this.batchSize = options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;
  }

  /**
   * Generate a single unit-length embedding
   */
  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error('Embedding model returned no vector');
    }
    return vector;
  }

  /**
   * Generate embeddings in fixed-size batches; output order matches input order.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const model = await this.loadModel();
    const totalBatches = Math.ceil(texts.length / this.batchSize);
    console.log(`Generating embeddings for ${texts.length} texts`);

    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const vectors = await model.encode(batch);

      if (vectors.length !== batch.length) {
        throw new Error(`Embedding count mismatch: expected ${batch.length}, received ${vectors.length}`);
      }
      for (const vector of vectors) {
        if (vector.length !== this.dimension) {
          throw new Error(`Embedding dimension mismatch: expected ${this.dimension}, received ${vector.length}`);
        }
        embeddings.push(normalize(vector));
      }

      console.log(`Embedded batch ${i / this.batchSize + 1} of ${totalBatches}`);
    }

    return embeddings;
  }
}
