import { RetrievedChunk } from '../models/code-chunk.js';
import { AnalysisStore } from './store.js';

export class VectorRetriever {
  constructor(private readonly store: AnalysisStore) {}

  /**
   * Top-k embedded chunks of one repository by cosine similarity, most
   * similar first. An empty result is a normal outcome.
   */
  async retrieve(repositoryId: number, queryVector: number[], k: number): Promise<RetrievedChunk[]> {
    if (k <= 0) {
      return [];
    }
    const results = await this.store.searchSimilarChunks(repositoryId, queryVector, k);
    return [...results].sort((a, b) => b.similarity - a.similarity || a.chunk.id - b.chunk.id);
  }
}
