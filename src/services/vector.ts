import { CodeChunk, RetrievedChunk } from '../models/code-chunk.js';

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function l2Norm(vector: number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/** Scales to unit length. A zero vector has no direction and is returned unchanged. */
export function normalize(vector: number[]): number[] {
  const norm = l2Norm(vector);
  if (norm === 0) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

/**
 * In-process nearest-neighbour ranking: descending similarity, ties broken by
 * the lower chunk id. Chunks without an embedding are never returned.
 */
export function rankBySimilarity(chunks: CodeChunk[], queryVector: number[], limit: number): RetrievedChunk[] {
  const results: RetrievedChunk[] = [];
  for (const chunk of chunks) {
    if (chunk.embedding === null) {
      continue;
    }
    results.push({ chunk, similarity: cosineSimilarity(queryVector, chunk.embedding) });
  }

  results.sort((a, b) => b.similarity - a.similarity || a.chunk.id - b.chunk.id);
  return results.slice(0, Math.max(0, limit));
}

/**
 * Similarity read back from the database. pgvector answers NaN for a zero
 * vector, which is scored as 0 like `cosineSimilarity` does.
 */
export function toSimilarity(value: unknown): number {
  const similarity = Number(value);
  return Number.isFinite(similarity) ? similarity : 0;
}

/** pgvector's text format: `[0.1,0.2,...]`. */
export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`;
}

export function parseVector(value: unknown): number[] | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return parseVector(JSON.parse(value));
  }
  if (Array.isArray(value)) {
    return value.map((item) => Number(item));
  }
  return null;
}
