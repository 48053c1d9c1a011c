export type ChunkType = 'function' | 'class' | 'block';

/** A chunk as produced by the chunking engine, before it is embedded or stored. */
export interface CodeChunkDraft {
  filePath: string;
  chunkText: string;
  chunkType: ChunkType;
  lineStart: number;
  lineEnd: number;
  language: string;
}

export interface NewCodeChunk extends CodeChunkDraft {
  embedding: number[] | null;
}

export interface CodeChunk extends NewCodeChunk {
  id: number;
  repositoryId: number;
  createdAt: Date;
}

export interface RetrievedChunk {
  chunk: CodeChunk;
  similarity: number;
}

export const CHUNK_TYPES: readonly ChunkType[] = ['function', 'class', 'block'];

export function isChunkType(value: unknown): value is ChunkType {
  return CHUNK_TYPES.some((type) => type === value);
}
