import { performance } from 'perf_hooks';
import { RepositoryNotReadyError, NotFoundError } from '../errors.js';
import { RetrievedChunk } from '../models/code-chunk.js';
import { Question, SourceCitation } from '../models/question.js';
import { EmbeddingService } from './embedding.js';
import { TextGenerator } from './llm.js';
import { VectorRetriever } from './retriever.js';
import { AnalysisStore } from './store.js';

export const DEFAULT_TOP_K = 5;
export const NO_RELEVANT_CODE_MESSAGE = "I couldn't find relevant code in this repository to answer your question.";
export const GENERATION_FAILED_PLACEHOLDER = 'LLM generation failed.';
const SNIPPET_LENGTH = 200;

export interface AnswerResult {
  answerText: string | null;
  confidence: number;
  sources: SourceCitation[];
  modelUsed: string;
  processingTimeMs: number;
  degraded: boolean;
}

export interface AskResult {
  question: Question;
  degraded: boolean;
}

export interface QaEngineOptions {
  store: AnalysisStore;
  embedder: EmbeddingService;
  retriever: VectorRetriever;
  generator: TextGenerator;
  topK?: number;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function buildContext(chunks: RetrievedChunk[]): string {
  return chunks
    .map(
      ({ chunk }, index) =>
        `--- Source ${index + 1}: ${chunk.filePath} (lines ${chunk.lineStart}-${chunk.lineEnd}) ---\n${chunk.chunkText}\n`,
    )
    .join('\n');
}

export function buildPrompt(question: string, context: string): string {
  return `You are an expert code analyst. Answer the following question about a codebase using ONLY the provided source code context.
Be specific, and reference file names and line numbers when relevant.

CONTEXT:
${context}

QUESTION: ${question}

ANSWER:`;
}

export function toSources(chunks: RetrievedChunk[]): SourceCitation[] {
  return chunks.map(({ chunk, similarity }) => ({
    file: chunk.filePath,
    lineStart: chunk.lineStart,
    lineEnd: chunk.lineEnd,
    relevance: round3(similarity),
    snippet: chunk.chunkText.slice(0, SNIPPET_LENGTH),
  }));
}

/**
 * Retrieval-augmented question answering over an analysed repository:
 * question → embedding → retrieval → prompt → generation.
 */
export class QaEngine {
  private readonly store: AnalysisStore;
  private readonly embedder: EmbeddingService;
  private readonly retriever: VectorRetriever;
  private readonly generator: TextGenerator;
  private readonly topK: number;

  constructor(options: QaEngineOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.retriever = options.retriever;
    this.generator = options.generator;
    this.topK = options.topK ?? DEFAULT_TOP_K;
  }

  async answer(question: string, repositoryId: number): Promise<AnswerResult> {
    const start = performance.now();
    const elapsed = () => Math.round(performance.now() - start);

    const queryVector = await this.embedder.embed(question);
    const chunks = await this.retriever.retrieve(repositoryId, queryVector, this.topK);

    if (chunks.length === 0) {
      return {
        answerText: NO_RELEVANT_CODE_MESSAGE,
        confidence: 0,
        sources: [],
        modelUsed: 'none',
        processingTimeMs: elapsed(),
        degraded: false,
      };
    }

    const prompt = buildPrompt(question, buildContext(chunks));
    const generation = await this.generator.generate(prompt);
    if (generation.status === 'unavailable') {
      console.warn(`Answering without generation for repository ${repositoryId} (${generation.reason}): ${generation.message}`);
    }

    // Confidence tracks retrieval quality whether or not generation worked.
    const confidence = round3(Math.max(...chunks.map((result) => result.similarity)));

    return {
      answerText: generation.status === 'ok' ? generation.text : null,
      confidence,
      sources: toSources(chunks),
      modelUsed: this.generator.model,
      processingTimeMs: elapsed(),
      degraded: generation.status === 'unavailable',
    };
  }

  /**
   * Answer a question for a ready repository and record the attempt, degraded or not.
   */
  async ask(repositoryId: number, questionText: string): Promise<AskResult> {
    const repository = await this.store.getRepository(repositoryId);
    if (!repository) {
      throw new NotFoundError('Repository', { repository_id: repositoryId });
    }
    if (repository.status !== 'ready') {
      throw new RepositoryNotReadyError(repositoryId, repository.status);
    }

    const result = await this.answer(questionText, repositoryId);
    const question = await this.store.createQuestion({
      repositoryId,
      questionText,
      answerText: result.answerText ?? GENERATION_FAILED_PLACEHOLDER,
      confidenceScore: result.confidence,
      sources: result.sources,
      modelUsed: result.modelUsed,
      processingTimeMs: result.processingTimeMs,
    });

    return { question, degraded: result.degraded };
  }
}
