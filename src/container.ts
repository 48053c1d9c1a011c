import { AppConfig } from './config.js';
import { AnalysisService } from './services/analysis.js';
import { ChunkingService } from './services/chunking.js';
import { DatabaseService } from './services/database.js';
import { AnalysisDispatcher } from './services/dispatcher.js';
import { HttpEmbeddingModel, createLazyLoader } from './services/embedding-model.js';
import { EmbeddingService } from './services/embedding.js';
import { LlmService } from './services/llm.js';
import { AnalysisPipeline } from './services/pipeline.js';
import { QaEngine } from './services/qa-engine.js';
import { BullQueueClient } from './services/queue.js';
import { RepositoryService } from './services/repository.js';
import { VectorRetriever } from './services/retriever.js';

export interface Services {
  config: AppConfig;
  db: DatabaseService;
  queue: BullQueueClient;
  embedder: EmbeddingService;
  pipeline: AnalysisPipeline;
  dispatcher: AnalysisDispatcher;
  analysis: AnalysisService;
  qa: QaEngine;
}

/**
 * Builds the production object graph. Nothing connects until used; the
 * embedding model loads on the first embed call.
 */
export function createServices(config: AppConfig): Services {
  const db = new DatabaseService({
    connectionString: config.databaseUrl,
    embeddingDimension: config.embeddingDimension,
  });
  const queue = new BullQueueClient(config.redisUrl, config.queueName);

  const embedder = new EmbeddingService({
    loadModel: createLazyLoader(() =>
      HttpEmbeddingModel.load({
        apiUrl: config.embeddingApiUrl,
        model: config.embeddingModel,
        dimension: config.embeddingDimension,
      }),
    ),
    dimension: config.embeddingDimension,
    batchSize: config.embeddingBatchSize,
  });

  const pipeline = new AnalysisPipeline({
    store: db,
    workspace: new RepositoryService({ cloneDir: config.cloneDir, cloneTimeoutMs: config.cloneTimeoutMs }),
    chunker: new ChunkingService({ chunkSizeLines: config.chunkSizeLines }),
    embedder,
  });

  const dispatcher = new AnalysisDispatcher({
    store: db,
    queue,
    runLocal: (repositoryId, taskId) => pipeline.run(repositoryId, taskId),
    probeTimeoutMs: config.queueProbeTimeoutMs,
  });

  const qa = new QaEngine({
    store: db,
    embedder,
    retriever: new VectorRetriever(db),
    generator: new LlmService({
      baseUrl: config.ollamaBaseUrl,
      model: config.llmModel,
      timeoutMs: config.llmTimeoutMs,
    }),
  });

  return {
    config,
    db,
    queue,
    embedder,
    pipeline,
    dispatcher,
    analysis: new AnalysisService(db, dispatcher),
    qa,
  };
}
