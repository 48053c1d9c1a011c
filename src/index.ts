export * from './config.js';
export * from './errors.js';
export * from './app.js';
export * from './container.js';

export * from './models/analysis-job.js';
export * from './models/code-chunk.js';
export * from './models/question.js';
export * from './models/repository.js';

export * from './services/analysis.js';
export * from './services/chunking.js';
export * from './services/database.js';
export * from './services/dispatcher.js';
export * from './services/embedding-model.js';
export * from './services/embedding.js';
export * from './services/job-tracker.js';
export * from './services/languages.js';
export * from './services/llm.js';
export * from './services/pipeline.js';
export * from './services/qa-engine.js';
export * from './services/queue.js';
export * from './services/repository.js';
export * from './services/retriever.js';
export * from './services/store.js';
export * from './services/vector.js';
