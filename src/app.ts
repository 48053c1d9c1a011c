import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { HealthController } from './controllers/health.js';
import { QuestionController } from './controllers/question.js';
import { RepositoryController } from './controllers/repository.js';
import { sendError } from './controllers/http.js';
import { AnalysisService } from './services/analysis.js';
import { QaEngine } from './services/qa-engine.js';
import { QueueClient } from './services/queue.js';
import { AnalysisStore } from './services/store.js';

export interface AppDependencies {
  store: AnalysisStore;
  queue: QueueClient;
  analysis: AnalysisService;
  qa: QaEngine;
  queueProbeTimeoutMs: number;
  /** Set to false to silence request logging, e.g. in tests. */
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  const health = new HealthController(deps.store, deps.queue, deps.queueProbeTimeoutMs);
  const repositories = new RepositoryController(deps.analysis);
  const questions = new QuestionController(deps.store, deps.qa);

  // Middleware
  if (deps.requestLogging !== false) {
    app.use(morgan('dev'));
  }
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', health.checkHealth);

  // Repositories
  app.post('/repositories', repositories.createRepository);
  app.get('/repositories', repositories.listRepositories);
  app.get('/repositories/:id', repositories.getRepository);
  app.put('/repositories/:id', repositories.updateRepository);
  app.delete('/repositories/:id', repositories.deleteRepository);
  app.get('/repositories/:id/analysis', repositories.getAnalysisStatus);
  app.get('/repositories/:id/statistics', repositories.getStatistics);

  // Questions
  app.post('/repositories/:id/questions', questions.askQuestion);
  app.get('/repositories/:id/questions', questions.listQuestions);
  app.get('/questions/:id', questions.getQuestion);
  app.delete('/questions/:id', questions.deleteQuestion);

  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
  });

  // Error handling middleware
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    sendError(res, err, `handling ${req.method} ${req.path}`);
  });

  return app;
}
