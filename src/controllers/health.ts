import { Request, Response } from 'express';
import { QueueClient } from '../services/queue.js';
import { AnalysisStore } from '../services/store.js';
import { sendError } from './http.js';

export class HealthController {
  constructor(
    private readonly store: AnalysisStore,
    private readonly queue: QueueClient,
    private readonly probeTimeoutMs: number,
  ) {}

  checkHealth = async (req: Request, res: Response): Promise<void> => {
    try {
      const [database, queue] = await Promise.all([
        this.store.ping(),
        this.queue.probe(this.probeTimeoutMs).catch((error: unknown) => {
          console.warn('Queue health probe failed:', error);
          return false;
        }),
      ]);

      res.status(200).json({
        status: database && queue ? 'healthy' : 'degraded',
        database: database ? 'up' : 'down',
        queue: queue ? 'up' : 'down',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      sendError(res, error, 'checking health');
    }
  };
}
