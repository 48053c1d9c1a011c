import { Request, Response } from 'express';
import { ValidationError } from '../errors.js';
import { RepositoryFilter, isRepositoryStatus } from '../models/repository.js';
import { AnalysisService, UpdateRepositoryInput } from '../services/analysis.js';
import { deferAfterResponse, optionalString, parseId, parsePagination, readBody, sendError } from './http.js';

/**
 * Repository endpoints: submission, listing, updates, deletion and the
 * analysis status and statistics reads.
 */
export class RepositoryController {
  constructor(private readonly analysis: AnalysisService) {}

  /**
   * Register a repository and start its analysis. Answers 202 before the
   * analysis has run unless no queue is available and no deferral applies.
   */
  createRepository = async (req: Request, res: Response): Promise<void> => {
    try {
      const body = readBody(req);
      const repoUrl = optionalString(body, 'repoUrl');

      if (!repoUrl) {
        res.status(400).json({ error: 'Repository URL is required' });
        return;
      }

      console.log(`Submitting repository ${repoUrl}`);
      const result = await this.analysis.submit(
        {
          repoUrl,
          branch: optionalString(body, 'branch'),
          name: optionalString(body, 'name'),
          description: optionalString(body, 'description'),
        },
        deferAfterResponse(res),
      );

      res.status(202).json(result);
    } catch (error) {
      sendError(res, error, 'submitting repository');
    }
  };

  listRepositories = async (req: Request, res: Response): Promise<void> => {
    try {
      const filter: RepositoryFilter = parsePagination(req);

      const { status, search } = req.query;
      if (status !== undefined) {
        if (!isRepositoryStatus(status)) {
          throw new ValidationError('Unknown repository status', { status });
        }
        filter.status = status;
      }
      if (typeof search === 'string' && search.trim()) {
        filter.search = search.trim();
      }

      const page = await this.analysis.list(filter);
      res.status(200).json({ ...page, limit: filter.limit, offset: filter.offset });
    } catch (error) {
      sendError(res, error, 'listing repositories');
    }
  };

  getRepository = async (req: Request, res: Response): Promise<void> => {
    try {
      const repository = await this.analysis.get(parseId(req));
      res.status(200).json(repository);
    } catch (error) {
      sendError(res, error, 'getting repository');
    }
  };

  updateRepository = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req);
      const body = readBody(req);

      const action = optionalString(body, 'action');
      if (action !== undefined && action !== 'reanalyze') {
        throw new ValidationError('Unknown action', { action });
      }

      const input: UpdateRepositoryInput = {
        name: optionalString(body, 'name'),
        branch: optionalString(body, 'branch'),
        description: optionalString(body, 'description'),
        action,
      };

      const result = await this.analysis.update(id, input, deferAfterResponse(res));
      res.status(action === 'reanalyze' ? 202 : 200).json(result);
    } catch (error) {
      sendError(res, error, 'updating repository');
    }
  };

  deleteRepository = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req);
      const deleted = await this.analysis.remove(id);
      res.status(200).json({
        message: 'Repository deleted',
        repositoryId: id,
        deletedCodeChunks: deleted.codeChunks,
        deletedQuestions: deleted.questions,
      });
    } catch (error) {
      sendError(res, error, 'deleting repository');
    }
  };

  getAnalysisStatus = async (req: Request, res: Response): Promise<void> => {
    try {
      const job = await this.analysis.getStatus(parseId(req));
      res.status(200).json(job);
    } catch (error) {
      sendError(res, error, 'getting analysis status');
    }
  };

  getStatistics = async (req: Request, res: Response): Promise<void> => {
    try {
      const statistics = await this.analysis.getStatistics(parseId(req));
      res.status(200).json(statistics);
    } catch (error) {
      sendError(res, error, 'getting repository statistics');
    }
  };
}
