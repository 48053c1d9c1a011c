import { Request, Response } from 'express';
import { NotFoundError } from '../errors.js';
import { QaEngine } from '../services/qa-engine.js';
import { AnalysisStore } from '../services/store.js';
import { optionalString, parseId, parsePagination, readBody, sendError } from './http.js';

export class QuestionController {
  constructor(
    private readonly store: AnalysisStore,
    private readonly qa: QaEngine,
  ) {}

  /**
   * Answer a question about a ready repository. The attempt is stored even
   * when generation is unavailable; that case answers 503 with the sources.
   */
  askQuestion = async (req: Request, res: Response): Promise<void> => {
    try {
      const repositoryId = parseId(req);
      const question = optionalString(readBody(req), 'question')?.trim();

      if (!question) {
        res.status(400).json({ error: 'Question is required' });
        return;
      }

      console.log(`Answering question for repository ${repositoryId}: ${question}`);
      const result = await this.qa.ask(repositoryId, question);

      if (result.degraded) {
        res.status(503).json({
          error: 'Answer generation is unavailable',
          question: result.question,
          sources: result.question.sources,
        });
        return;
      }

      res.status(200).json(result.question);
    } catch (error) {
      sendError(res, error, 'answering question');
    }
  };

  listQuestions = async (req: Request, res: Response): Promise<void> => {
    try {
      const repositoryId = parseId(req);
      const { limit, offset } = parsePagination(req);

      if (!(await this.store.getRepository(repositoryId))) {
        throw new NotFoundError('Repository', { repository_id: repositoryId });
      }

      const page = await this.store.listQuestions(repositoryId, limit, offset);
      res.status(200).json({ ...page, limit, offset });
    } catch (error) {
      sendError(res, error, 'listing questions');
    }
  };

  getQuestion = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req);
      const question = await this.store.getQuestion(id);
      if (!question) {
        throw new NotFoundError('Question', { question_id: id });
      }
      res.status(200).json(question);
    } catch (error) {
      sendError(res, error, 'getting question');
    }
  };

  deleteQuestion = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = parseId(req);
      if (!(await this.store.deleteQuestion(id))) {
        throw new NotFoundError('Question', { question_id: id });
      }
      res.status(200).json({ message: 'Question deleted', questionId: id });
    } catch (error) {
      sendError(res, error, 'deleting question');
    }
  };
}
