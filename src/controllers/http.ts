import { Request, Response } from 'express';
import { AppError, ValidationError } from '../errors.js';
import { Defer } from '../services/dispatcher.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * Map an error to a JSON response: application errors keep their status and
 * details, anything else is logged and reported as a 500.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`Error ${context}:`, error);
    }
    res.status(error.statusCode).json({ error: error.message, ...error.details });
    return;
  }

  console.error(`Error ${context}:`, error);
  res.status(500).json({ error: 'Internal server error' });
}

export function parseId(req: Request, param: string = 'id'): number {
  const raw = req.params[param];
  const id = Number(raw);
  if (!raw || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${param}`, { [param]: raw });
  }
  return id;
}

function readQueryInt(req: Request, name: string, fallback: number): number {
  const raw = req.query[name];
  if (raw === undefined) {
    return fallback;
  }
  const value = typeof raw === 'string' ? Number(raw) : Number.NaN;
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`, { [name]: raw });
  }
  return value;
}

export function parsePagination(req: Request): { limit: number; offset: number } {
  const limit = readQueryInt(req, 'limit', DEFAULT_PAGE_SIZE);
  const offset = readQueryInt(req, 'offset', 0);
  if (limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new ValidationError(`limit must be between 1 and ${MAX_PAGE_SIZE}`, { limit });
  }
  if (offset < 0) {
    throw new ValidationError('offset must not be negative', { offset });
  }
  return { limit, offset };
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

export interface ResponseLifecycle {
  once(event: 'finish' | 'close', listener: () => void): unknown;
}

/**
 * Runs the task once the response has been flushed, so a request that falls
 * back to in-process analysis still answers immediately. A client that hangs
 * up early only fires `close`, and the task must still run exactly once.
 */
export function deferAfterResponse(res: ResponseLifecycle): Defer {
  return (task) => {
    let started = false;
    const start = (): void => {
      if (started) {
        return;
      }
      started = true;
      void task();
    };
    res.once('finish', start);
    res.once('close', start);
  };
}
