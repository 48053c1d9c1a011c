/**
 * Error taxonomy shared by the services and the HTTP layer.
 *
 * Unavailable collaborators (queue, generation backend) are not represented
 * here: they are absorbed by the dispatcher and the QA engine.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(message: string, statusCode: number, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, details: Record<string, unknown> = {}) {
    super(`${entity} not found`, 404, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 409, details);
  }
}

export class RepositoryNotReadyError extends AppError {
  constructor(repositoryId: number, status: string) {
    super('Repository not ready for questions', 400, {
      repository_id: repositoryId,
      status,
      message: 'Please wait for analysis to complete',
    });
  }
}

/** Fatal to a single pipeline run. */
export class PipelineFailure extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500);
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
