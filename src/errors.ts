// src/errors.ts
// What: Typed application errors.
// How: Each error carries a stable code; errors the HTTP API surfaces also carry a status used by the
//      centralized error handler in app.ts. Embedding failures are not errors: they surface as null vectors.

export type AppErrorCode =
  | 'CONFIGURATION'
  | 'SOURCE_NOT_FOUND'
  | 'GENERATION_FAILED'
  | 'INVALID_ANSWER'
  | 'SESSION_BUSY'
  | 'SESSION_NOT_FOUND';

export class AppError extends Error {
  code: AppErrorCode;
  status: number;
  constructor(code: AppErrorCode, message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }
}

/** Invalid chunking parameters, missing credentials or an unparseable environment. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

export class SourceNotFoundError extends AppError {
  path: string;
  constructor(path: string, cause?: unknown) {
    super('SOURCE_NOT_FOUND', `Source text not found: ${path}`, 500, { cause });
    this.name = 'SourceNotFoundError';
    this.path = path;
  }
}

export class GenerationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FAILED', message, 502, { cause });
    this.name = 'GenerationError';
  }
}

export class InvalidAnswerError extends AppError {
  constructor(message = 'Answer must not be empty') {
    super('INVALID_ANSWER', message, 400);
    this.name = 'InvalidAnswerError';
  }
}

export class SessionBusyError extends AppError {
  constructor() {
    super('SESSION_BUSY', 'A submission is already in progress for this session', 409);
    this.name = 'SessionBusyError';
  }
}

export class SessionNotFoundError extends AppError {
  constructor(id: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${id}`, 404);
    this.name = 'SessionNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}
