// packages/game-core/src/errors.ts
//
// Error taxonomy shared by the game logic and the HTTP server.
//
// Every error thrown on purpose is a GameError carrying a stable `code` and
// the HTTP status the server should answer with. Anything else reaching the
// server is treated as an internal fault and never shown to players.

import type { ZodError } from 'zod';

export const ErrorCodes = {
  // Data
  DATA_UNAVAILABLE: 'DATA_UNAVAILABLE',
  INSUFFICIENT_DATA: 'INSUFFICIENT_DATA',
  POOL_EXHAUSTED: 'POOL_EXHAUSTED',

  // Requests
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  FORBIDDEN: 'FORBIDDEN',

  // Optional features
  AI_DISABLED: 'AI_DISABLED',
  AI_UNAVAILABLE: 'AI_UNAVAILABLE',

  // Server
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class GameError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 400,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

/** The player table is missing, corrupt or empty. Fatal at startup. */
export class DataUnavailableError extends GameError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DATA_UNAVAILABLE, message, 503, details);
    this.name = 'DataUnavailableError';
  }
}

/** No player can be picked for a date. */
export class PoolExhaustedError extends GameError {
  constructor(date: string) {
    super(ErrorCodes.POOL_EXHAUSTED, `No eligible player for ${date}`, 503, {
      date,
    });
    this.name = 'PoolExhaustedError';
  }
}

/** A single player record cannot support the game (bad row, too few clues). */
export class InsufficientDataError extends GameError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INSUFFICIENT_DATA, message, 422, details);
    this.name = 'InsufficientDataError';
  }
}

export class ValidationError extends GameError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError('Validation failed', { issues });
  }
}

export class NotFoundError extends GameError {
  constructor(resource: string, id?: string | number) {
    super(
      ErrorCodes.NOT_FOUND,
      id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`,
      404,
    );
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends GameError {
  constructor(message: string) {
    super(ErrorCodes.CONFLICT, message, 409);
    this.name = 'ConflictError';
  }
}

export class ForbiddenError extends GameError {
  constructor(message = 'Not allowed in production') {
    super(ErrorCodes.FORBIDDEN, message, 403);
    this.name = 'ForbiddenError';
  }
}
