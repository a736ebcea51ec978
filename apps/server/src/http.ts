// apps/server/src/http.ts
//
// Express plumbing shared by the routes: request ids, body validation and
// the error handler. GameErrors are answered with their own code and status;
// anything else is logged with the request id and answered generically.

import type {
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from 'express';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { ErrorCodes, GameError, ValidationError } from '@player-daily/game-core';
import type { ErrorRes } from '@player-daily/protocol';

export const TRY_AGAIN = 'Something went wrong, please try again';

export function getRequestId(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : '';
}

/** Tags every request with a short id, echoed in X-Request-ID. */
export function requestId(): RequestHandler {
  return (_req, res, next) => {
    const id = nanoid(10);
    res.locals.requestId = id;
    res.setHeader('X-Request-ID', id);
    next();
  };
}

/** Parse a request body or throw a ValidationError listing the issues. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  return parsed.data;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Routes rejected promises to the error handler (Express 4 does not). */
export function route(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * express.json() rejects malformed JSON with a SyntaxError, and oversized
 * bodies, bad charsets or encodings with a 4xx error tagged by `type`.
 */
function fromBodyParser(err: unknown): GameError | null {
  if (err instanceof SyntaxError) return new ValidationError('Invalid JSON body');
  if (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  ) {
    return new GameError(ErrorCodes.VALIDATION_ERROR, err.message, err.status, {
      type: err.type,
    });
  }
  return null;
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    const rid = getRequestId(res);

    const error = fromBodyParser(err) ?? err;

    if (error instanceof GameError && error.statusCode < 500) {
      const body: ErrorRes = {
        error: { code: error.code, message: error.message, requestId: rid },
      };
      if (error.details) body.error.details = error.details;
      res.status(error.statusCode).json(body);
      return;
    }

    // Server-side faults keep their code but never their detail.
    const status = error instanceof GameError ? error.statusCode : 500;
    const code = error instanceof GameError ? error.code : ErrorCodes.INTERNAL_ERROR;
    log.error({ err: error, requestId: rid, code }, 'request failed');
    const body: ErrorRes = {
      error: { code, message: TRY_AGAIN, requestId: rid },
    };
    res.status(status).json(body);
  };
}
