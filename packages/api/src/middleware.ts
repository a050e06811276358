import { ZodError } from 'zod';
import type { NextFunction, Request, Response } from 'express';
import { QuillError, UnauthorizedError } from '@quill/shared';
import type { Config, Logger } from '@quill/shared';

export interface ErrorBody {
  error: string;
  code: string;
  details?: Record<string, string[] | undefined>;
}

/** Maps any thrown value to an HTTP status and JSON body. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    return {
      status: 422,
      body: { error: 'Request validation failed', code: 'VALIDATION_FAILED', details: err.flatten().fieldErrors },
    };
  }
  if (err instanceof QuillError) {
    return { status: err.statusCode, body: { error: err.message, code: err.code } };
  }
  // Body-parser failures (malformed JSON, oversized payload) carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return { status: err.status, body: { error: err.message, code: 'BAD_REQUEST' } };
  }
  return { status: 500, body: { error: 'Internal server error', code: 'INTERNAL' } };
}

/** Checks X-API-Key when API key auth is enabled; a no-op otherwise. */
export function requireApiKey(config: Pick<Config, 'apiKeyEnabled' | 'apiKey'>) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!config.apiKeyEnabled) return next();

    const provided = req.get('x-api-key');
    if (provided !== config.apiKey) {
      const { status, body } = toErrorResponse(
        new UnauthorizedError(provided ? 'Invalid API key' : 'Missing API key'),
      );
      res.setHeader('WWW-Authenticate', 'ApiKey');
      res.status(status).json(body);
      return;
    }
    next();
  };
}

export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      logger.error({ err, path: req.path }, 'Request failed');
    } else {
      logger.warn({ path: req.path, status, code: body.code }, body.error);
    }
    res.status(status).json(body);
  };
}
