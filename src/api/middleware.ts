/**
 * API middleware: caller identity and error handling.
 */

import { NextFunction, Request, Response } from 'express';
import { ExecutorError } from '../engine/executor';
import { PipelineError, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

/** Identity recorded on aborts; taken from the `x-identity-id` header. */
export function callerIdentity(req: Request): string {
  const header = req.header('x-identity-id');
  return header && header.trim().length > 0 ? header.trim() : 'api';
}

/** The TypedError carried by a thrown value, if any. */
export function typedErrorOf(err: unknown): TypedError | undefined {
  if (err instanceof PipelineError || err instanceof ExecutorError) return err.typedError;
  return undefined;
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'PIPELINE.ALREADY_RUNNING' || error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code === 'RUN.NOT_ABORTABLE' || error.code === 'RUN.INVALID_STATE') return 409;
  if (error.code.startsWith('PIPELINE.') || error.code.startsWith('RUN.')) return 422;
  return 500;
}

/** Respond with `{ error }` for anything a route handler caught. */
export function sendError(res: Response, err: unknown, fallbackMessage: string): void {
  const typed = typedErrorOf(err);
  if (typed) {
    const status = getHttpStatus(typed);
    logger.warn('Request error', { code: typed.code, status });
    res.status(status).json(apiError(typed));
    return;
  }
  logger.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error ? err.message : fallbackMessage,
  })));
}

/** Global error handling middleware (malformed JSON bodies and the like). */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(createTypedError({
      code: 'VALIDATION.MALFORMED_BODY',
      message: `Request body is not valid JSON: ${err.message}`,
    })));
    return;
  }
  sendError(res, err, 'Internal server error');
}
