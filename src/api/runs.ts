/**
 * Run API routes.
 *
 * POST /runs — Start a run (202; it executes in the background)
 * GET /runs — List runs, newest first
 * GET /runs/:runId — Get a run with its stage and hook results
 * POST /runs/:runId/abort — Abort a run
 * GET /runs/:runId/events — List the run's events
 */

import { Request, Router } from 'express';
import { apiError, runNotFoundError, validationError } from '../domain/errors';
import { RunStatus } from '../domain/run';
import { EventPublisher } from '../data-plane/publisher';
import { PipelineExecutor } from '../engine/executor';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { callerIdentity, sendError } from './middleware';

const RUN_STATUSES: readonly RunStatus[] = Object.values(RunStatus);

function parseParameters(value: unknown): Record<string, string> | undefined {
  if (value === undefined) return {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  const parameters: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') return undefined;
    parameters[key] = entry;
  }
  return parameters;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

function queryInt(req: Request, name: string, fallback: number, max: number): number {
  const raw = queryString(req, name);
  const parsed = raw === undefined ? NaN : parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}

export function createRunRoutes(
  store: Store,
  executor: PipelineExecutor,
  publisher: EventPublisher,
  defaultPipelineId: string,
): Router {
  const router = Router();

  router.post('/runs', async (req, res) => {
    try {
      const body: unknown = req.body ?? {};
      const record = typeof body === 'object' && body !== null ? Object.fromEntries(Object.entries(body)) : {};
      const pipelineId = record.pipelineId ?? defaultPipelineId;
      if (typeof pipelineId !== 'string') {
        res.status(400).json(apiError(validationError('pipelineId must be a string')));
        return;
      }
      const parameters = parseParameters(record.parameters);
      if (!parameters) {
        res.status(400).json(apiError(validationError('parameters must be an object of strings')));
        return;
      }

      const run = await executor.createRun({ pipelineId, parameters });

      // Execute asynchronously; the outcome is recorded on the run.
      executor.executeRun(run.id).catch((err: unknown) => {
        logger.error('Run execution failed', {
          runId: run.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(202).json({ run });
    } catch (err) {
      sendError(res, err, 'Run creation failed');
    }
  });

  router.get('/runs', async (req, res) => {
    try {
      const status = queryString(req, 'status');
      const matched = RUN_STATUSES.find((s) => s === status);
      if (status !== undefined && matched === undefined) {
        res.status(400).json(apiError(validationError(`Unknown run status "${status}"`, { allowed: RUN_STATUSES })));
        return;
      }
      const result = await store.runs.list({
        pipelineId: queryString(req, 'pipelineId'),
        status: matched,
        limit: queryInt(req, 'limit', 100, 1000) || 100,
        offset: queryInt(req, 'offset', 0, Number.MAX_SAFE_INTEGER),
      });
      res.json(result);
    } catch (err) {
      sendError(res, err, 'Failed to list runs');
    }
  });

  router.get('/runs/:runId', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }
      res.json({ run });
    } catch (err) {
      sendError(res, err, 'Failed to fetch run');
    }
  });

  router.post('/runs/:runId/abort', async (req, res) => {
    try {
      const reason: unknown = req.body?.reason;
      if (reason !== undefined && typeof reason !== 'string') {
        res.status(400).json(apiError(validationError('reason must be a string')));
        return;
      }
      const run = await executor.abort(req.params.runId, callerIdentity(req), reason);
      res.status(202).json({ run });
    } catch (err) {
      sendError(res, err, 'Run abort failed');
    }
  });

  router.get('/runs/:runId/events', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(runNotFoundError(req.params.runId)));
        return;
      }
      const events = await publisher.getEventsByRun(run.id);
      res.json({ events, total: events.length });
    } catch (err) {
      sendError(res, err, 'Failed to fetch run events');
    }
  });

  return router;
}
