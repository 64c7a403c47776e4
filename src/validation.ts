/* validation.ts — Zod schemas + Express middleware for input validation */

import { z } from 'zod';
import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { InvalidConfigError, UnknownNodeError } from './errors';

// ── Schemas ──────────────────────────────────────────────────

export const nodeIdSchema = z.number().int().min(0).max(999);

export const drainSchema = z.object({
  nodeId: nodeIdSchema,
  amount: z.number().finite().positive().max(1e6),
});

export const advanceSchema = z.object({
  duration: z.number().finite().positive().max(100_000),
});

/** Overrides accepted by /cmd/reset; full validation happens in resolveConfig */
export const resetSchema = z.object({
  nodeCount: z.number().int().min(1).max(1000).optional(),
  clusterHeadProbability: z.number().min(0).max(1).optional(),
  initialEnergy: z.number().finite().positive().optional(),
  eligibilityFloor: z.number().finite().min(0).optional(),
  deathFloor: z.number().finite().min(0).optional(),
  dmsProfile: z.enum(['distance', 'priority']).optional(),
  energyModel: z.enum(['manual', 'radio']).optional(),
  backupOrdering: z.enum(['after-formation', 'at-election']).optional(),
  promoteBackupOnHeadDeath: z.boolean().optional(),
  seed: z.number().int().optional(),
}).strict();

const nonNegativeIntParam = z.string().regex(/^\d+$/, 'must be an integer').transform(Number);

export const replayParamsSchema = z.object({
  from: nonNegativeIntParam,
  to: nonNegativeIntParam,
});

export const replayTimeParamsSchema = z.object({
  time: nonNegativeIntParam,
});

// ── Middleware factories ─────────────────────────────────────

function rejectInvalid(res: Response, issues: z.ZodIssue[]): void {
  res.status(400).json({ ok: false, error: 'Validation failed', details: issues });
}

/**
 * Validates req.body against a Zod schema. On success req.body is replaced
 * with the parsed data; a missing body is checked as `{}`.
 */
export function validateBody<T>(schema: z.ZodSchema<T>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      rejectInvalid(res, result.error.issues);
      return;
    }
    req.body = result.data;
    next();
  };
}

/** Validates route parameters; handlers still read the raw strings */
export function validateRouteParams(schema: z.ZodSchema): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      rejectInvalid(res, result.error.issues);
      return;
    }
    next();
  };
}

// ── Error handler (must be LAST middleware) ───────────────────

/** Engine errors map to client errors; anything else is a 500 */
export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  if (err instanceof InvalidConfigError) {
    res.status(400).json({ ok: false, error: err.message, details: err.issues });
    return;
  }
  if (err instanceof UnknownNodeError) {
    res.status(404).json({ ok: false, error: err.message });
    return;
  }
  console.error('[HTTP]', err);
  res.status(500).json({ ok: false, error: 'Internal server error' });
};
