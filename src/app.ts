/* app.ts — Express routes for the cluster monitor */

import express, { type Express } from 'express';
import { setupSecurity } from './security';
import {
  validateBody,
  validateRouteParams,
  drainSchema,
  advanceSchema,
  resetSchema,
  replayParamsSchema,
  replayTimeParamsSchema,
  errorHandler,
} from './validation';
import { UnknownNodeError } from './errors';
import type { SimulationController } from './controller';

export function createApp(controller: SimulationController): Express {
  const app = express();

  // Security headers + CORS — must come before other middleware
  setupSecurity(app);

  app.use(express.json());

  // ── Commands ─────────────────────────────────────────────────

  app.post('/cmd/pause', (_req, res) => {
    controller.pause();
    res.json({ ok: true, msg: 'Simulation paused' });
  });

  app.post('/cmd/resume', (_req, res) => {
    controller.resume();
    res.json({ ok: true, msg: 'Simulation resumed' });
  });

  // InvalidConfigError is answered with 400 by errorHandler
  app.post('/cmd/reset', validateBody(resetSchema), (req, res) => {
    const state = controller.reset(req.body);
    res.json({ ok: true, state });
  });

  app.post('/cmd/drain', validateBody(drainSchema), (req, res) => {
    const { nodeId, amount } = req.body;
    if (!controller.drain(nodeId, amount)) throw new UnknownNodeError(nodeId);
    res.json({ ok: true, remaining: controller.sim.ledger.remaining(nodeId) });
  });

  app.post('/cmd/advance', validateBody(advanceSchema), (req, res) => {
    const state = controller.advance(req.body.duration);
    res.json({ ok: true, state });
  });

  // ── Queries ──────────────────────────────────────────────────

  app.get('/state', (_req, res) => {
    res.json(controller.getSnapshot());
  });

  app.get('/clusters', (_req, res) => {
    res.json(controller.getSnapshot().clusters);
  });

  app.get('/energy', (_req, res) => {
    res.json(controller.getSnapshot().nodes);
  });

  app.get('/reports', (_req, res) => {
    res.json(controller.getReports());
  });

  app.get('/events', (_req, res) => {
    res.json(controller.sim.getEventHistory());
  });

  // /replay/info and /replay/at/:time must be registered before /replay/:from/:to
  app.get('/replay/info', (_req, res) => {
    res.json(controller.sim.recorder.getInfo());
  });

  app.get('/replay/at/:time', validateRouteParams(replayTimeParamsSchema), (req, res) => {
    const time = parseInt(req.params.time, 10);
    const frame = controller.sim.recorder.frameAt(time);
    if (!frame) {
      res.status(404).json({ ok: false, error: `No round recorded at or before t=${time}` });
      return;
    }
    res.json(frame);
  });

  app.get('/replay/:from/:to', validateRouteParams(replayParamsSchema), (req, res) => {
    const from = parseInt(req.params.from, 10);
    const to = parseInt(req.params.to, 10);
    res.json(controller.sim.recorder.getRange(from, to));
  });

  app.get('/health', (_req, res) => {
    const snapshot = controller.getSnapshot();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      simTime: snapshot.time,
      round: snapshot.round,
      aliveNodes: snapshot.stats.aliveCount,
      paused: controller.isPaused,
      memoryUsage: process.memoryUsage(),
    });
  });

  // ── Error handler (must be LAST middleware) ──────────────────
  app.use(errorHandler);

  return app;
}
