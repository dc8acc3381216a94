import express from 'express';
import { z } from 'zod';
import type { Logger } from '@topicreel/shared';
import type { PipelineOrchestrator } from './pipeline.js';

/** Express dashboard API for starting runs and watching their progress. */

export type RunService = Pick<PipelineOrchestrator, 'start' | 'getStatus' | 'listRuns'>;

const startRunSchema = z.object({
  topic: z.string().trim().min(1, 'topic is required'),
  outputFilename: z
    .string()
    .regex(/^[\w.-]+\.mp4$/, 'outputFilename must be a plain .mp4 file name')
    .optional(),
});

export function createDashboard(orchestrator: RunService, logger: Logger, port = 3000) {
  const app = express();
  app.use(express.json());

  // ─── Health ───

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      runs: orchestrator.listRuns().length,
      timestamp: new Date().toISOString(),
    });
  });

  // ─── Runs ───

  app.get('/api/runs', (_req, res) => {
    const runs = orchestrator.listRuns();
    res.json({ runs, total: runs.length });
  });

  app.get('/api/runs/:runId', (req, res) => {
    const status = orchestrator.getStatus(req.params.runId);
    if (!status) {
      res.status(404).json({ error: `Run ${req.params.runId} not found` });
      return;
    }
    res.json(status);
  });

  app.post('/api/runs', (req, res) => {
    const parsed = startRunSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join(', ') });
      return;
    }

    try {
      const { runId } = orchestrator.start(parsed.data.topic, parsed.data.outputFilename);
      logger.info({ runId, topic: parsed.data.topic }, 'Run started from dashboard');
      res.status(202).json({ runId, status: 'started' });
    } catch (err) {
      res.status(500).json({ error: String(err) });
    }
  });

  // ─── Pipeline Stages Info ───

  app.get('/api/pipeline/stages', (_req, res) => {
    res.json({
      stages: [
        { name: 'script', description: 'Write a scene-by-scene script for the topic', mandatory: true },
        { name: 'audio', description: 'Narrate every scene, falling back to a second voice engine', mandatory: true },
        { name: 'illustration', description: 'Find stock footage for every scene', mandatory: false },
        { name: 'animation', description: 'Render math animations for mathematical scenes', mandatory: false },
        { name: 'compilation', description: 'Join scenes with content-aware transitions', mandatory: true },
      ],
    });
  });

  const server = app.listen(port, () => {
    logger.info({ port }, 'Dashboard API running');
  });

  return server;
}
