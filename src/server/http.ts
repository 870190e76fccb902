/**
 * HTTP routes
 *
 * - POST   /process-image   start a transfer; progress is reported over /ws
 * - GET    /health          overall and engine health
 * - GET    /docker-status   engine connectivity and metadata
 * - GET    /images          local images
 * - DELETE /images          remove a local image (?reference=&force=)
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { EngineClient } from '@/infra/docker/client';
import type { TransferPipeline } from '@/app/transfer-pipeline';
import { resolveTargetRegistry } from '@/lib/image-reference';
import { extractErrorMessage } from '@/lib/error-utils';
import { systemClock, type Clock } from '@/app/progress-broadcaster';

const processImageSchema = z.object({
  image_name: z
    .string({ required_error: 'image_name is required' })
    .trim()
    .min(1, 'image_name is required'),
  target_registry: z.string().trim().optional(),
});

const removeImageQuerySchema = z.object({
  reference: z
    .string({ required_error: 'reference is required' })
    .trim()
    .min(1, 'reference is required'),
  force: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

export interface HttpAppDeps {
  pipeline: TransferPipeline;
  /** Engine facade used by the status endpoints */
  engine: EngineClient;
  logger: Logger;
  defaultTargetRegistry: string;
  clock?: Clock;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

export function createHttpApp(deps: HttpAppDeps): Express {
  const { pipeline, engine, defaultTargetRegistry } = deps;
  const logger = deps.logger.child({ module: 'http' });
  const clock = deps.clock ?? systemClock;
  const app = express();

  app.use(express.json());

  app.post('/process-image', (req: Request, res: Response) => {
    const body = processImageSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: formatIssues(body.error) });
      return;
    }

    const imageName = body.data.image_name;
    const targetRegistry = resolveTargetRegistry(body.data.target_registry, defaultTargetRegistry);

    logger.info({ imageName, targetRegistry }, 'Transfer requested');

    // Runs detached; the outcome reaches clients only through the progress channel.
    void pipeline.run({ imageName, targetRegistry }).then(
      (outcome) => logger.info({ imageName, outcome }, 'Transfer finished'),
      (error: unknown) =>
        logger.error({ imageName, error: extractErrorMessage(error) }, 'Transfer crashed'),
    );

    res.status(202).json({
      message: 'Image transfer started',
      image_name: imageName,
      target_registry: targetRegistry,
    });
  });

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const healthy = await engine.testConnection();
      const diagnostic = await engine.getConnectionDiagnostic();
      res.json({
        status: 'ok',
        docker: healthy ? 'healthy' : 'unhealthy',
        docker_info: diagnostic,
        timestamp: clock(),
      });
    } catch (error) {
      res.json({
        status: 'error',
        docker: 'unknown',
        docker_info: `Health check failed: ${extractErrorMessage(error)}`,
        timestamp: clock(),
      });
    }
  });

  app.get('/docker-status', async (_req: Request, res: Response) => {
    try {
      if (await engine.testConnection()) {
        const info = await engine.getInfo();
        res.json({
          connected: true,
          status: 'healthy',
          info: info.ok ? info.value : null,
          message: 'Docker connection is healthy',
        });
        return;
      }

      res.json({
        connected: false,
        status: 'unhealthy',
        error: await engine.getConnectionDiagnostic(),
        message: 'Docker connection failed',
      });
    } catch (error) {
      res.json({
        connected: false,
        status: 'error',
        error: extractErrorMessage(error),
        message: 'Docker status check failed',
      });
    }
  });

  app.get('/images', async (_req: Request, res: Response) => {
    const images = await engine.listImages();
    if (!images.ok) {
      res.status(503).json({ error: images.error, code: images.code });
      return;
    }
    res.json({ images: images.value });
  });

  app.delete('/images', async (req: Request, res: Response) => {
    const query = removeImageQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: formatIssues(query.error) });
      return;
    }

    const removed = await engine.removeImage(query.data.reference, query.data.force);
    if (!removed.ok) {
      res.status(409).json({ error: removed.error, code: removed.code });
      return;
    }
    res.json({ removed: query.data.reference });
  });

  // Malformed JSON bodies end up here as SyntaxErrors
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = error instanceof SyntaxError ? 400 : 500;
    logger.warn({ error: extractErrorMessage(error), status }, 'Request failed');
    res.status(status).json({ error: extractErrorMessage(error) });
  });

  return app;
}
