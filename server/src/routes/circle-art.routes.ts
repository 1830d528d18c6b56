import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { InvalidConfigurationError } from '../errors/circle-art.errors';
import { CircleArtService } from '../services/circle-art.service';
import { createConfig, renderModeSchema, samplingModeSchema } from '../services/config.service';
import { ProgressNotifier } from '../services/progress-notifier.service';

export interface CircleArtRouterDeps {
  circleArtService: CircleArtService;
  upload: multer.Multer;
  notifier?: ProgressNotifier;
}

// Multipart fields arrive as strings; blank means "not given"
const optionalNumber = z.preprocess(
  value => (value === undefined || value === '' ? undefined : Number(value)),
  z.number().optional()
);

const optionalText = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().optional()
);

const renderFieldsSchema = z.object({
  circleDiameter: optionalNumber,
  circleSpacing: optionalNumber,
  outputWidthMm: optionalNumber,
  outputHeightMm: optionalNumber,
  backgroundColor: z.string().optional(),
  samplingMode: z.preprocess(value => (value === '' ? undefined : value), samplingModeSchema.optional()),
  renderMode: z.preprocess(value => (value === '' ? undefined : value), renderModeSchema.optional()),
  minDotSize: optionalNumber,
  maxDotSize: optionalNumber,
  socketId: optionalText
});

function parseRenderFields(body: unknown) {
  const parsed = renderFieldsSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function svgFileName(originalName: string): string {
  const base = path.parse(originalName).name.replace(/[^\w.-]+/g, '_');
  return `${base || 'circle-art'}.svg`;
}

export function createCircleArtRouter(deps: CircleArtRouterDeps): Router {
  const { circleArtService, upload, notifier } = deps;
  const router = Router();

  /**
   * Render an uploaded image as SVG circle art.
   * Pass `socketId` to receive progress events over Socket.IO.
   */
  router.post('/render', upload.single('image'), async (req: Request, res: Response, next: NextFunction) => {
    const jobId = uuidv4();
    let socketId: string | undefined;

    try {
      const file = req.file;
      if (!file) {
        return res.status(400).json({ error: 'No image uploaded', code: 'MISSING_IMAGE' });
      }

      const { socketId: requestedSocket, ...fields } = parseRenderFields(req.body);
      socketId = requestedSocket;
      const config = createConfig(fields);

      console.log(`[CircleArt] Render request ${jobId} for ${file.originalname} (socket: ${socketId || 'none'})`);

      const result = await circleArtService.renderBuffer(file.buffer, config, {
        jobId,
        onProgress: (progress) => {
          if (socketId && notifier) {
            notifier.notify(socketId, 'circle-art:progress', { jobId, ...progress });
          }
        }
      });

      if (socketId && notifier) {
        notifier.notify(socketId, 'circle-art:complete', { jobId, ...result.stats });
      }

      res.setHeader('Content-Type', 'image/svg+xml; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename=${svgFileName(file.originalname)}`);
      res.setHeader('X-Job-Id', jobId);
      res.setHeader('X-Sample-Points', String(result.stats.samplePoints));
      res.setHeader('X-Circle-Count', String(result.stats.circles));
      return res.send(result.svg);
    } catch (error) {
      if (socketId && notifier) {
        notifier.notify(socketId, 'circle-art:error', {
          jobId,
          error: error instanceof Error ? error.message : String(error)
        });
      }
      return next(error);
    }
  });

  return router;
}
