import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createUpload } from './config/multer';
import { ServerConfig } from './config/server.config';
import { errorHandler } from './middleware/error-handler';
import { createCircleArtRouter } from './routes/circle-art.routes';
import { CircleArtService } from './services/circle-art.service';
import { ProgressNotifier } from './services/progress-notifier.service';

export interface AppDeps {
  config: ServerConfig;
  circleArtService: CircleArtService;
  notifier?: ProgressNotifier;
}

export function createApp(deps: AppDeps): Express {
  const { config, circleArtService, notifier } = deps;
  const app = express();

  // Middleware
  app.use(cors({ origin: config.nodeEnv === 'production' ? false : config.corsOrigins }));
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use(
    '/api/circle-art',
    createCircleArtRouter({
      circleArtService,
      upload: createUpload(config.uploadLimitBytes),
      notifier
    })
  );

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Circle Poster API is running' });
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
