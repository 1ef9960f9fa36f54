import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createStoriesRouter } from './routes/stories.js';
import type { StoryService } from './services/story/storyService.js';
import logger from './utils/logger.js';

export interface AppOptions {
  service: StoryService;
  clientUrl: string;
  nodeEnv: string;
}

export function createApp({ service, clientUrl, nodeEnv }: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: clientUrl,
    credentials: true,
  }));
  if (nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }
  app.use(express.json({ limit: '2mb' }));

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Info
  app.get('/api', (req, res) => {
    res.json({
      message: 'Branching Stories API',
      version: '0.1.0',
      endpoints: {
        stories: {
          list: 'GET /api/stories',
          create: 'POST /api/stories',
          get: 'GET /api/stories/:id',
          delete: 'DELETE /api/stories/:id',
          outline: 'GET /api/stories/:id/outline',
          validation: 'GET /api/stories/:id/validation',
          branches: 'POST /api/stories/:id/branches',
          export: 'GET /api/stories/:id/export',
          import: 'POST /api/stories/import',
        },
      },
    });
  });

  // Routes
  app.use('/api/stories', createStoriesRouter(service));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('HTTP', `${req.method} ${req.path} failed`, err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
