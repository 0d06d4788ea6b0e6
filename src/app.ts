import { existsSync } from 'node:fs';
import path from 'node:path';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { HttpError } from './errors.js';
import { createHistoryRouter } from './routes/history.js';
import { createSystemRouter } from './routes/system.js';
import { createTtsRouter } from './routes/tts.js';
import type { AppServices } from './services.js';
import { isOriginAllowed, parseAllowedOrigins } from './utils/env.js';

export interface CreateAppOptions {
  allowedOrigins?: string[];
  /** Directory with the built client; omitted in tests. */
  staticDir?: string;
  accessLog?: boolean;
}

export function createApp(services: AppServices, options: CreateAppOptions = {}): express.Express {
  const app = express();
  const allowedOrigins = options.allowedOrigins ?? parseAllowedOrigins();
  const { config, logger } = services;

  app.use(
    cors({
      origin: (origin, callback) => {
        if (isOriginAllowed(origin ?? undefined, allowedOrigins)) {
          callback(null, true);
          return;
        }
        callback(new HttpError(403, 'Not allowed by CORS'));
      },
      exposedHeaders: ['X-Job-Id'],
    })
  );
  app.use(express.json({ limit: '2mb' }));
  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          mediaSrc: ["'self'", 'blob:'],
          connectSrc: ["'self'", ...allowedOrigins],
          objectSrc: ["'none'"],
          frameAncestors: ["'self'"],
        },
      },
    })
  );
  if (options.accessLog ?? true) {
    app.use(morgan('dev'));
  }
  if (options.staticDir && existsSync(options.staticDir)) {
    app.use(express.static(path.resolve(options.staticDir)));
  }

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  });

  app.get('/api/config', (_req, res) => {
    res.json({
      audio: { sampleRate: config.audio.sampleRate, streamChunkBytes: config.audio.streamChunkBytes },
      history: { maxItems: config.history.maxItems },
    });
  });

  app.use('/api/tts', createTtsRouter(services));
  app.use('/api/history', createHistoryRouter(services));
  app.use('/api/system', createSystemRouter(services));

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.statusCode).json(err.payload ?? { message: err.message });
      return;
    }
    logger.error({ event: 'server_error', message: err.message });
    res.status(500).json({ message: err.message });
  });

  return app;
}
