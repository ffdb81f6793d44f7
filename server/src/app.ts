import express from 'express';
import cors from 'cors';
import multer from 'multer';
import type { ServerConfig } from './config.js';
import type { ArtifactStore } from './services/artifactStore.js';
import type { TryOnProvider } from './services/falProvider.js';
import { createTryOnRouter } from './routes/tryon.js';
import { createArtifactRouter } from './routes/artifacts.js';
import { HttpError } from './utils/errors.js';

export interface AppDeps {
  config: ServerConfig;
  provider: TryOnProvider;
  store: ArtifactStore;
}

function toErrorResponse(err: unknown, maxUploadBytes: number): { status: number; message: string } {
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return { status: 413, message: `File too large (max ${Math.round(maxUploadBytes / 1024 / 1024)}MB)` };
    }
    if (err.code === 'LIMIT_UNEXPECTED_FILE') {
      return { status: 400, message: `Unexpected file field: ${err.field ?? 'unknown'}` };
    }
    return { status: 400, message: err.message };
  }
  if (err instanceof HttpError) {
    return { status: err.status, message: err.message };
  }
  return { status: 500, message: 'Internal server error' };
}

export function createApp({ config, provider, store }: AppDeps): express.Express {
  const app = express();

  if (config.trustProxy) {
    app.set('trust proxy', 1);
  }

  // Middleware
  app.use(cors({
    origin: config.allowedOrigins.length > 0 ? config.allowedOrigins : '*',
  }));
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => res.json({ ok: true }));
  app.get('/api/health', (_req, res) => res.json({ ok: true }));
  app.get('/', (_req, res) => res.type('text/plain').send('Try-on proxy ok. POST /api/tryon'));

  // API routes
  app.use('/api/tryon', createTryOnRouter({ config, provider, store }));
  app.use('/tmp', createArtifactRouter(store));

  // Error handling middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, message } = toErrorResponse(err, config.maxUploadBytes);
    if (status >= 500) {
      console.error('[Server Error]', err);
    } else {
      console.warn(`[Client Error] ${status} ${message}`);
    }
    res.status(status).json({ error: message, status });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
