import express from 'express';
import type { Application, NextFunction, Request, Response } from 'express';
import morgan from 'morgan';
import { loadServerConfig } from './config.js';
import { isEntryPoint } from './entry.js';
import { statusCodeOf } from './errors.js';
import { loadContent } from './loader.js';
import type { LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';

export interface AppOptions {
  /** Log requests through morgan (default: true) */
  requestLogging?: boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, options: AppOptions = {}): Application {
  const app = express();

  if (options.requestLogging ?? true) {
    app.use(morgan('dev'));
  }

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    const headlines = data.parseResults.reduce((sum, r) => sum + r.headlines.length, 0);
    res.json({
      status: 'ok',
      documents: data.corpus.size,
      headlines
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Errors thrown by route handlers
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusCodeOf(err) ?? 500;
    if (status >= 500) {
      console.error('Unhandled error:', err);
    }
    const message = err instanceof Error ? err.message : String(err);
    res.status(status).json({ error: message });
  });

  return app;
}

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const config = await loadServerConfig(process.argv.slice(2), process.cwd());

  console.log(`Loading content from: ${config.contentDir}`);
  const data = loadContent({ contentDir: config.contentDir });

  const headlineCount = data.parseResults.reduce((sum, r) => sum + r.headlines.length, 0);
  console.log(`Loaded ${data.corpus.size} documents, ${headlineCount} headlines`);

  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const app = createApp(data);

  const server = app.listen(config.port, () => {
    console.log(`org-outline API listening on http://localhost:${config.port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (isEntryPoint(import.meta.url)) {
  bootstrap().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
