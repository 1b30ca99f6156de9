import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { fileRoutes } from './routes/files.js';
import { manifestRoutes } from './routes/manifest.js';

export interface PublisherOptions {
  /** Release directory whose files are published. */
  rootDir: string;
  /** Base URL clients prefix to every relative path, normally `<origin>/files`. */
  downloadUrl: string;
  logRequests?: boolean;
}

export function createPublisherApp(options: PublisherOptions): Hono {
  const app = new Hono();

  if (options.logRequests) {
    app.use('*', logger());
  }

  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    return c.json({ detail: 'Internal server error' }, 500);
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: Date.now() });
  });

  app.route('/', manifestRoutes(options.rootDir, options.downloadUrl));
  app.route('/files', fileRoutes(options.rootDir));

  return app;
}
