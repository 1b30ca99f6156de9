import { Hono } from 'hono';
import { buildManifest } from '../../../src/sync/manifest-builder.js';
import { serializeManifest } from '../../../src/sync/manifest.js';

// Rebuilt from the release directory on every request.
export function manifestRoutes(rootDir: string, downloadUrl: string): Hono {
  const routes = new Hono();

  routes.get('/manifest.json', async (c) => {
    const manifest = await buildManifest(rootDir, downloadUrl);
    return c.body(serializeManifest(manifest), 200, { 'Content-Type': 'application/json' });
  });

  return routes;
}
