import { Hono } from 'hono';
import { isValidRelativePath } from '../../../src/utils/paths.js';
import { loadReleaseFile } from '../storage.js';

function decodePath(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

export function fileRoutes(rootDir: string): Hono {
  const routes = new Hono();

  routes.get('/*', async (c) => {
    const filePath = decodePath(c.req.path.replace(/^\/files\//, ''));

    if (!filePath || !isValidRelativePath(filePath)) {
      return c.json({ detail: 'Invalid file path' }, 400);
    }

    const data = await loadReleaseFile(rootDir, filePath);
    if (!data) {
      return c.json({ detail: `File not found: ${filePath}` }, 404);
    }

    return c.body(new Uint8Array(data), 200, {
      'Content-Type': 'application/octet-stream',
      'Content-Length': String(data.length),
    });
  });

  return routes;
}
