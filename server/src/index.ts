import { serve } from '@hono/node-server';
import path from 'node:path';
import { createPublisherApp } from './app.js';

const PORT = Number(process.env.PORT) || 8080;
const PUBLISH_DIR = path.resolve(process.env.PUBLISH_DIR || './release');
const DOWNLOAD_URL = process.env.DOWNLOAD_URL || `http://localhost:${PORT}/files`;

const app = createPublisherApp({
  rootDir: PUBLISH_DIR,
  downloadUrl: DOWNLOAD_URL,
  logRequests: true,
});

serve({ fetch: app.fetch, port: PORT }, (info) => {
  console.log(`Publishing ${PUBLISH_DIR} on http://localhost:${info.port}/manifest.json`);
});
