/**
 * Express server wrapper for container deployment.
 * Mounts the Vercel-style handlers in api/ unchanged: Express req/res
 * carry everything those handlers read.
 */
import express from 'express';
import type { ApiRequest, ApiResponse } from './src/http/handler-helpers';
import { loadConfig } from './src/config';

import healthHandler from './api/health';
import campaignsHandler from './api/campaigns';
import previewHandler from './api/preview';
import applyBatchHandler from './api/apply-batch';

type ApiHandler = (req: ApiRequest, res: ApiResponse) => unknown;

function mount(handler: ApiHandler): express.RequestHandler {
  return (req, res, next) => {
    Promise.resolve(handler(req, res)).catch(next);
  };
}

export function createApp(): express.Express {
  const app = express();

  // CSV uploads arrive as JSON strings
  app.use(express.json({ limit: '10mb' }));

  // ── Routes ─────────────────────────────────────────────────────────────────────

  app.all('/api/health', mount(healthHandler));
  app.all('/api/campaigns', mount(campaignsHandler));
  app.all('/api/preview', mount(previewHandler));
  app.all('/api/apply-batch', mount(applyBatchHandler));

  app.get('/', (req, res) => res.redirect('/api/health'));

  // 404 catch-all
  app.use((req, res) => {
    res.status(404).json({ error: 'Not found', path: req.path });
  });

  return app;
}

// ── Start ──────────────────────────────────────────────────────────────────────

if (require.main === module) {
  const { port } = loadConfig();
  createApp().listen(port, '0.0.0.0', () => {
    console.log(`[campaign-sender-sync] Server running on port ${port}`);
    console.log(`[campaign-sender-sync] ${new Date().toISOString()}`);
  });
}
