/**
 * Stunting Region Stats - Backend API
 * Serves the per-region statistics table, the joined choropleth layer and join diagnostics.
 */

import express, { type Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { loadConfig, type AppConfig } from '../../scripts/lib/config';
import { DatasetLoader, type DatasetSource } from '../../scripts/lib/loader';
import { createHandlers, type ApiResult } from './handlers';

export function createApp(source: DatasetSource, config: Pick<AppConfig, 'cacheMaxAge'>): express.Express {
  const app = express();
  app.use(cors());
  app.use(morgan('short'));

  const handlers = createHandlers(source);
  const send = <T>(res: Response, result: ApiResult<T>, contentType?: string) => {
    if (result.status === 200) {
      res.set('Cache-Control', `public, max-age=${config.cacheMaxAge}`);
      if (contentType) res.type(contentType);
    }
    res.status(result.status).json(result.body);
  };

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/stats', async (req, res) => {
    send(res, await handlers.stats(req.query));
  });

  app.get('/api/map', async (req, res) => {
    send(res, await handlers.map(req.query), 'application/geo+json');
  });

  app.get('/api/diagnostics', async (_req, res) => {
    send(res, await handlers.diagnostics());
  });

  app.get('/api/options', async (req, res) => {
    send(res, await handlers.options(req.query));
  });

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  const loader = new DatasetLoader(config);
  const app = createApp(loader, config);
  app.listen(config.port, () => {
    loader
      .catalog()
      .then((catalog) => console.log(`Boundaries preloaded (${catalog.size} regions).`))
      .catch((e) => console.warn(`Boundaries not loaded: ${String(e)}`));
    console.log(`Server listening on port ${config.port}`);
  });
}
