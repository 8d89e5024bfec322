import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import { getPublicConfig, type AppConfig } from '../shared/config';
import type { DocumentStore } from '../shared/documentStore';
import { createDocumentRouter, createErrorHandler } from './http/routes';
import type { Logger } from './obs/logger';
import { ConfluenceFetcher } from './remote/confluence';
import { DocumentService } from './services/documentService';
import { InsightService } from './services/insightService';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  store: DocumentStore;
  insights?: InsightService;
  confluence?: ConfluenceFetcher;
}

export const createApp = (deps: AppDeps): express.Express => {
  const { config, logger, store } = deps;
  const insights = deps.insights ?? new InsightService(config, logger);
  const confluence = deps.confluence ?? new ConfluenceFetcher(config, logger);
  const documents = new DocumentService(config, logger, { store, confluence, insights });

  const app = express();

  app.use(cors({ origin: config.server.corsOrigins }));
  app.use(express.json({ limit: config.server.bodyLimit }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.use(
    '/api/documents',
    createDocumentRouter({ documents, maxUploadBytes: config.uploads.maxBytes }),
  );

  app.use(createErrorHandler(logger));

  return app;
};
