import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  ConfluenceRequestSchema,
  InsightsRequestSchema,
  TopicsRequestSchema,
  type ErrorResponse,
} from '../../shared/types';
import { InsightsError, httpStatusFor, isInsightsError } from '../errors';
import { errorMessage, type Logger } from '../obs/logger';
import type { DocumentService } from '../services/documentService';

export interface DocumentRouterDeps {
  documents: DocumentService;
  maxUploadBytes: number;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute =
  (handler: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export const parseBody = <T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T => {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    const message = issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'Invalid request body';
    throw new InsightsError('InvalidRequest', message);
  }
  return parsed.data;
};

const queryText = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

const routeParam = (req: Request, name: string): string => String(req.params[name] ?? '').trim();

/** Abort signal that fires when the client goes away before the response is sent. */
const requestSignal = (res: Response): AbortSignal => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
};

export const createDocumentRouter = (deps: DocumentRouterDeps): express.Router => {
  const { documents } = deps;
  const router = express.Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: deps.maxUploadBytes, files: 1 } });

  router.post(
    '/upload',
    upload.single('file'),
    asyncRoute(async (req, res) => {
      if (!req.file) {
        throw new InsightsError('InvalidUpload', 'No file uploaded');
      }
      const result = await documents.uploadDocument(req.file);
      res.json(result);
    }),
  );

  router.post(
    '/confluence',
    asyncRoute(async (req, res) => {
      const request = parseBody(ConfluenceRequestSchema, req.body);
      res.json(await documents.addConfluenceContent(request, requestSignal(res)));
    }),
  );

  router.post(
    '/insights',
    asyncRoute(async (req, res) => {
      const request = parseBody(InsightsRequestSchema, req.body);
      res.json(await documents.generateInsights(request, requestSignal(res)));
    }),
  );

  router.post(
    '/topics',
    asyncRoute(async (req, res) => {
      const request = parseBody(TopicsRequestSchema, req.body);
      res.json(await documents.extractKeyTopics(request));
    }),
  );

  router.get(
    '/',
    asyncRoute(async (_req, res) => {
      res.json(await documents.listDocuments());
    }),
  );

  router.get(
    '/search',
    asyncRoute(async (req, res) => {
      res.json(await documents.searchDocuments(queryText(req.query.keyword)));
    }),
  );

  router.get(
    '/stats',
    asyncRoute(async (_req, res) => {
      res.json(await documents.getDocumentStats());
    }),
  );

  router.get(
    '/type/:type',
    asyncRoute(async (req, res) => {
      res.json(await documents.getDocumentsByType(routeParam(req, 'type')));
    }),
  );

  router.get(
    '/:id/summary',
    asyncRoute(async (req, res) => {
      const provider = queryText(req.query.provider) || null;
      res.json(await documents.summarizeDocument(routeParam(req, 'id'), provider));
    }),
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      res.json(await documents.getDocument(routeParam(req, 'id')));
    }),
  );

  router.delete(
    '/:id',
    asyncRoute(async (req, res) => {
      await documents.deleteDocument(routeParam(req, 'id'));
      res.json({ message: 'Document deleted successfully' });
    }),
  );

  return router;
};

const toInsightsError = (error: unknown): unknown => {
  if (error instanceof multer.MulterError) {
    const message = error.code === 'LIMIT_FILE_SIZE' ? 'File too large: exceeds upload limit' : error.message;
    return new InsightsError('InvalidUpload', message, { cause: error });
  }
  if (error instanceof SyntaxError && 'body' in error) {
    return new InsightsError('InvalidRequest', 'Malformed JSON body', { cause: error });
  }
  return error;
};

export const createErrorHandler =
  (logger: Logger) =>
  (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const mapped = toInsightsError(error);
    const status = httpStatusFor(mapped);
    const body: ErrorResponse = isInsightsError(mapped)
      ? { error: mapped.message, kind: mapped.kind }
      : { error: 'Internal server error' };

    const meta = { method: req.method, path: req.originalUrl, status, error: errorMessage(mapped) };
    if (status >= 500) {
      logger.error('Request failed', meta);
    } else {
      logger.warn('Request rejected', meta);
    }
    res.status(status).json(body);
  };
