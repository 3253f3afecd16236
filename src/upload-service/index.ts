import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { stat } from 'node:fs/promises';
import { PermitServiceError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { PermitPipeline } from '../pipeline';

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export interface UploadServiceOptions {
  pipeline: PermitPipeline;
  logger: Logger;
  corsOrigins: readonly string[];
}

/**
 * Builds the HTTP surface of the intake: uploads, the draft list, approval,
 * document download and the administrative cache/draft purges.
 */
export function createApp({ pipeline, logger, corsOrigins }: UploadServiceOptions): express.Express {
  const app = express();
  const upload = multer({ limits: { fileSize: MAX_UPLOAD_BYTES } }); // in-memory storage of files
  const log = logger.child({ component: 'upload-service' });

  // Enable CORS for all routes
  app.use(cors({
    origin: [...corsOrigins],
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  /**
   * Handles permit submissions via an HTTP POST request.
   *
   * @route POST /api/upload
   * @middleware upload.single('file') - Expects a single file field named 'file'.
   *
   * Responds with the pipeline outcome: `draft_created`, `incomplete_data`
   * (with the missing fields) or `validation_failed`.
   */
  app.post('/api/upload', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    if (!req.file) {
      return res.status(400).json({ error: 'No file provided. Please ensure the file field is named "file".' });
    }

    try {
      const outcome = await pipeline.processFile(req.file.originalname, req.file.buffer, 'upload');
      log.info({ requestId: outcome.requestId, status: outcome.status }, 'Upload processed');
      res.status(200).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/drafts', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(await pipeline.listDrafts());
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/drafts/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const draft = await pipeline.getDraft(req.params.id);
      if (!draft) {
        return res.status(404).json({ error: `Draft ${req.params.id} not found`, code: 'DRAFT_NOT_FOUND' });
      }
      res.status(200).json(draft);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/approve/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const draft = await pipeline.approveDraft(req.params.id);
      res.status(200).json({ status: draft.status, draftId: draft.id, approvedAt: draft.approvedAt });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/clear-cache', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const cleared = await pipeline.clearCache();
      res.status(200).json({ status: 'success', message: `Cleared ${cleared} cache entries` });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/clear-drafts', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await pipeline.resetAll();
      res.status(200).json({ status: 'success', cleared: summary });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Streams a rendered document of a draft as an attachment.
   *
   * @route GET /api/download/:id/:docType
   */
  app.get('/api/download/:id/:docType', async (req: Request, res: Response, next: NextFunction) => {
    const { id, docType } = req.params;
    try {
      const documentPath = await pipeline.getDocumentPath(id, docType);
      const exists = await stat(documentPath).then((stats) => stats.isFile(), () => false);
      if (!exists) {
        return res.status(404).json({ error: 'Document not found', code: 'DOCUMENT_MISSING' });
      }
      res.download(documentPath, `${docType}_${id}.docx`, (err) => {
        if (err) {
          log.error({ err, draftId: id, docType }, 'Document download failed');
        }
      });
    } catch (error) {
      next(error);
    }
  });

  const handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: err.message, code: err.code });
    }
    if (err instanceof PermitServiceError) {
      if (err.statusCode >= 500) {
        log.error({ err }, 'Request failed');
      }
      return res.status(err.statusCode).json({ error: err.message, code: err.code });
    }
    log.error({ err }, 'Unexpected error');
    res.status(500).json({ error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
  };
  app.use(handleError);

  return app;
}
