import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import apiRouter from './api';
import { SubtitleError, UsageError } from './subtitles';
import { config } from './config';

const REQUEST_ID_HEADER = 'X-Request-Id';

function requestIdOf(res: Response): string {
  const id = res.getHeader(REQUEST_ID_HEADER);
  return typeof id === 'string' ? id : '-';
}

/**
 * Builds the HTTP application without binding a port
 */
export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ exposedHeaders: [REQUEST_ID_HEADER] }));
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader(REQUEST_ID_HEADER, uuidv4());
    next();
  });

  // API routes
  app.use('/api', apiRouter);

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error(`[${requestIdOf(res)}] Error:`, err.message);

    if (err instanceof UsageError) {
      res.status(400).json({ error: err.message, kind: err.kind });
      return;
    }

    if (err instanceof SubtitleError) {
      res.status(422).json({ error: err.message, kind: err.kind });
      return;
    }

    if (err instanceof multer.MulterError) {
      const tooLarge = err.code === 'LIMIT_FILE_SIZE' || err.code === 'LIMIT_FILE_COUNT';
      res.status(tooLarge ? 413 : 400).json({ error: err.message });
      return;
    }

    res.status(500).json({
      error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
