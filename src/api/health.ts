import { Router, type Request, type Response } from 'express';
import { EDIT_OPERATIONS } from '../subtitles';
import { config } from '../config';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    version: config.version,
    operations: [...EDIT_OPERATIONS, 'merge'],
  });
});

export default router;
