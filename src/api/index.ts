import { Router } from 'express';
import subtitlesRouter from './subtitles';
import healthRouter from './health';

const router = Router();

router.use('/subtitles', subtitlesRouter);
router.use('/health', healthRouter);

export default router;
