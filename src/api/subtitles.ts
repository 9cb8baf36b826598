import { Router, type Request, type Response, type NextFunction } from 'express';
import multer from 'multer';
import path from 'path';
import {
  type EditOptions,
  type SubtitleEdit,
  SubtitleError,
  type SubtitleErrorKind,
  UsageError,
  editSrtContent,
  mergeSrtContents,
  parseEditOptions,
  resolveEditOperation,
} from '../subtitles';
import { config } from '../config';

const router = Router();

/**
 * Error handler wrapper
 */
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

/**
 * SRT uploads are small; keep them in memory and never touch the disk
 */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.maxFileSize,
    files: config.maxUploadFiles,
  },
  fileFilter: (_req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (ext === '.srt') {
      cb(null, true);
    } else {
      cb(new UsageError(`Unsupported file type: ${ext || file.originalname}`));
    }
  },
});

type FileResult =
  | { name: string; content: string }
  | { name: string; error: string; kind: SubtitleErrorKind };

function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}

/**
 * Collects the string fields sent alongside the files
 */
function readOptions(body: unknown): EditOptions {
  const options: EditOptions = {};
  if (body && typeof body === 'object') {
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === 'string') {
        options[key] = value;
      }
    }
  }
  return options;
}

/**
 * Applies the edit to one uploaded file; subtitle errors are reported per file
 */
function editFile(file: Express.Multer.File, edit: SubtitleEdit): FileResult {
  try {
    return { name: file.originalname, content: editSrtContent(file.buffer.toString('utf-8'), edit) };
  } catch (error) {
    if (error instanceof SubtitleError) {
      return { name: file.originalname, error: error.message, kind: error.kind };
    }
    throw error;
  }
}

/**
 * POST /api/subtitles/merge
 * Chain the uploaded SRT files back to back, in upload order
 */
router.post(
  '/merge',
  upload.array('files'),
  asyncHandler(async (req: Request, res: Response) => {
    const files = uploadedFiles(req);
    if (files.length === 0) {
      res.status(400).json({ error: 'No files uploaded' });
      return;
    }

    const content = mergeSrtContents(files.map((file) => file.buffer.toString('utf-8')));
    res.json({ content });
  })
);

/**
 * POST /api/subtitles/:operation
 * Apply shift, shiftby, stretch (squeeze), sync, reindex, shiftindex or replace to each
 * uploaded SRT file. Options are sent as form fields named like the CLI's long options.
 */
router.post(
  '/:operation',
  upload.array('files'),
  asyncHandler(async (req: Request, res: Response) => {
    const operation = req.params.operation ?? '';
    if (!resolveEditOperation(operation)) {
      res.status(404).json({ error: `Unknown operation: ${operation}` });
      return;
    }

    const files = uploadedFiles(req);
    if (files.length === 0) {
      res.status(400).json({ error: 'No files uploaded' });
      return;
    }

    const edit = parseEditOptions(operation, readOptions(req.body), {
      anchor: config.defaultAnchor,
    });
    const results = files.map((file) => editFile(file, edit));

    const failed = results.filter((result) => 'error' in result).length;
    const status = failed === 0 ? 200 : failed === results.length ? 422 : 207;

    res.status(status).json({ files: results });
  })
);

export default router;
