/**
 * Document upload middleware
 *
 * Files are kept in memory: adapters parse from a Buffer and nothing is
 * written to disk.
 */

import { Request } from 'express';
import multer from 'multer';
import { extname } from 'path';
import { env } from '../config';
import { SUPPORTED_EXTENSIONS } from '../parsing';
import { AppError } from '../utils';

/**
 * Accepts only extensions a document adapter exists for
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const extension = extname(file.originalname).toLowerCase();

  if (SUPPORTED_EXTENSIONS.includes(extension)) {
    cb(null, true);
  } else {
    cb(AppError.badRequest(`Only ${SUPPORTED_EXTENSIONS.join(', ')} files are allowed`));
  }
};

/**
 * Single `file` field, MAX_UPLOAD_MB at most
 */
export const uploadDocument = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_MB * 1024 * 1024,
    files: 1,
  },
}).single('file');

export default uploadDocument;
