import multer from 'multer';
import { UnsupportedMediaTypeError } from '../errors/circle-art.errors';

const ACCEPTED_TYPES = new Set([
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/gif',
  'image/tiff',
  'image/avif'
]);

/**
 * In-memory upload handling: images go straight to sharp, nothing touches disk
 */
export function createUpload(limitBytes: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limitBytes, files: 1 },
    fileFilter: (req, file, callback) => {
      if (ACCEPTED_TYPES.has(file.mimetype)) {
        callback(null, true);
      } else {
        callback(new UnsupportedMediaTypeError(file.mimetype));
      }
    }
  });
}
