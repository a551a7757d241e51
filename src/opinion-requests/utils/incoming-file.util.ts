import { IncomingFile } from '../domain/utils/upload-policy.util';

/**
 * Map multer's in-memory uploads to the engine's file shape.
 */
export function toIncomingFiles(
  files: Express.Multer.File[] | undefined,
): IncomingFile[] {
  return (files ?? []).map((file) => ({
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    buffer: file.buffer,
  }));
}
