import { BadRequestException } from '@nestjs/common';
import * as path from 'path';

/**
 * A file received from the transport layer, before storage.
 */
export interface IncomingFile {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

export interface UploadPolicy {
  allowedExtensions: readonly string[];
  maxFileSizeBytes: number;
}

export function fileExtension(fileName: string): string {
  return path.extname(fileName).replace(/^\./, '').toLowerCase();
}

/**
 * Validate every file of a batch before anything is stored.
 *
 * @throws BadRequestException naming the first offending file
 */
export function validateUploadBatch(
  files: readonly IncomingFile[],
  policy: UploadPolicy,
): void {
  for (const file of files) {
    if (!file.originalName) {
      throw new BadRequestException('Every uploaded file needs a file name');
    }

    const extension = fileExtension(file.originalName);
    if (!policy.allowedExtensions.includes(extension)) {
      throw new BadRequestException(
        `File type not allowed: ${file.originalName}. ` +
          `Allowed types: ${policy.allowedExtensions.join(', ')}`,
      );
    }

    if (file.size > policy.maxFileSizeBytes) {
      throw new BadRequestException(
        `File too large: ${file.originalName}. ` +
          `Maximum size is ${Math.floor(policy.maxFileSizeBytes / (1024 * 1024))} MB`,
      );
    }
  }
}
