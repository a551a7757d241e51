import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { createReadStream } from 'fs';
import { access, mkdir, unlink, writeFile } from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { AllConfigType } from '../../../config/config.type';
import {
  FileStoragePort,
  StoredFile,
} from '../../domain/ports/file-storage.port';

/**
 * Local disk storage
 *
 * Layout: <uploadDir>/opinion_requests/<requestId>/<hex>_<originalName>
 *
 * Security:
 * - Original names are reduced to their base name and a safe character set
 * - Never log file contents
 */
@Injectable()
export class LocalFileStorageAdapter extends FileStoragePort {
  private readonly logger = new Logger(LocalFileStorageAdapter.name);
  private readonly baseDir: string;

  constructor(configService: ConfigService<AllConfigType>) {
    super();
    this.baseDir = path.resolve(
      configService.getOrThrow('files.uploadDir', { infer: true }),
    );
  }

  async save(
    buffer: Buffer,
    originalName: string,
    requestId: number,
    sizeLimitBytes: number,
  ): Promise<StoredFile> {
    if (buffer.length > sizeLimitBytes) {
      throw new Error(
        `File exceeds storage limit of ${sizeLimitBytes} bytes: ${originalName}`,
      );
    }

    const requestDir = path.join(
      this.baseDir,
      'opinion_requests',
      String(requestId),
    );
    await mkdir(requestDir, { recursive: true });

    const storedName = `${randomBytes(16).toString('hex')}_${this.safeName(originalName)}`;
    const filePath = path.join(requestDir, storedName);
    await writeFile(filePath, buffer, { flag: 'wx' });

    this.logger.debug(
      `Stored file for request ${requestId}: ${storedName} (${buffer.length} bytes)`,
    );

    return { path: filePath, storedName, size: buffer.length };
  }

  async remove(filePath: string): Promise<boolean> {
    const resolved = this.resolveInsideBase(filePath);
    try {
      await unlink(resolved);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not remove stored file: ${message}`);
      return false;
    }
  }

  async read(filePath: string): Promise<Readable> {
    const resolved = this.resolveInsideBase(filePath);
    try {
      await access(resolved);
    } catch {
      throw new NotFoundException('Stored file not found');
    }
    return createReadStream(resolved);
  }

  private safeName(originalName: string): string {
    const base = path.basename(originalName).replace(/[^A-Za-z0-9._-]/g, '_');
    return base.length > 0 ? base : 'file';
  }

  private resolveInsideBase(filePath: string): string {
    const resolved = path.resolve(filePath);
    if (!resolved.startsWith(this.baseDir + path.sep)) {
      throw new Error('Refusing to touch a path outside the upload directory');
    }
    return resolved;
  }
}
