import { Readable } from 'stream';

export interface StoredFile {
  path: string;
  storedName: string;
  size: number;
}

/**
 * Bytes-on-disk collaborator for request documents.
 *
 * Type and size policy is enforced by the workflow before `save` is called;
 * `sizeLimitBytes` is a last line check owned by the storage itself.
 */
export abstract class FileStoragePort {
  abstract save(
    buffer: Buffer,
    originalName: string,
    requestId: number,
    sizeLimitBytes: number,
  ): Promise<StoredFile>;

  /**
   * @returns false when nothing was removed
   */
  abstract remove(path: string): Promise<boolean>;

  abstract read(path: string): Promise<Readable>;
}
