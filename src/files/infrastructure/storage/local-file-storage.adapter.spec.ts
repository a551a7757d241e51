import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { AllConfigType } from '../../../config/config.type';
import { LocalFileStorageAdapter } from './local-file-storage.adapter';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('LocalFileStorageAdapter', () => {
  let uploadDir: string;
  let adapter: LocalFileStorageAdapter;

  beforeEach(async () => {
    uploadDir = await mkdtemp(path.join(os.tmpdir(), 'opinion-files-'));
    const config = new ConfigService<AllConfigType>({
      files: {
        uploadDir,
        maxFileSizeMb: 10,
        allowedExtensions: ['pdf'],
      },
    });
    adapter = new LocalFileStorageAdapter(config);
  });

  afterEach(async () => {
    await rm(uploadDir, { recursive: true, force: true });
  });

  it('should store the bytes under the request directory', async () => {
    const stored = await adapter.save(
      Buffer.from('budget figures'),
      'report.pdf',
      42,
      1024,
    );

    expect(stored.size).toBe(14);
    expect(stored.storedName).toMatch(/^[0-9a-f]{32}_report\.pdf$/);
    expect(path.dirname(stored.path)).toBe(
      path.join(path.resolve(uploadDir), 'opinion_requests', '42'),
    );
    expect(await readFile(stored.path, 'utf8')).toBe('budget figures');
  });

  it('should reduce the original name to a safe base name', async () => {
    const stored = await adapter.save(
      Buffer.from('x'),
      '../../etc/pass wd.pdf',
      1,
      1024,
    );

    expect(stored.storedName.endsWith('_pass_wd.pdf')).toBe(true);
  });

  it('should refuse a buffer over the size limit', async () => {
    await expect(
      adapter.save(Buffer.alloc(11), 'big.pdf', 1, 10),
    ).rejects.toThrow('File exceeds storage limit of 10 bytes: big.pdf');
  });

  it('should stream a stored file back', async () => {
    const stored = await adapter.save(Buffer.from('memo'), 'memo.pdf', 3, 1024);

    expect(await readAll(await adapter.read(stored.path))).toBe('memo');
  });

  it('should report false when removing a missing file', async () => {
    const stored = await adapter.save(Buffer.from('memo'), 'memo.pdf', 3, 1024);

    expect(await adapter.remove(stored.path)).toBe(true);
    expect(await adapter.remove(stored.path)).toBe(false);
  });

  it('should not read outside the upload directory', async () => {
    await expect(adapter.read('/etc/hosts')).rejects.toThrow(
      'Refusing to touch a path outside the upload directory',
    );
  });
});
