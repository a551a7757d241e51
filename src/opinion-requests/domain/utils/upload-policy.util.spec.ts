import { BadRequestException } from '@nestjs/common';
import {
  IncomingFile,
  UploadPolicy,
  fileExtension,
  validateUploadBatch,
} from './upload-policy.util';

const policy: UploadPolicy = {
  allowedExtensions: ['pdf', 'doc', 'docx', 'xls', 'xlsx'],
  maxFileSizeBytes: 2 * 1024 * 1024,
};

function file(originalName: string, size = 10): IncomingFile {
  return {
    originalName,
    mimeType: 'application/octet-stream',
    size,
    buffer: Buffer.alloc(0),
  };
}

describe('upload policy', () => {
  describe('fileExtension', () => {
    it('should lower-case the extension without the dot', () => {
      expect(fileExtension('Budget.XLSX')).toBe('xlsx');
      expect(fileExtension('archive.tar.pdf')).toBe('pdf');
    });

    it('should return an empty string when there is no extension', () => {
      expect(fileExtension('README')).toBe('');
    });
  });

  describe('validateUploadBatch', () => {
    it('should accept allowed files within the size limit', () => {
      expect(() =>
        validateUploadBatch([file('a.pdf'), file('b.DOCX')], policy),
      ).not.toThrow();
    });

    it('should name the first disallowed file', () => {
      expect(() =>
        validateUploadBatch([file('a.pdf'), file('malware.exe')], policy),
      ).toThrow(
        new BadRequestException(
          'File type not allowed: malware.exe. Allowed types: pdf, doc, docx, xls, xlsx',
        ),
      );
    });

    it('should reject a file larger than the limit', () => {
      expect(() =>
        validateUploadBatch([file('big.pdf', 2 * 1024 * 1024 + 1)], policy),
      ).toThrow('File too large: big.pdf. Maximum size is 2 MB');
    });

    it('should accept a file exactly at the limit', () => {
      expect(() =>
        validateUploadBatch([file('edge.pdf', 2 * 1024 * 1024)], policy),
      ).not.toThrow();
    });

    it('should reject a file without a name', () => {
      expect(() => validateUploadBatch([file('')], policy)).toThrow(
        'Every uploaded file needs a file name',
      );
    });
  });
});
