import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { FilesConfig } from './files-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  FILES_UPLOAD_DIR?: string;

  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  FILES_MAX_FILE_SIZE_MB?: number;

  // Comma separated, without dots (e.g. "pdf,docx")
  @IsString()
  @IsOptional()
  FILES_ALLOWED_EXTENSIONS?: string;
}

export default registerAs<FilesConfig>('files', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    uploadDir: process.env.FILES_UPLOAD_DIR || 'uploads',
    maxFileSizeMb: process.env.FILES_MAX_FILE_SIZE_MB
      ? parseInt(process.env.FILES_MAX_FILE_SIZE_MB, 10)
      : 10,
    allowedExtensions: (
      process.env.FILES_ALLOWED_EXTENSIONS || 'pdf,doc,docx,xls,xlsx'
    )
      .split(',')
      .map((extension) => extension.trim().toLowerCase().replace(/^\./, ''))
      .filter((extension) => extension.length > 0),
  };
});
