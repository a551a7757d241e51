import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import filesConfig from './config/files.config';
import { FileStoragePort } from './domain/ports/file-storage.port';
import { LocalFileStorageAdapter } from './infrastructure/storage/local-file-storage.adapter';

@Module({
  imports: [ConfigModule.forFeature(filesConfig)],
  providers: [
    {
      provide: FileStoragePort,
      useClass: LocalFileStorageAdapter,
    },
  ],
  exports: [FileStoragePort],
})
export class FilesModule {}
