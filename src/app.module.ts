import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import { AllConfigType } from './config/config.type';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import filesConfig from './files/config/files.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { HomeModule } from './home/home.module';
import { OpinionRequestsModule } from './opinion-requests/opinion-requests.module';

const infrastructureDatabaseModule = TypeOrmModule.forRootAsync({
  useClass: TypeOrmConfigService,
  dataSourceFactory: async (options?: DataSourceOptions) => {
    if (!options) {
      throw new Error('TypeORM options were not provided');
    }
    return new DataSource(options).initialize();
  },
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, authConfig, databaseConfig, filesConfig, throttlerConfig],
      envFilePath: ['.env'],
    }),
    infrastructureDatabaseModule,
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    AuditModule,
    AuthModule,
    HomeModule,
    OpinionRequestsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
