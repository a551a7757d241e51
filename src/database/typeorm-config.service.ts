import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', { infer: true });

    return {
      type: 'postgres',
      url: database.url,
      host: database.host,
      port: database.port,
      username: database.username,
      password: database.password,
      database: database.name,
      synchronize: database.synchronize,
      dropSchema: false,
      keepConnectionAlive: true,
      logging: database.logging,
      autoLoadEntities: true,
      migrationsRun: false,
      extra: {
        // based on https://node-postgres.com/api/pool
        // max connection pool size
        max: database.maxConnections,
        ssl: database.sslEnabled
          ? {
              rejectUnauthorized: database.rejectUnauthorized,
              ca: database.ca ?? undefined,
            }
          : undefined,
      },
    };
  }
}
