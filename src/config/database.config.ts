import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { Movie } from '../entities/movie.entity';
import { Review } from '../entities/review.entity';

/** Env values arrive as strings; only a literal `true`/`false` overrides the default. */
export function readFlag(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = configService.get<string>(key);
  if (raw === undefined) return fallback;
  const normalized = String(raw).trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return fallback;
}

@Injectable()
export class DatabaseConfig implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return {
      type: 'postgres',
      host: this.configService.get<string>('DB_HOST', 'localhost'),
      port: Number(this.configService.get<string>('DB_PORT', '5432')),
      username: this.configService.get<string>('DB_USERNAME', 'postgres'),
      password: this.configService.get<string>('DB_PASSWORD', 'postgres'),
      database: this.configService.get<string>('DB_NAME', 'movie_catalog'),
      entities: [Movie, Review],
      // development convenience; turn off once migrations exist
      synchronize: readFlag(this.configService, 'DB_SYNCHRONIZE', true),
      logging: readFlag(this.configService, 'DB_LOGGING', false),
      retryAttempts: 3,
      retryDelay: 3000,
    };
  }
}
