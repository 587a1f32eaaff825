import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool, PoolConfig } from 'pg';
import { getErrorMessage } from '@app/shared-types';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

function readInt(configService: ConfigService, key: string, fallback: number): number {
  const parsed = parseInt(String(configService.get(key) ?? fallback), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * pg pool settings from DATABASE_* variables
 */
export function buildPoolConfig(configService: ConfigService): PoolConfig {
  return {
    host: configService.get<string>('DATABASE_HOST', 'localhost'),
    port: readInt(configService, 'DATABASE_PORT', 5432),
    user: configService.get<string>('DATABASE_USER', 'postgres'),
    password: configService.get<string>('DATABASE_PASSWORD', 'postgres'),
    database: configService.get<string>('DATABASE_NAME', 'lecture_feedback'),
    max: readInt(configService, 'DATABASE_POOL_MAX', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: readInt(
      configService,
      'DATABASE_CONNECT_TIMEOUT_MS',
      2000,
    ),
  };
}

/**
 * Owns the pg pool and the drizzle handle the repositories query through.
 * Schema migrations are generated and applied with drizzle-kit, outside
 * both applications.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool?: Pool;
  private _db?: Database;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const config = buildPoolConfig(this.configService);
    this.logger.log(
      `Connecting to postgres://${config.host}:${config.port}/${config.database} (pool max ${config.max})`,
    );

    const pool = new Pool(config);
    try {
      await pool.query('SELECT 1');
    } catch (error) {
      this.logger.error(
        `Database unreachable: ${getErrorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      await pool.end();
      throw error;
    }

    this.pool = pool;
    this._db = drizzle(pool, { schema });
    this.logger.log('Database pool ready');
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.pool) {
      return;
    }
    const pool = this.pool;
    this.pool = undefined;
    this._db = undefined;
    try {
      await pool.end();
      this.logger.log('Database pool closed');
    } catch (error) {
      this.logger.warn(`Error closing database pool: ${getErrorMessage(error)}`);
    }
  }

  get db(): Database {
    if (!this._db) {
      throw new Error('Database not initialized');
    }
    return this._db;
  }

  /**
   * Readiness probe; false until the pool is up or while a query fails
   */
  async healthCheck(): Promise<boolean> {
    if (!this.pool) {
      return false;
    }
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`Database health check failed: ${getErrorMessage(error)}`);
      return false;
    }
  }
}
