import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolConfig, QueryResultRow } from 'pg';
import type { AppConfig, DatabaseConfig } from '../config/index.js';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;
  private readonly configService: ConfigService<AppConfig>;

  constructor(@Inject(ConfigService) configService: ConfigService<AppConfig>) {
    this.configService = configService;
    // the pool is created on first query, not at module init
  }

  private ensurePool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const database = this.configService.get<DatabaseConfig>('database');
    if (!database?.url) {
      throw new Error('DATABASE_URL is not configured');
    }

    const config: PoolConfig = {
      connectionString: database.url,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
      max: 20,
    };

    if (database.ssl) {
      config.ssl = {
        rejectUnauthorized: false,
      };
    }

    this.pool = new Pool(config);

    this.pool.on('error', (err) => {
      this.logger.error('Unexpected database pool error', err.stack);
    });

    return this.pool;
  }

  /** Run a single statement and return its rows. */
  async query<R extends QueryResultRow>(
    text: string,
    values: unknown[] = [],
  ): Promise<R[]> {
    const { rows } = await this.ensurePool().query<R>(text, values);
    return rows;
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
