import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolConfig } from 'pg';
import type { AppConfig, DatabaseConfig } from '../config/index.js';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService<AppConfig>) {}

  isConfigured(): boolean {
    return Boolean(this.configService.get<DatabaseConfig>('database')?.url);
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
      max: 10,
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

  getPool(): Pool {
    return this.ensurePool();
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
    }
  }
}
