import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { sql } from 'drizzle-orm';
import {
  drizzle,
  type NodePgQueryResultHKT,
} from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import { AppConfigService } from '../config/app-config.service';
import { formatError } from '../../shared/logging/format-error.util';
import * as schema from './schema';

/** Drizzle handle; transactions share the same query surface. */
export type Database = PgDatabase<NodePgQueryResultHKT, typeof schema>;

/**
 * Wraps repository calls and warns when one runs longer than the configured
 * threshold. A threshold of 0 disables the measurement.
 */
export class QueryTimer {
  constructor(
    private readonly slowQueryMs: number,
    private readonly logger: Logger,
  ) {}

  async measure<T>(label: string, work: () => Promise<T>): Promise<T> {
    if (this.slowQueryMs <= 0) return work();
    const started = Date.now();
    try {
      return await work();
    } finally {
      const duration = Date.now() - started;
      if (duration >= this.slowQueryMs) {
        this.logger.warn(`slow db query: ${label} ${duration}ms`);
      }
    }
  }
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;
  readonly db: Database;
  readonly timer: QueryTimer;

  constructor(private readonly config: AppConfigService) {
    this.pool = new Pool({
      connectionString: config.getDatabaseUrl(),
      max: config.getDbPoolMax(),
    });
    this.pool.on('error', (err) => {
      this.logger.error(`idle pg client error: ${formatError(err)}`);
    });
    this.db = drizzle(this.pool, { schema });
    this.timer = new QueryTimer(config.getDbSlowQueryMs(), this.logger);
  }

  async onModuleInit() {
    // surfaces a bad DATABASE_URL at boot instead of on the first request
    const client = await this.pool.connect();
    client.release();
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}
