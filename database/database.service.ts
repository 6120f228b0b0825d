import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

/** Anything queries can run on: the pooled handle or an open transaction. */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;
  readonly db: Database;

  constructor(configService: ConfigService) {
    this.pool = new Pool({
      connectionString: configService.getOrThrow<string>('DATABASE_URL'),
      max: parseInt(configService.get<string>('DATABASE_POOL_MAX') ?? '10', 10),
    });
    this.pool.on('error', (error) => {
      this.logger.error(`Idle database client error: ${error.message}`, error.stack);
    });
    this.db = drizzle(this.pool, { schema });
  }

  async onModuleInit() {
    // Retry connection with exponential backoff
    const maxRetries = 3;
    const baseDelay = 1000; // 1 second

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const client = await this.pool.connect();
        client.release();
        this.logger.log('Database connection established');
        return;
      } catch (error) {
        if (attempt === maxRetries) {
          // The pool opens connections lazily on the first query anyway
          this.logger.warn(
            `Failed to connect to database after ${maxRetries} attempts. ` +
            'Connections will be opened on first query.',
          );
          this.logger.debug('Connection error:', error);
        } else {
          const delay = baseDelay * Math.pow(2, attempt - 1);
          this.logger.debug(
            `Database connection attempt ${attempt}/${maxRetries} failed. Retrying in ${delay}ms...`,
          );
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
