import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, type PoolClient } from 'pg';
import { ConfigService } from './config.service';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  // Lazy-initialized pool; optional to avoid non-null assertion
  private pool?: Pool;
  private readonly logger = new Logger(DatabaseService.name);

  constructor(@Inject(ConfigService) private readonly cfg: ConfigService) {}

  getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({ connectionString: this.cfg.databaseUrl });
      this.pool.on('error', (error) => {
        this.logger.error(`Idle PostgreSQL client error: ${error.message}`);
      });
    }
    return this.pool;
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT on a dedicated client; any throw rolls the
   * whole unit back and is rethrown.
   */
  async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getPool().connect();
    // Set when the client cannot be trusted anymore; pg then destroys it instead of pooling it
    let brokenClient: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        brokenClient = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        this.logger.error(`ROLLBACK failed: ${brokenClient.message}`);
      }
      throw error;
    } finally {
      client.release(brokenClient);
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = undefined;
    await pool.end();
  }
}
