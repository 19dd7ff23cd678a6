/**
 * PostgreSQL Connection Manager
 * Owns the connection pool for the forecast store. Each operation borrows one
 * client, runs inside a single transaction and returns the client on every
 * exit path. A client whose operation was cancelled is destroyed instead of
 * being returned, so the server rolls back anything still open on it.
 */

import { Pool, PoolConfig } from 'pg';
import { FORECAST_SCHEMA } from './forecast.schema';
import {
  ForecastStoreError,
  StoreUnavailableError,
  describeError,
} from '../errors/store.errors';
import { DecodingError, EncodingError } from '../encoding/encoding.errors';

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number;
}

export interface SqlClient {
  query(text: string, values?: readonly unknown[]): Promise<SqlResult>;
}

export interface PooledSqlClient extends SqlClient {
  release(destroy?: Error | boolean): void;
}

export interface SqlPool {
  connect(): Promise<PooledSqlClient>;
  end(): Promise<void>;
}

export type PoolFactory = (config: PoolConfig) => SqlPool;

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  ssl: boolean;
  maxConnections: number;
  instanceId: string;
  autoMigrate: boolean;
  connectionTimeoutMs?: number;
}

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export interface TransactionOptions {
  /** Aborting the signal destroys the borrowed client */
  signal?: AbortSignal;
  isolation?: IsolationLevel;
  readOnly?: boolean;
  /** Server-side statement_timeout for the transaction */
  statementTimeoutMs?: number;
}

/**
 * Default factory: a real pg Pool narrowed to the calls the store makes
 */
export const createPgPool: PoolFactory = (config) => {
  const pool = new Pool(config);

  pool.on('error', (error) => {
    console.error('Postgres: idle client error:', error.message);
  });

  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, values) => {
          const result = await client.query(text, values ? [...values] : undefined);
          return { rows: result.rows, rowCount: result.rowCount ?? 0 };
        },
        release: (destroy) => client.release(destroy),
      };
    },
    end: () => pool.end(),
  };
};

const isDomainError = (error: unknown): boolean =>
  error instanceof ForecastStoreError || error instanceof EncodingError || error instanceof DecodingError;

const toStoreError = (context: string, error: unknown): Error => {
  if (isDomainError(error) && error instanceof Error) {
    return error;
  }
  return new StoreUnavailableError(`${context}: ${describeError(error)}`, 'STORE_UNAVAILABLE', { cause: error });
};

function beginStatement(options: TransactionOptions): string {
  const parts = ['BEGIN'];
  if (options.isolation) {
    parts.push(`ISOLATION LEVEL ${options.isolation.toUpperCase()}`);
  }
  if (options.readOnly) {
    parts.push('READ ONLY');
  }
  return parts.join(' ');
}

export class PostgresConnection {
  private pool: SqlPool | null = null;

  constructor(
    private readonly config: PostgresConfig,
    private readonly poolFactory: PoolFactory = createPgPool
  ) {}

  get instanceId(): string {
    return this.config.instanceId;
  }

  get databaseName(): string {
    return this.config.database;
  }

  isOpen(): boolean {
    return this.pool !== null;
  }

  /**
   * Create the pool and, when configured, apply the schema
   */
  async open(): Promise<void> {
    if (this.pool) {
      return;
    }

    this.pool = this.poolFactory({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      ssl: this.config.ssl ? { rejectUnauthorized: false } : undefined,
      max: this.config.maxConnections,
      connectionTimeoutMillis: this.config.connectionTimeoutMs ?? 5000,
    });
    console.log(`Postgres: Pool created for ${this.config.instanceId}/${this.config.database}`);

    if (this.config.autoMigrate) {
      await this.migrate();
    }
  }

  /**
   * Drain and close the pool
   */
  async close(): Promise<void> {
    if (!this.pool) {
      return;
    }
    const pool = this.pool;
    this.pool = null;
    await pool.end();
    console.log('Postgres: Pool closed');
  }

  async migrate(): Promise<void> {
    await this.transaction(async (client) => {
      for (const statement of FORECAST_SCHEMA) {
        await client.query(statement);
      }
    });
    console.log('Postgres: Schema ready');
  }

  /**
   * Run `work` in one transaction on one borrowed client
   */
  async transaction<T>(work: (client: SqlClient) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const pool = this.pool;
    if (!pool) {
      throw new StoreUnavailableError('Database connection is not open');
    }

    const { signal } = options;
    if (signal?.aborted) {
      throw new StoreUnavailableError('Operation cancelled before it started', 'STORE_TIMEOUT');
    }

    const client = await pool.connect().catch((error: unknown) => {
      throw toStoreError('Failed to acquire a database connection', error);
    });

    let released = false;
    const release = (destroy?: Error): void => {
      if (!released) {
        released = true;
        client.release(destroy);
      }
    };
    // The deadline may pass while waiting for a pooled client
    if (signal?.aborted) {
      release(new Error('Operation deadline exceeded'));
      throw new StoreUnavailableError('Operation cancelled while acquiring a connection', 'STORE_TIMEOUT');
    }
    const onAbort = (): void => release(new Error('Operation deadline exceeded'));
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await client.query(beginStatement(options));
      if (options.statementTimeoutMs !== undefined) {
        const timeout = Math.max(1, Math.floor(options.statementTimeoutMs));
        await client.query(`SET LOCAL statement_timeout = ${timeout}`);
      }
      const result = await work(client);
      if (signal?.aborted) {
        throw new StoreUnavailableError('Operation deadline exceeded before commit', 'STORE_TIMEOUT');
      }
      await client.query('COMMIT');
      return result;
    } catch (error) {
      if (!released) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          console.error('Postgres: Rollback failed:', describeError(rollbackError));
          release(rollbackError instanceof Error ? rollbackError : new Error(describeError(rollbackError)));
        }
      }
      throw toStoreError('Database operation failed', error);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      release();
    }
  }
}
