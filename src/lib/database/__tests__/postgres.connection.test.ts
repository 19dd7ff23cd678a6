/**
 * PostgreSQL Connection Tests
 * Transaction handling against a mocked pg pool
 */

import { PostgresConfig, PostgresConnection } from '../postgres.connection';
import { FORECAST_SCHEMA } from '../forecast.schema';
import { InvalidForecastError, StoreUnavailableError } from '../../errors/store.errors';
import {
  MockSqlClient,
  MockSqlPool,
  createMockPoolFactory,
  createMockSqlClient,
  createMockSqlPool,
  createMockSqlPoolFailure,
} from '../../../__tests__/helpers/mocks';

const config: PostgresConfig = {
  host: 'localhost',
  port: 5432,
  database: 'weather_test',
  user: 'postgres',
  password: 'test-secret',
  ssl: false,
  maxConnections: 4,
  instanceId: 'test-instance',
  autoMigrate: false,
};

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('PostgresConnection', () => {
  let client: MockSqlClient;
  let pool: MockSqlPool;
  let connection: PostgresConnection;

  beforeEach(async () => {
    client = createMockSqlClient();
    pool = createMockSqlPool(client);
    connection = new PostgresConnection(config, createMockPoolFactory(pool));
    await connection.open();
  });

  describe('open and close', () => {
    it('should create the pool from the configuration', async () => {
      const factory = createMockPoolFactory(createMockSqlPool());
      await new PostgresConnection(config, factory).open();

      expect(factory).toHaveBeenCalledWith(
        expect.objectContaining({
          host: 'localhost',
          port: 5432,
          database: 'weather_test',
          user: 'postgres',
          max: 4,
          ssl: undefined,
        })
      );
    });

    it('should apply the schema in one transaction when auto-migrating', async () => {
      const migratingClient = createMockSqlClient();
      const migrating = new PostgresConnection(
        { ...config, autoMigrate: true },
        createMockPoolFactory(createMockSqlPool(migratingClient))
      );

      await migrating.open();

      expect(migratingClient.statements).toHaveLength(FORECAST_SCHEMA.length + 2);
      expect(migratingClient.statements[0]).toBe('BEGIN');
      expect(migratingClient.statements[1]).toContain('CREATE TABLE IF NOT EXISTS forecasts');
      expect(migratingClient.statements[FORECAST_SCHEMA.length + 1]).toBe('COMMIT');
    });

    it('should not touch the schema otherwise', () => {
      expect(client.query).not.toHaveBeenCalled();
    });

    it('should end the pool on close', async () => {
      await connection.close();

      expect(pool.end).toHaveBeenCalledTimes(1);
      expect(connection.isOpen()).toBe(false);
      await expect(connection.transaction(async () => 1)).rejects.toThrow('Database connection is not open');
    });
  });

  describe('transaction', () => {
    it('should commit and release the client', async () => {
      const result = await connection.transaction(async (sql) => {
        await sql.query('SELECT 1');
        return 'done';
      });

      expect(result).toBe('done');
      expect(client.statements).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
      expect(client.release).toHaveBeenCalledTimes(1);
      expect(client.release.mock.calls[0][0]).toBeUndefined();
    });

    it('should open the transaction with the requested isolation and timeout', async () => {
      await connection.transaction(async () => undefined, {
        isolation: 'repeatable read',
        readOnly: true,
        statementTimeoutMs: 250,
      });

      expect(client.statements).toEqual([
        'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY',
        'SET LOCAL statement_timeout = 250',
        'COMMIT',
      ]);
    });

    it('should roll back and wrap unexpected failures', async () => {
      const failing = connection.transaction(async () => {
        throw new Error('relation "forecasts" does not exist');
      });

      await expect(failing).rejects.toBeInstanceOf(StoreUnavailableError);
      await expect(failing).rejects.toThrow('Database operation failed: relation "forecasts" does not exist');
      expect(client.statements).toEqual(['BEGIN', 'ROLLBACK']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should pass store errors through unchanged', async () => {
      const invalid = new InvalidForecastError('City is required');

      await expect(
        connection.transaction(async () => {
          throw invalid;
        })
      ).rejects.toBe(invalid);
    });

    it('should destroy the client when a rollback fails', async () => {
      client.query.mockImplementation(async (text: string) => {
        client.statements.push(text);
        if (text === 'ROLLBACK') {
          throw new Error('connection terminated');
        }
        return { rows: [], rowCount: 0 };
      });

      await expect(
        connection.transaction(async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('Database operation failed: boom');

      expect(client.release).toHaveBeenCalledTimes(1);
      expect(client.release.mock.calls[0][0]).toBeInstanceOf(Error);
    });

    it('should surface an unreachable server as StoreUnavailableError', async () => {
      const unreachable = new PostgresConnection(config, () => createMockSqlPoolFailure());
      await unreachable.open();

      await expect(unreachable.transaction(async () => 1)).rejects.toMatchObject({
        name: 'StoreUnavailableError',
        code: 'STORE_UNAVAILABLE',
        retryable: true,
      });
    });
  });

  describe('cancellation', () => {
    it('should refuse to start once the signal has aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        connection.transaction(async () => 1, { signal: controller.signal })
      ).rejects.toMatchObject({ code: 'STORE_TIMEOUT' });
      expect(pool.connect).not.toHaveBeenCalled();
    });

    it('should not use a client acquired after the deadline', async () => {
      const controller = new AbortController();
      let deliver: () => void = () => undefined;
      pool.connect.mockImplementationOnce(
        () =>
          new Promise<MockSqlClient>((resolve) => {
            deliver = () => resolve(client);
          })
      );
      const work = jest.fn(async () => 1);

      const pending = connection.transaction(work, { signal: controller.signal });
      await flush();
      controller.abort();
      deliver();

      await expect(pending).rejects.toMatchObject({ name: 'StoreUnavailableError', code: 'STORE_TIMEOUT' });
      expect(work).not.toHaveBeenCalled();
      expect(client.statements).toEqual([]);
      expect(client.release).toHaveBeenCalledTimes(1);
      expect(client.release.mock.calls[0][0]).toBeInstanceOf(Error);
    });

    it('should not commit work that finished after the deadline', async () => {
      const controller = new AbortController();

      await expect(
        connection.transaction(
          async () => {
            controller.abort();
            return 1;
          },
          { signal: controller.signal }
        )
      ).rejects.toMatchObject({ code: 'STORE_TIMEOUT' });
      expect(client.statements).toEqual(['BEGIN']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should destroy the client when aborted mid-transaction', async () => {
      const controller = new AbortController();
      let failWork: (error: Error) => void = () => undefined;

      const pending = connection.transaction(
        () =>
          new Promise<never>((_resolve, reject) => {
            failWork = reject;
          }),
        { signal: controller.signal }
      );
      await flush();

      controller.abort();
      expect(client.release).toHaveBeenCalledTimes(1);
      expect(client.release.mock.calls[0][0]).toBeInstanceOf(Error);

      failWork(new Error('Connection terminated'));
      await expect(pending).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(client.statements).toEqual(['BEGIN']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });
  });
});
