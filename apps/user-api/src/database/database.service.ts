import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createPool, type Pool, type PoolConnection } from 'mysql2/promise';
import { JsonLogger } from '../logging/json-logger.service';
import { RepositoryError } from './repository.errors';

/**
 * SqlExecutor - What repositories need from the database: tagged-template queries
 * and a whitelisted UPDATE builder. Implemented by the pool and by transactions.
 */
export interface SqlExecutor {
  sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T>;
  updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<void>;
}

interface Statement {
  sql: string;
  params: unknown[];
}

const identifierPattern = /^[A-Za-z0-9_]+$/;

function assertSafeIdentifier(identifier: string) {
  if (!identifierPattern.test(identifier)) {
    throw new Error(`Unsafe SQL identifier: ${identifier}`);
  }
}

function toBacktickedIdentifier(identifier: string): string {
  assertSafeIdentifier(identifier);
  return `\`${identifier}\``;
}

/**
 * Turn a tagged template into SQL text with "?" placeholders
 */
export function templateToSql(strings: TemplateStringsArray, valueCount: number): string {
  let sql = '';
  for (let i = 0; i < strings.length; i++) {
    sql += strings[i];
    if (i < valueCount) {
      sql += '?';
    }
  }
  return sql;
}

/**
 * Build a parameterized UPDATE. Undefined values are skipped; returns null when nothing changes.
 * Exported for unit tests.
 */
export function buildUpdateStatement(
  table: string,
  keyColumn: string,
  keyValue: unknown,
  updates: Record<string, unknown>,
  allowedColumns: readonly string[]
): Statement | null {
  const updateEntries = Object.entries(updates).filter(([, v]) => v !== undefined);
  if (updateEntries.length === 0) {
    return null;
  }

  const allowed = new Set(allowedColumns);
  const setClauses: string[] = [];
  const params: unknown[] = [];

  for (const [column, value] of updateEntries) {
    if (!allowed.has(column)) {
      throw new Error(`Disallowed update column: ${column}`);
    }
    setClauses.push(`${toBacktickedIdentifier(column)} = ?`);
    params.push(value);
  }
  params.push(keyValue);

  return {
    sql: `UPDATE ${toBacktickedIdentifier(table)} SET ${setClauses.join(', ')} WHERE ${toBacktickedIdentifier(keyColumn)} = ?`,
    params
  };
}

/**
 * Executor bound to a single connection (used inside transactions)
 */
class ConnectionExecutor implements SqlExecutor {
  constructor(private readonly connection: PoolConnection) {}

  async sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    return runQuery<T>(this.connection, templateToSql(strings, params.length), params);
  }

  async updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<void> {
    const statement = buildUpdateStatement(table, keyColumn, keyValue, updates, allowedColumns);
    if (!statement) return;
    await runQuery(this.connection, statement.sql, statement.params);
  }
}

async function runQuery<T>(connection: PoolConnection, sql: string, params: unknown[]): Promise<T> {
  try {
    // SQL text comes from a tagged template or buildUpdateStatement; values are bound as "?" parameters.
    const [rows] = await connection.query(sql, params);
    return rows as T;
  } catch (error: unknown) {
    throw RepositoryError.from(error, 'Query failed');
  }
}

/**
 * DatabaseService - Owns the mysql2 connection pool.
 * Password auth; TLS on unless DB_SSL=false. The pool's connectTimeout bounds how long
 * a query may wait for a connection, and a timeout surfaces as a connection RepositoryError.
 */
@Injectable()
export class DatabaseService implements SqlExecutor, OnModuleInit, OnModuleDestroy {
  private pool?: Pool;

  constructor(
    private readonly config: ConfigService,
    private readonly logger: JsonLogger
  ) {}

  onModuleInit() {
    const host = this.config.get<string>('DB_HOST');
    const user = this.config.get<string>('DB_USER');
    const database = this.config.get<string>('DB_NAME');

    if (!host || !user || !database) {
      this.logger.warn('Database configuration missing; pool not created');
      return;
    }

    const port = Number(this.config.get<number>('DB_PORT') ?? 3306);
    const password = this.config.get<string>('DB_PASSWORD');
    const sslEnabled = this.config.get<boolean>('DB_SSL') ?? true;

    this.pool = createPool({
      host,
      port,
      user,
      password,
      database,
      connectTimeout: this.config.get<number>('DB_CONNECT_TIMEOUT_MS') ?? 10_000,
      // birthdate is read as a 'YYYY-MM-DD' string
      dateStrings: ['DATE'],
      connectionLimit: this.config.get<number>('DB_CONNECTION_LIMIT') ?? 10,
      ...(sslEnabled ? { ssl: { rejectUnauthorized: true } } : {})
    });

    this.logger.log('Database pool initialized', { host, port, database, ssl: sslEnabled });
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
    }
  }

  async getConnection(): Promise<PoolConnection> {
    if (!this.pool) {
      throw RepositoryError.connection('Database pool is not initialized');
    }
    try {
      return await this.pool.getConnection();
    } catch (error: unknown) {
      throw RepositoryError.from(error, 'Acquire connection');
    }
  }

  // Tagged-template SQL helper. Interpolations become prepared-statement parameters.
  // Usage: await db.sql`SELECT * FROM users WHERE id = ${id}`
  async sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    const connection = await this.getConnection();
    try {
      return await new ConnectionExecutor(connection).sql<T>(strings, ...params);
    } finally {
      connection.release();
    }
  }

  async updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<void> {
    const connection = await this.getConnection();
    try {
      await new ConnectionExecutor(connection).updateByKey(table, keyColumn, keyValue, updates, allowedColumns);
    } finally {
      connection.release();
    }
  }

  /**
   * Run `work` on one connection inside BEGIN/COMMIT.
   * Anything thrown by `work` (including an authorization denial discovered after a write)
   * rolls the transaction back and is rethrown.
   */
  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const connection = await this.getConnection();
    try {
      await connection.beginTransaction().catch((error: unknown) => {
        throw RepositoryError.from(error, 'Begin transaction');
      });
      const result = await work(new ConnectionExecutor(connection));
      await connection.commit().catch((error: unknown) => {
        throw RepositoryError.from(error, 'Commit transaction');
      });
      return result;
    } catch (error: unknown) {
      try {
        await connection.rollback();
      } catch (rollbackError: unknown) {
        this.logger.error('Transaction rollback failed', {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
        });
      }
      throw error;
    } finally {
      connection.release();
    }
  }
}
