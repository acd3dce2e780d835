import { buildUpdateStatement, templateToSql, type SqlExecutor } from '../../src/database/database.service';
import type { DatabaseService } from '../../src/database/database.service';

export interface RecordedQuery {
  sql: string;
  params: unknown[];
}

type Responder = (query: RecordedQuery) => unknown;

/**
 * In-process stand-in for DatabaseService.
 * Queries are recorded with whitespace collapsed; the first responder whose pattern
 * matches answers, otherwise the query resolves to [].
 */
export class FakeDatabase implements SqlExecutor {
  readonly queries: RecordedQuery[] = [];
  committed = 0;
  rolledBack = 0;
  private readonly responders: Array<{ pattern: RegExp; respond: Responder }> = [];

  on(pattern: RegExp, respond: Responder): this {
    this.responders.push({ pattern, respond });
    return this;
  }

  async sql<T = unknown>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    return this.run<T>(templateToSql(strings, params.length), params);
  }

  async updateByKey(
    table: string,
    keyColumn: string,
    keyValue: unknown,
    updates: Record<string, unknown>,
    allowedColumns: readonly string[]
  ): Promise<void> {
    const statement = buildUpdateStatement(table, keyColumn, keyValue, updates, allowedColumns);
    if (statement) await this.run(statement.sql, statement.params);
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    try {
      const result = await work(this);
      this.committed += 1;
      return result;
    } catch (error: unknown) {
      this.rolledBack += 1;
      throw error;
    }
  }

  /** Statements whose text starts with `prefix` (e.g. 'DELETE', 'UPDATE') */
  statements(prefix: string): RecordedQuery[] {
    return this.queries.filter((query) => query.sql.startsWith(prefix));
  }

  asService(): DatabaseService {
    return this as unknown as DatabaseService;
  }

  private async run<T>(rawSql: string, params: unknown[]): Promise<T> {
    const query = { sql: rawSql.replace(/\s+/g, ' ').trim(), params };
    this.queries.push(query);
    const responder = this.responders.find(({ pattern }) => pattern.test(query.sql));
    return (responder ? responder.respond(query) : []) as T;
  }
}
