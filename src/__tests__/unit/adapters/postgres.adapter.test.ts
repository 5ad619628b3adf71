import * as promClient from 'prom-client';
import { createPostgresDbAdapter, rewriteQuestionMarkPlaceholders, PostgresAdapterError, type PgPoolLike } from '../../../adapters/db/postgres.adapter';
import { normalizeTableFqn } from '../../../adapters/db/fqn.utils';
import type { DbRow } from '../../../services/ports/db.port';

function fakePool(rows: DbRow[] = []) {
  const query = jest.fn(async (_text: string, _values?: unknown[]) => ({ rows }));
  const release = jest.fn();
  const pool: PgPoolLike = {
    query,
    connect: jest.fn(async () => ({ release })),
    end: jest.fn(async () => undefined),
  };
  return { pool, query, release };
}

describe('Postgres adapter helpers', () => {
  it('rewrites question mark placeholders while respecting strings and comments', () => {
    const sql = "SELECT id FROM table WHERE id = ? AND note = '?' -- ? should be ignored";
    expect(rewriteQuestionMarkPlaceholders(sql)).toBe("SELECT id FROM table WHERE id = $1 AND note = '?' -- ? should be ignored");
  });

  it('leaves placeholders inside block comments and quoted identifiers alone', () => {
    expect(rewriteQuestionMarkPlaceholders('SELECT "a?" FROM data /* ignore ? */ WHERE flag = ? AND b = ?')).toBe(
      'SELECT "a?" FROM data /* ignore ? */ WHERE flag = $1 AND b = $2'
    );
  });

  it('normalizes schema-qualified table identifiers', () => {
    expect(normalizeTableFqn(' krs.accounts ')).toEqual({ schema: 'krs', table: 'accounts', identifier: 'krs.accounts' });
  });

  it('throws for invalid table identifiers', () => {
    expect(() => normalizeTableFqn('accounts')).toThrow('Invalid table FQN');
    expect(() => normalizeTableFqn('krs.accounts; DROP TABLE x')).toThrow('plain identifiers');
  });
});

describe('PostgresDbAdapter', () => {
  it('rewrites placeholders and maps undefined params to null', async () => {
    const { pool, query } = fakePool([{ id: 'a' }]);
    const adapter = createPostgresDbAdapter({ connectionString: 'postgres://test' }, pool);

    const rows = await adapter.query('SELECT id FROM krs.accounts WHERE id = ? AND user_id = ?', ['a', undefined]);

    expect(rows).toEqual([{ id: 'a' }]);
    expect(query).toHaveBeenCalledWith('SELECT id FROM krs.accounts WHERE id = $1 AND user_id = $2', ['a', null]);
  });

  it('returns the first row or null from queryOne', async () => {
    const adapter = createPostgresDbAdapter({}, fakePool([{ n: 1 }, { n: 2 }]).pool);
    expect(await adapter.queryOne('SELECT n FROM t')).toEqual({ n: 1 });

    const empty = createPostgresDbAdapter({}, fakePool([]).pool);
    expect(await empty.queryOne('SELECT n FROM t')).toBeNull();
  });

  it('builds quoted INSERT statements', async () => {
    const { pool, query } = fakePool();
    const adapter = createPostgresDbAdapter({}, pool);

    await adapter.insert('krs.accounts', { id: 'acc-1', user_id: 'op-1' });

    expect(query).toHaveBeenCalledWith('INSERT INTO krs.accounts ("id", "user_id") VALUES ($1, $2)', ['acc-1', 'op-1']);
  });

  it('builds UPDATE statements keyed by the id column and skips empty patches', async () => {
    const { pool, query } = fakePool();
    const adapter = createPostgresDbAdapter({}, pool);

    await adapter.update('krs.accounts', 'acc-1', { status: 'inactive', display_name: null });
    await adapter.update('krs.accounts', 'acc-1', {});

    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith('UPDATE krs.accounts SET "status" = $1, "display_name" = $2 WHERE "id" = $3', [
      'inactive',
      null,
      'acc-1',
    ]);
  });

  it('wraps driver errors with their SQLSTATE code', async () => {
    const { pool, query } = fakePool();
    query.mockRejectedValueOnce(Object.assign(new Error('duplicate key'), { code: '23505' }));
    const adapter = createPostgresDbAdapter({}, pool);

    const failure = adapter.query('INSERT INTO krs.accounts (id) VALUES (?)', ['a']);

    await expect(failure).rejects.toBeInstanceOf(PostgresAdapterError);
    await expect(failure).rejects.toMatchObject({ code: '23505', message: 'duplicate key' });
  });

  it('checks out and releases a client on connect', async () => {
    const { pool, release } = fakePool();
    await createPostgresDbAdapter({}, pool).connect();
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('records long-running queries via metrics', async () => {
    const adapter = createPostgresDbAdapter({}, fakePool().pool);
    promClient.register.resetMetrics();
    const originalThreshold = process.env.DB_LONG_QUERY_WARN_MS;
    process.env.DB_LONG_QUERY_WARN_MS = '0';

    try {
      await adapter.query('SELECT 1', []);
      const metric = promClient.register.getSingleMetric('krs_db_query_long_running_total');
      expect(metric).toBeInstanceOf(promClient.Counter);
      const metricData = await metric?.get();
      const total = metricData?.values.reduce((acc, sample) => acc + sample.value, 0) ?? 0;
      expect(total).toBeGreaterThanOrEqual(1);
    } finally {
      if (originalThreshold === undefined) {
        delete process.env.DB_LONG_QUERY_WARN_MS;
      } else {
        process.env.DB_LONG_QUERY_WARN_MS = originalThreshold;
      }
    }
  });

  it('generates uuid ids', () => {
    expect(createPostgresDbAdapter({}, fakePool().pool).generateId()).toMatch(/^[0-9a-f-]{36}$/);
  });
});
