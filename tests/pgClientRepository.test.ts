import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { QueryResultRow } from 'pg';
import { TEST_CLIENT } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

class FakeSql {
  public readonly queries: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly responses: QueryResultRow[][]) {}

  public async query(text: string, values: unknown[]): Promise<{ rows: QueryResultRow[] }> {
    this.queries.push({ text, values });
    return { rows: this.responses.shift() ?? [] };
  }
}

test('lookupClient maps the row and passes the id as a parameter', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const sql = new FakeSql([[{ id: '3', client_id: '12345678A', name: 'Ana Test', email: null }]]);
  const repo = new PgClientRepository(sql);

  const client = await repo.lookupClient('12345678A');

  assert.deepEqual(client, { id: 3, clientId: '12345678A', name: 'Ana Test', email: '' });
  assert.deepEqual(sql.queries[0]?.values, ['12345678A']);
});

test('lookupClient returns null when no row matches', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const repo = new PgClientRepository(new FakeSql([[]]));

  assert.equal(await repo.lookupClient('00000000Z'), null);
});

test('listOpenCases formats dates and asks only for open statuses', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const sql = new FakeSql([
    [{ id: 9, description: 'No dial tone', status: 'in_progress', created_date: new Date(Date.UTC(2025, 0, 2, 10, 0, 0)) }],
  ]);
  const repo = new PgClientRepository(sql);

  const cases = await repo.listOpenCases(TEST_CLIENT);

  assert.deepEqual(cases, [
    { id: 9, description: 'No dial tone', status: 'in_progress', createdDate: '2025-01-02 10:00:00' },
  ]);
  assert.deepEqual(sql.queries[0]?.values, [TEST_CLIENT.id, ['open', 'in_progress']]);
});

test('listClientProducts returns name and type', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const repo = new PgClientRepository(new FakeSql([[{ name: 'Fiber 600', type: 'internet' }]]));

  assert.deepEqual(await repo.listClientProducts(TEST_CLIENT), [{ name: 'Fiber 600', type: 'internet' }]);
});

test('createSupportCase returns the inserted id', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const sql = new FakeSql([[{ id: 51 }]]);
  const repo = new PgClientRepository(sql);

  assert.equal(await repo.createSupportCase(TEST_CLIENT, 'Router keeps rebooting'), 51);
  assert.deepEqual(sql.queries[0]?.values, [TEST_CLIENT.id, 'Router keeps rebooting']);
});

test('createSupportCase fails when the insert returns nothing', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const repo = new PgClientRepository(new FakeSql([[]]));

  await assert.rejects(repo.createSupportCase(TEST_CLIENT, 'x'), /returned no id/);
});

test('rows with an unknown case status are rejected', async () => {
  const { PgClientRepository } = await import('../src/persistence/pgClientRepository');
  const repo = new PgClientRepository(
    new FakeSql([[{ id: 1, description: 'x', status: 'archived', created_date: '2025-01-02' }]]),
  );

  await assert.rejects(repo.listOpenCases(TEST_CLIENT));
});
