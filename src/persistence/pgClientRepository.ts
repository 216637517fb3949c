import pg, { type QueryResultRow } from 'pg';
import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import type {
  ClientRecord,
  ClientRepository,
  ProductRecord,
  SupportCaseRecord,
  SupportCaseStatus,
} from './types';

const { Pool } = pg;

/** The query surface the repository needs; a pg Pool or Client satisfies it. */
export interface SqlExecutor {
  query(text: string, values: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const clientRow = z.object({
  id: z.coerce.number().int(),
  client_id: z.string(),
  name: z.string(),
  email: z.string().nullable().transform((value) => value ?? ''),
});

const productRow = z.object({
  name: z.string(),
  type: z.string(),
});

const caseRow = z.object({
  id: z.coerce.number().int(),
  description: z.string(),
  status: z.enum(['open', 'in_progress', 'resolved', 'closed']),
  created_date: z.union([z.date(), z.string()]),
});

const insertedRow = z.object({ id: z.coerce.number().int() });

const OPEN_STATUSES: SupportCaseStatus[] = ['open', 'in_progress'];

let pool: InstanceType<typeof Pool> | null = null;

function getPool(): InstanceType<typeof Pool> {
  if (!pool) {
    pool = new Pool({ connectionString: env.DATABASE_URL, max: 5 });
    pool.on('error', (error) => {
      log.error({ err: error, event: 'pg_pool_error' }, 'postgres pool error');
    });
  }
  return pool;
}

export function poolExecutor(): SqlExecutor {
  return {
    query: (text, values) => getPool().query(text, values),
  };
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

export function formatCaseDate(value: Date | string): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    return String(value);
  }
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export class PgClientRepository implements ClientRepository {
  constructor(private readonly db: SqlExecutor = poolExecutor()) {}

  public async lookupClient(clientId: string): Promise<ClientRecord | null> {
    const { rows } = await this.db.query('SELECT id, client_id, name, email FROM clients WHERE client_id = $1', [
      clientId,
    ]);
    if (rows.length === 0) {
      return null;
    }
    const row = clientRow.parse(rows[0]);
    return { id: row.id, clientId: row.client_id, name: row.name, email: row.email };
  }

  public async listClientProducts(client: ClientRecord): Promise<ProductRecord[]> {
    const { rows } = await this.db.query(
      `SELECT p.name, p.type
         FROM client_products cp
         JOIN products p ON cp.product_id = p.id
        WHERE cp.client_id = $1
        ORDER BY p.name`,
      [client.id],
    );
    return rows.map((raw) => productRow.parse(raw));
  }

  public async listOpenCases(client: ClientRecord): Promise<SupportCaseRecord[]> {
    const { rows } = await this.db.query(
      `SELECT id, description, status, created_date
         FROM support_cases
        WHERE client_id = $1 AND status = ANY($2::support_case_status[])
        ORDER BY created_date DESC`,
      [client.id, OPEN_STATUSES],
    );
    return rows.map((raw) => {
      const row = caseRow.parse(raw);
      return {
        id: row.id,
        description: row.description,
        status: row.status,
        createdDate: formatCaseDate(row.created_date),
      };
    });
  }

  public async createSupportCase(client: ClientRecord, description: string): Promise<number> {
    const { rows } = await this.db.query(
      `INSERT INTO support_cases (client_id, description, status)
       VALUES ($1, $2, 'open')
       RETURNING id`,
      [client.id, description],
    );
    if (rows.length === 0) {
      throw new Error('support case insert returned no id');
    }
    return insertedRow.parse(rows[0]).id;
  }
}
