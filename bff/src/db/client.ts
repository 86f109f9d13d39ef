import { readFile } from 'node:fs/promises';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema';
import { createLogger } from '../logger';

const log = createLogger('DB');

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
  close(): Promise<void>;
}

const MIGRATIONS = ['001_init.sql'];

export async function runMigrations(pool: pg.Pool): Promise<void> {
  for (const name of MIGRATIONS) {
    const sqlText = await readFile(new URL(`../../migrations/${name}`, import.meta.url), 'utf8');
    await pool.query(sqlText);
    log.info(`migration applied: ${name}`);
  }
}

export async function connectDatabase(connectionString: string): Promise<DatabaseHandle> {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', (error) => log.error('idle client error', error));

  await runMigrations(pool);

  return {
    db: drizzle(pool, { schema }),
    pool,
    close: () => pool.end(),
  };
}
