import knex, { Knex } from 'knex';
import { types } from 'pg';
import config from './knexfile';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('db');

// DATE columns stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | null = null;

export function getDb(): Knex {
  if (!db) {
    db = knex(config);
  }
  return db;
}

export async function initializeDb(): Promise<void> {
  const database = getDb();

  try {
    await database.raw('SELECT 1');
    log.info('[DB] Connected to PostgreSQL successfully');
  } catch (error) {
    log.error({ err: error }, '[DB] Failed to connect to PostgreSQL');
    throw error;
  }

  await database.raw('CREATE EXTENSION IF NOT EXISTS "pgcrypto"');
  log.info('[DB] Extensions verified');
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    log.info('[DB] Connection closed');
  }
}
