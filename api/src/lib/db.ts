import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { config } from '../config/index.js';
import * as schema from '../db/schema.js';

export type Database = NodePgDatabase<typeof schema>;
export type DbTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];

// The pool connects lazily; nothing is opened until the first query.
export const pool = new pg.Pool({
  connectionString: config.database.url,
  max: config.database.poolMax,
  connectionTimeoutMillis: config.database.connectionTimeoutMs,
  statement_timeout: config.database.statementTimeoutMs,
});

export const db: Database = drizzle(pool, { schema });

export default db;
