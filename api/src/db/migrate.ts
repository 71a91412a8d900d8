import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { pool } from '../lib/db.js';

const schemaFile = new URL('../../sql/schema.sql', import.meta.url);

async function main() {
  console.log('🗄️  Applying wallet ledger schema...');
  const ddl = await readFile(schemaFile, 'utf8');
  await pool.query(ddl);
  console.log('✅ Schema applied');
}

main()
  .catch((error) => {
    console.error('❌ Migration failed:', error);
    process.exitCode = 1;
  })
  .finally(() => pool.end());
