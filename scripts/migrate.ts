import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { pool } from '../src/db/pool.js';

const isIgnorableDuplicateConstraintError = (error: unknown) => {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return code === '42710' && message.includes('already exists');
};

async function run() {
  const files = readdirSync(path.resolve(process.cwd(), 'migrations'))
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const sql = readFileSync(path.resolve(process.cwd(), 'migrations', file), 'utf8');
    try {
      await pool.query(sql);
    } catch (error) {
      if (isIgnorableDuplicateConstraintError(error)) {
        console.warn(`Skipping duplicate constraint in ${file}`);
        continue;
      }
      throw error;
    }
    console.log(`Applied ${file}`);
  }

  console.log('Database migrations applied');
  await pool.end();
}

run().catch((err) => {
  console.error('Migration failed', err);
  process.exit(1);
});
