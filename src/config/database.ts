import { Pool } from 'pg';

import { settings } from './settings';

const pool = new Pool({
  connectionString: settings.DATABASE_URL,
  max: settings.PG_POOL_MAX,
  statement_timeout: settings.PG_STATEMENT_TIMEOUT_MS,
});

pool.on('connect', () => {
  console.log('🟢 Connecté à PostgreSQL avec succès');
});

pool.on('error', (err) => {
  console.error('❌ Erreur de connexion PostgreSQL', err);
});

/** Waits for checked-out clients to be released, then closes the pool. */
export async function closePool(): Promise<void> {
  await pool.end();
}

export default pool;
