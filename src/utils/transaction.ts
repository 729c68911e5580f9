import type { PoolClient } from "pg";

import pool from "../config/database";

export type DbQueryer = Pick<PoolClient, "query">;

/** Runs fn inside BEGIN/COMMIT on a dedicated client; rolls back on any error. */
export async function withTransaction<T>(fn: (tx: DbQueryer) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const out = await fn(client);
    await client.query("COMMIT");
    return out;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

/** Nested unit of work: a failure only undoes what fn did. */
export async function withSavepoint<T>(tx: DbQueryer, name: string, fn: () => Promise<T>): Promise<T> {
  await tx.query(`SAVEPOINT ${name}`);
  try {
    const out = await fn();
    await tx.query(`RELEASE SAVEPOINT ${name}`);
    return out;
  } catch (err) {
    await tx.query(`ROLLBACK TO SAVEPOINT ${name}`);
    throw err;
  }
}
