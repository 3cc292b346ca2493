import { Pool, PoolClient } from "pg";
import { describeError } from "../../domain/errors.js";
import { Logger, NullLogger } from "../../utils/logger.js";

export function createPostgresPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
}

/** The part of a pooled client a transaction needs. */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  /** `true` destroys the connection instead of returning it to the pool. */
  release(destroy?: boolean): void;
}

export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>,
  logger?: Logger,
): Promise<T> {
  const client = await pool.connect();
  return runInTransaction(client, () => work(client), logger);
}

/**
 * BEGIN/COMMIT around `work` on a checked-out client, which is always
 * released. A failed ROLLBACK is logged and the connection destroyed; the
 * caller still sees the error that aborted the transaction.
 */
export async function runInTransaction<T>(
  client: TransactionClient,
  work: () => Promise<T>,
  logger: Logger = new NullLogger(),
): Promise<T> {
  let broken = false;
  try {
    await client.query("BEGIN");
    const result = await work();
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      broken = true;
      logger.error("Transaction rollback failed", {
        error: describeError(rollbackError),
        cause: describeError(error),
      });
    }
    throw error;
  } finally {
    client.release(broken);
  }
}
