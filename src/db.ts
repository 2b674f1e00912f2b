import { Pool, PoolClient } from "pg";

// Print masked connection string so we can debug without revealing the password
export function maskConn(s: string) {
  const parts = s.split("@");
  if (parts.length === 2) {
    const leftParts = parts[0].split(":");
    if (leftParts.length >= 2) {
      return `${leftParts[0]}:${leftParts[1]}:***@${parts[1]}`;
    }
  }
  return s;
}

export function createPool(connectionString: string, max = 10): Pool {
  console.log("[DB] using DATABASE_URL =", maskConn(connectionString));

  const pool = new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 60000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,
  });

  pool.on("error", (err) => {
    console.error("[DB POOL ERROR] unexpected error on idle client", err.message);
  });

  pool.on("acquire", () => {
    const waiting = pool.waitingCount;
    if (waiting > 0 || pool.totalCount >= max - 1) {
      console.log(`[DB POOL] acquire - total:${pool.totalCount} idle:${pool.idleCount} waiting:${waiting}`);
    }
  });

  return pool;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on error.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}
