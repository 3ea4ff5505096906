import { Pool, type PoolConfig } from "pg";
import { getDatabaseUrl, isProduction, parseEnvInt } from "./env.js";

let pool: Pool | null = null;

export interface PoolStatus {
  totalConnections: number;
  idleConnections: number;
  waitingRequests: number;
}

type SslMode = "disable" | "require" | "verify-ca" | "verify-full";

const SSL_MODES: ReadonlySet<string> = new Set([
  "disable",
  "require",
  "verify-ca",
  "verify-full",
]);

function isSslMode(value: string): value is SslMode {
  return SSL_MODES.has(value);
}

/**
 * Splits `sslmode` off the connection string. `pg` lets connection string
 * parameters override the `ssl` option, so the mode is applied here instead.
 */
function extractSslMode(connectionString: string): {
  connectionString: string;
  sslMode: SslMode | undefined;
} {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    return { connectionString, sslMode: undefined };
  }
  const raw = url.searchParams.get("sslmode");
  if (raw === null) return { connectionString, sslMode: undefined };
  url.searchParams.delete("sslmode");
  return {
    connectionString: url.toString(),
    sslMode: isSslMode(raw) ? raw : undefined,
  };
}

/**
 * TLS policy: production always verifies the server certificate unless
 * `sslmode=disable`. Elsewhere TLS is only used when the connection string
 * asks for it, and `require` accepts self-signed certificates.
 */
function resolveSsl(sslMode: SslMode | undefined): PoolConfig["ssl"] {
  if (sslMode === "disable") return undefined;
  if (sslMode === "verify-ca" || sslMode === "verify-full") {
    return { rejectUnauthorized: true };
  }
  if (isProduction()) return { rejectUnauthorized: true };
  if (sslMode === "require") return { rejectUnauthorized: false };
  return undefined;
}

/**
 * Pool settings from the environment. `PG_STATEMENT_TIMEOUT_MS` also bounds
 * queries a cancelled request leaves running, since `pg` cannot abort them.
 */
export function buildPoolConfig(): PoolConfig {
  const { connectionString, sslMode } = extractSslMode(getDatabaseUrl());
  const ssl = resolveSsl(sslMode);
  return {
    connectionString,
    max: parseEnvInt("PG_POOL_MAX", 10),
    idleTimeoutMillis: parseEnvInt("PG_IDLE_TIMEOUT_MS", 30_000),
    connectionTimeoutMillis: parseEnvInt("PG_CONNECT_TIMEOUT_MS", 5_000),
    statement_timeout: parseEnvInt("PG_STATEMENT_TIMEOUT_MS", 15_000),
    ...(ssl !== undefined && { ssl }),
  };
}

/**
 * Returns the process-wide database pool, creating it on first use.
 */
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(buildPoolConfig());
  }
  return pool;
}

/**
 * Returns pool connection metrics, or null if the pool has not been created yet.
 */
export function getPoolStatus(): PoolStatus | null {
  if (!pool) return null;
  return {
    totalConnections: pool.totalCount,
    idleConnections: pool.idleCount,
    waitingRequests: pool.waitingCount,
  };
}

/**
 * Closes the database pool. Useful for testing and cleanup.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
