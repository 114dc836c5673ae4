import pg from "pg";
import type { Pool as PgPool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";
import { config } from "./config";

const { Pool } = pg;

let _pool: PgPool | null = null;

export function getPool(): PgPool {
  if (!_pool) {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL must be set to use the database storage");
    }
    _pool = new Pool({ connectionString: config.databaseUrl });
  }
  return _pool;
}

export function createDb(pool: PgPool = getPool()) {
  return drizzle(pool, { schema });
}

export type Db = ReturnType<typeof createDb>;
