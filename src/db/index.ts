// src/db/index.ts
import { drizzle, NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import pg from "pg";
import * as schema from "./schema";

export type GameSchema = typeof schema;

/** Either the pooled database or a transaction opened on it. */
export type GameDatabase = PgDatabase<NodePgQueryResultHKT, GameSchema>;

export const DATABASE_POOL = "DATABASE_POOL";
export const DATABASE = "DATABASE";

export function createPool(connectionString: string): pg.Pool {
  const { Pool } = pg;
  return new Pool({ connectionString });
}

export function createDbClient(pool: pg.Pool): GameDatabase {
  return drizzle({ client: pool, schema });
}

export async function testDbConnection(db: GameDatabase) {
  return db.execute("select 1");
}
