import { neon } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-http";
import * as schema from "./schema.js";

export type Database = ReturnType<typeof createDb>;

export function createDb(databaseUrl = process.env.DATABASE_URL) {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL environment variable is required");
  }
  return drizzle(neon(databaseUrl), { schema });
}

let instance: Database | null = null;

// Lazily created so importing modules in tests never needs a connection string
export function getDb(): Database {
  if (!instance) {
    instance = createDb();
  }
  return instance;
}
