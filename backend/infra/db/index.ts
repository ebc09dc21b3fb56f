import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schemas from "./schemas/index.js";

export function createDb(databaseUrl: string) {
  const client = postgres(databaseUrl, {
    prepare: false,
    max: 10,
    connect_timeout: 10,
    onnotice: () => {},
  });
  return { client, db: drizzle({ client, schema: schemas }) };
}

export type Database = ReturnType<typeof createDb>["db"];
