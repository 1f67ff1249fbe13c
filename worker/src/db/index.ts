import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { getConfig } from "../lib/config.js";
import * as schema from "./schema.js";

const config = getConfig();

const client = postgres(config.databaseUrl, {
  max: config.dbPoolMax,
  idle_timeout: config.dbIdleTimeout,
  connect_timeout: config.dbConnectTimeout,
});

export const db = drizzle(client, { schema });

export async function closeDb(): Promise<void> {
  await client.end({ timeout: 5 });
}

export { schema };
