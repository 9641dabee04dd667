import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import * as tables from "../schema/tables";

export interface ContentStoreDbConfig {
  /** libSQL url, e.g. "file:./data/avatarflow.db" or a remote libsql:// url */
  url: string;
  authToken?: string | undefined;
}

export type ContentStoreDB = LibSQLDatabase<typeof tables>;

/**
 * Create a content store database connection
 */
export function createContentDatabase(config: ContentStoreDbConfig): {
  db: ContentStoreDB;
  client: Client;
  url: string;
} {
  const url = config.url;
  const authToken =
    config.authToken ?? process.env["AVATARFLOW_DATABASE_AUTH_TOKEN"];

  const client = authToken
    ? createClient({ url, authToken })
    : createClient({ url });

  const db = drizzle(client, { schema: tables });

  return { db, client, url };
}

/**
 * Enable WAL mode and a busy timeout for local SQLite files, so several
 * pipeline processes can share one database file
 */
export async function enableWALMode(client: Client, url: string): Promise<void> {
  if (url.startsWith("file:")) {
    await client.execute("PRAGMA journal_mode = WAL");
    await client.execute("PRAGMA busy_timeout = 5000");
  }
}
