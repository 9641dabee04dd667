import { readFile } from "fs/promises";
import { Logger } from "@avatarflow/utils";
import { createContentDatabase, enableWALMode } from "./db";
import type { ContentStoreDbConfig } from "./db";

const SCHEMA_URL = new URL("../sql/schema.sql", import.meta.url);

/**
 * Apply the content store schema. Every statement is idempotent, so this
 * runs safely on each start.
 */
export async function migrateContentStore(
  config: ContentStoreDbConfig,
  logger?: Logger,
): Promise<void> {
  const log =
    logger?.child("content-store-migrate") ??
    Logger.getInstance().child("content-store-migrate");
  const { client, url } = createContentDatabase(config);

  log.info("Applying content store schema...");

  try {
    await enableWALMode(client, url);
    const schema = await readFile(SCHEMA_URL, "utf8");
    await client.executeMultiple(schema);
    log.info("Content store schema is up to date");
  } catch (error) {
    log.error("Content store migration failed:", error);
    throw error;
  } finally {
    client.close();
  }
}
