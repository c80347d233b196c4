import pino from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { createSqliteKeyStore } from "../store/key-store";
import type { KeyStore } from "../store/key-store";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

export function createTestStore(): KeyStore {
  return createSqliteKeyStore(createTestDatabase());
}

export const silentLogger = pino({ level: "silent" });

/**
 * Creates a validated AppConfig suitable for testing, with schema defaults
 * filled in. Top-level sections in `overrides` replace the defaults.
 */
export function createTestConfig(overrides?: Record<string, unknown>): AppConfig {
  return appConfigSchema.parse({
    feed: {
      title: "Example Feed",
      url: "https://example.com/rss",
    },
    telegram: {
      chatId: "-100123",
    },
    ...overrides,
  });
}
