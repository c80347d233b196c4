import type { Logger } from "pino";
import type { AppConfig } from "./config";
import type { AppDatabase } from "./db";
import { createSqliteKeyStore } from "./store/key-store";
import type { KeyStore } from "./store/key-store";
import { createEntryRegistry } from "./registry/entry-registry";
import type { EntryRegistry } from "./registry/entry-registry";
import { createReactionStore } from "./reactions/reaction-store";
import type { ReactionStore } from "./reactions/reaction-store";
import { createPublicationCursor } from "./pipeline/cursor";
import type { Clock, PublicationCursor } from "./pipeline/cursor";
import { createSelectionEngine } from "./pipeline/selection";
import type { SelectionEngine } from "./pipeline/selection";
import type { FeedSource } from "./pipeline/types";
import type { PublishDeps } from "./pipeline/publisher";
import type { ChatChannel } from "./chat/types";

export type Core = {
  readonly store: KeyStore;
  readonly registry: EntryRegistry;
  readonly reactions: ReactionStore;
  readonly cursor: PublicationCursor;
  readonly engine: SelectionEngine;
};

/**
 * Wires the dedup and state-tracking components onto one key store. All of
 * them share the configured key prefix and own disjoint key namespaces
 * beneath it.
 */
export function createCore(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
  clock?: Clock,
): Core {
  const store = createSqliteKeyStore(db);
  const prefix = config.store.keyPrefix;
  const registry = createEntryRegistry(store, prefix, logger);

  return {
    store,
    registry,
    reactions: createReactionStore(store, prefix),
    cursor: createPublicationCursor(store, prefix, clock),
    engine: createSelectionEngine(registry, config.blacklist, logger),
  };
}

export function createPublishDeps(
  core: Core,
  config: AppConfig,
  source: FeedSource,
  channel: ChatChannel,
): PublishDeps {
  return {
    feedTitle: config.feed.title,
    source,
    engine: core.engine,
    registry: core.registry,
    cursor: core.cursor,
    channel,
    reactions: config.publish.reactions ? core.reactions : null,
    openButtonLabel: config.telegram.openButtonLabel,
    maxEntriesPerCycle: config.publish.maxEntriesPerCycle,
    minIntervalMs: config.publish.minIntervalMinutes * 60_000,
  };
}
