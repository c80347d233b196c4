import type { Logger } from "pino";
import type { EntryRegistry } from "../registry/entry-registry";
import type { ReactionStore } from "../reactions/reaction-store";
import type { PublicationCursor } from "./cursor";

export type ClearDeps = {
  readonly registry: Pick<EntryRegistry, "clearAll">;
  readonly reactions: Pick<ReactionStore, "clearAll">;
  readonly cursor: Pick<PublicationCursor, "clear">;
};

export type ClearResult = {
  readonly entries: number;
  readonly reactionSets: number;
};

/**
 * Forgets every published entry, its reactions, and the last publication
 * time. Must not run while a publish cycle is in flight.
 */
export function clearPublishedState(deps: ClearDeps, logger: Logger): ClearResult {
  const entries = deps.registry.clearAll();
  const reactionSets = deps.reactions.clearAll();
  deps.cursor.clear();
  logger.info({ entries, reactionSets }, "removed published entries");
  return { entries, reactionSets };
}
