// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ChatChannel } from "../chat/types";
import { buildEntryControls, renderEntryText } from "../chat/markup";
import type { EntryRegistry } from "../registry/entry-registry";
import type { DeliveryRecord } from "../registry/types";
import type { ReactionStore } from "../reactions/reaction-store";
import type { PublicationCursor } from "./cursor";
import type { SelectionEngine } from "./selection";
import type { FeedSource } from "./types";

export type PublishDeps = {
  readonly feedTitle: string;
  readonly source: FeedSource;
  readonly engine: SelectionEngine;
  readonly registry: Pick<EntryRegistry, "recordPosted">;
  readonly cursor: PublicationCursor;
  readonly channel: Pick<ChatChannel, "sendMessage">;
  /** Absent when reaction tracking is disabled; messages then carry no like/dislike row. */
  readonly reactions: Pick<ReactionStore, "tally"> | null;
  readonly openButtonLabel: string;
  readonly maxEntriesPerCycle: number;
  readonly minIntervalMs: number;
};

export type PublishCycleResult =
  | { readonly status: "paced"; readonly lastPostedAt: Date | null }
  | { readonly status: "poll_failed"; readonly error: string }
  | { readonly status: "idle"; readonly candidateCount: number }
  | {
      readonly status: "published";
      readonly published: ReadonlyArray<DeliveryRecord>;
    }
  | {
      readonly status: "send_failed";
      readonly published: ReadonlyArray<DeliveryRecord>;
      readonly error: string;
    };

/**
 * Runs one publish cycle: cursor gate → feed poll → selection → send →
 * record → cursor advance.
 *
 * Each entry is recorded only after the chat platform accepted it, so a
 * failed send leaves the entry eligible for the next cycle. A failed send
 * ends the cycle; store failures propagate to the caller.
 */
export async function runPublishCycle(
  deps: PublishDeps,
  logger: Logger,
  now: Date = new Date(),
): Promise<PublishCycleResult> {
  if (!deps.cursor.shouldRunNow(deps.minIntervalMs, now)) {
    const lastPostedAt = deps.cursor.lastPostedAt();
    logger.info(
      { lastPostedAt: lastPostedAt?.toISOString() ?? null },
      "published recently, skipping cycle",
    );
    return { status: "paced", lastPostedAt };
  }

  logger.info("started feed update");

  const poll = await deps.source();
  if (poll.error !== null) {
    logger.warn({ error: poll.error }, "feed poll returned error, skipping cycle");
    return { status: "poll_failed", error: poll.error };
  }

  const selected = deps.engine.selectBatch(
    poll.candidates,
    deps.maxEntriesPerCycle,
  );
  if (selected.length === 0) {
    return { status: "idle", candidateCount: poll.candidates.length };
  }

  const published: Array<DeliveryRecord> = [];
  for (const entry of selected) {
    const text = renderEntryText(deps.feedTitle, entry);
    const tally = deps.reactions ? deps.reactions.tally(entry.url) : null;
    const controls = buildEntryControls(entry.url, deps.openButtonLabel, tally);

    logger.info({ url: entry.url }, "posting entry");

    let messageId: string;
    try {
      messageId = await deps.channel.sendMessage(text, controls);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ url: entry.url, error: message }, "entry send failed");
      return { status: "send_failed", published, error: message };
    }

    logger.info({ url: entry.url, messageId }, "message sent, marking the entry as posted");
    published.push(deps.registry.recordPosted(entry.url, messageId, text));
    deps.cursor.markPostedNow();
  }

  return { status: "published", published };
}
