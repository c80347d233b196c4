// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ChatChannel } from "../chat/types";
import { buildEntryControls } from "../chat/markup";
import type { ReactionEvent } from "../chat/reaction-listener";
import type { EntryRegistry } from "../registry/entry-registry";
import type { ReactionStore } from "./reaction-store";

export type ReactionHandlerDeps = {
  readonly registry: Pick<EntryRegistry, "lookupByMessageId">;
  readonly reactions: ReactionStore;
  readonly channel: Pick<ChatChannel, "editMessageControls">;
  readonly openButtonLabel: string;
  readonly logger: Logger;
};

export type ReactionOutcome = "applied" | "unknown";

/**
 * Applies one like/dislike press: resolves the message back to its entry,
 * toggles the user's reaction and re-renders the message controls with the
 * fresh tally.
 *
 * A message with no delivery record (published before the registry existed,
 * or cleared since) is ignored with an info log.
 */
export async function handleReaction(
  event: ReactionEvent,
  deps: ReactionHandlerDeps,
): Promise<ReactionOutcome> {
  const record = deps.registry.lookupByMessageId(event.messageId);
  if (!record) {
    deps.logger.info(
      {
        kind: event.kind,
        userId: event.userId,
        userName: event.userName,
        messageId: event.messageId,
      },
      "reaction for unknown post",
    );
    return "unknown";
  }

  const state = deps.reactions.toggle(event.kind, record.url, event.userId);
  const tally = deps.reactions.tally(record.url);

  deps.logger.info(
    {
      kind: event.kind,
      userId: event.userId,
      userName: event.userName,
      url: record.url,
      messageId: event.messageId,
      state,
      ...tally,
    },
    "reaction toggled",
  );

  await deps.channel.editMessageControls(
    record.messageId,
    buildEntryControls(record.url, deps.openButtonLabel, tally),
  );
  return "applied";
}
