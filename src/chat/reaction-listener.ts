// pattern: Imperative Shell
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { Logger } from "pino";
import type { ReactionKind } from "../reactions/reaction-store";
import { DISLIKE_DATA, LIKE_DATA } from "./markup";
import type { TelegramCall } from "./telegram";

const updateSchema = z.object({
  update_id: z.number().int(),
  callback_query: z
    .object({
      id: z.string(),
      data: z.string().optional(),
      from: z.object({
        id: z.number().int(),
        first_name: z.string().optional(),
        last_name: z.string().optional(),
      }),
      message: z.object({ message_id: z.number().int() }).optional(),
    })
    .optional(),
});

const updatesSchema = z.array(updateSchema);

export type ReactionEvent = {
  readonly messageId: string;
  readonly userId: string;
  readonly userName: string;
  readonly kind: ReactionKind;
};

export type ReactionEventHandler = (event: ReactionEvent) => Promise<unknown>;

function toReactionKind(data: string | undefined): ReactionKind | null {
  if (data === LIKE_DATA) return "like";
  if (data === DISLIKE_DATA) return "dislike";
  return null;
}

/**
 * Fetches one batch of callback-query updates, answers and dispatches each
 * like/dislike press, and returns the offset for the next call.
 *
 * A failing handler is logged and its update is still consumed.
 */
export async function pollReactionUpdates(
  call: TelegramCall,
  offset: number,
  timeoutSeconds: number,
  onReaction: ReactionEventHandler,
  logger: Logger,
  signal?: AbortSignal,
): Promise<number> {
  const updates = await call(
    "getUpdates",
    {
      offset,
      timeout: timeoutSeconds,
      allowed_updates: ["callback_query"],
    },
    updatesSchema,
    { timeoutMs: (timeoutSeconds + 10) * 1000, signal },
  );

  let nextOffset = offset;
  for (const update of updates) {
    nextOffset = Math.max(nextOffset, update.update_id + 1);

    const query = update.callback_query;
    if (!query) continue;

    try {
      await call("answerCallbackQuery", { callback_query_id: query.id }, z.unknown());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ callbackQueryId: query.id, error: message }, "callback answer failed");
    }

    const kind = toReactionKind(query.data);
    if (kind === null || !query.message) continue;

    const event: ReactionEvent = {
      messageId: String(query.message.message_id),
      userId: String(query.from.id),
      userName: [query.from.first_name, query.from.last_name]
        .filter((part): part is string => Boolean(part))
        .join(" "),
      kind,
    };

    try {
      await onReaction(event);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { messageId: event.messageId, userId: event.userId, error: message },
        "reaction handling failed",
      );
    }
  }

  return nextOffset;
}

export type ReactionListener = {
  readonly start: () => void;
  readonly stop: () => void;
};

export type ReactionListenerDeps = {
  readonly call: TelegramCall;
  readonly onReaction: ReactionEventHandler;
  readonly logger: Logger;
  readonly pollTimeoutSeconds: number;
  readonly retryDelayMs?: number;
};

/**
 * Long-polls the Bot API for reaction button presses until stopped.
 * Poll failures are logged and retried after `retryDelayMs`.
 */
export function createReactionListener(deps: ReactionListenerDeps): ReactionListener {
  const retryDelayMs = deps.retryDelayMs ?? 5000;
  const controller = new AbortController();
  let started = false;

  const run = async (): Promise<void> => {
    let offset = 0;
    while (!controller.signal.aborted) {
      try {
        offset = await pollReactionUpdates(
          deps.call,
          offset,
          deps.pollTimeoutSeconds,
          deps.onReaction,
          deps.logger,
          controller.signal,
        );
      } catch (err) {
        if (controller.signal.aborted) break;
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.warn({ error: message, retryDelayMs }, "update poll failed");
        try {
          await sleep(retryDelayMs, undefined, { signal: controller.signal });
        } catch (sleepErr) {
          if (!controller.signal.aborted) throw sleepErr;
        }
      }
    }
    deps.logger.info("reaction listener stopped");
  };

  return {
    start() {
      if (started) {
        deps.logger.warn("reaction listener already started");
        return;
      }
      started = true;
      deps.logger.info("reaction listener started");
      run().catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "reaction listener crashed");
      });
    },

    stop() {
      controller.abort();
    },
  };
}
