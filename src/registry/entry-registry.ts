// pattern: Imperative Shell
import type { Logger } from "pino";
import type { KeyStore } from "../store/key-store";
import { entryKey, indexPrefix, messageKey } from "./keys";
import { deliveryRecordSchema } from "./types";
import type { DeliveryRecord } from "./types";

export type EntryRegistry = {
  readonly wasPosted: (url: string) => boolean;
  readonly recordPosted: (
    url: string,
    messageId: string,
    renderedText: string,
  ) => DeliveryRecord;
  readonly lookupByUrl: (url: string) => DeliveryRecord | null;
  readonly lookupByMessageId: (messageId: string) => DeliveryRecord | null;
  readonly clearAll: () => number;
};

/**
 * Creates the registry of published entries.
 *
 * Each record is stored twice: under the hashed url (forward index, used for
 * dedup) and under the outbound message id (reverse index, used to resolve
 * reaction events). Both writes happen in one store transaction, forward
 * index first. A record is written once: recording an already recorded url
 * returns the stored record and writes nothing.
 *
 * `clearAll` is not atomic across the whole registry and must not run while a
 * publish cycle is in flight.
 */
export function createEntryRegistry(
  store: KeyStore,
  prefix: string,
  logger: Logger,
): EntryRegistry {
  const decode = (key: string): DeliveryRecord | null => {
    const raw = store.get(key);
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ key, error: message }, "stored delivery record is not JSON");
      return null;
    }

    const result = deliveryRecordSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn({ key }, "stored delivery record has unexpected shape");
      return null;
    }
    return result.data;
  };

  const lookupByUrl = (url: string) => decode(entryKey(prefix, "entry_by_url", url));

  return {
    wasPosted: (url) => lookupByUrl(url) !== null,

    recordPosted(url, messageId, renderedText) {
      const record: DeliveryRecord = { url, messageId, renderedText };

      const stored = store.atomically((): DeliveryRecord => {
        const existing = lookupByUrl(url);
        if (existing) return existing;

        const json = JSON.stringify(record);
        store.set(entryKey(prefix, "entry_by_url", url), json);
        store.set(messageKey(prefix, messageId), json);
        return record;
      });

      if (stored !== record) {
        logger.warn(
          { url, messageId, recordedMessageId: stored.messageId },
          "entry already recorded, keeping the first delivery",
        );
        return stored;
      }

      logger.debug({ url, messageId }, "entry recorded as posted");
      return record;
    },

    lookupByUrl,

    lookupByMessageId: (messageId) => decode(messageKey(prefix, messageId)),

    clearAll() {
      const forward = store.keys(indexPrefix(prefix, "entry_by_url"));
      const reverse = store.keys(indexPrefix(prefix, "entry_by_message_id"));
      store.delete(reverse);
      store.delete(forward);
      logger.info(
        { entries: forward.length, messages: reverse.length },
        "delivery records cleared",
      );
      return forward.length;
    },
  };
}
