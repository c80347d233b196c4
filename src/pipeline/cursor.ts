// pattern: Imperative Shell
import type { KeyStore } from "../store/key-store";
import { lastPostTimeKey } from "../registry/keys";

export type Clock = () => Date;

export type PublicationCursor = {
  readonly lastPostedAt: () => Date | null;
  readonly markPostedNow: () => void;
  readonly clear: () => void;
  readonly shouldRunNow: (intervalMs: number, now?: Date) => boolean;
};

/**
 * Tracks when the last entry was published. Used only for pacing publish
 * cycles; dedup never depends on it.
 *
 * `markPostedNow` never moves the stored timestamp backwards.
 */
export function createPublicationCursor(
  store: KeyStore,
  prefix: string,
  clock: Clock = () => new Date(),
): PublicationCursor {
  const key = lastPostTimeKey(prefix);

  const lastPostedAt = (): Date | null => {
    const raw = store.get(key);
    if (raw === null) return null;
    const parsed = new Date(raw);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  };

  return {
    lastPostedAt,

    markPostedNow() {
      const now = clock();
      store.atomically(() => {
        const previous = lastPostedAt();
        if (previous && previous.getTime() > now.getTime()) return;
        store.set(key, now.toISOString());
      });
    },

    clear() {
      store.delete([key]);
    },

    shouldRunNow(intervalMs, now = clock()) {
      const last = lastPostedAt();
      if (last === null) return true;
      return now.getTime() - last.getTime() >= intervalMs;
    },
  };
}
