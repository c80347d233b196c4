import type { Logger } from "pino";
import type { BlacklistConfig } from "../config";
import type { EntryRegistry } from "../registry/entry-registry";
import type { Candidate } from "./types";

/**
 * True when any forbidden word occurs anywhere in the title, ignoring case.
 *
 * Functional Core.
 */
export function containsBlacklistedWord(
  title: string,
  words: ReadonlyArray<string>,
): boolean {
  const lowered = title.toLowerCase();
  return words.some((word) => lowered.includes(word.toLowerCase()));
}

/**
 * True when the url starts with any forbidden prefix. Case-sensitive.
 *
 * Functional Core.
 */
export function hasBlacklistedPrefix(
  url: string,
  prefixes: ReadonlyArray<string>,
): boolean {
  return prefixes.some((prefix) => url.startsWith(prefix));
}

export type SelectionEngine = {
  readonly selectBatch: (
    candidates: ReadonlyArray<Candidate>,
    maxCount: number,
  ) => Array<Candidate>;
};

/**
 * Picks what to publish this cycle: walks candidates in feed order, drops
 * already-posted entries, then blacklisted titles, then blacklisted urls, and
 * stops once `maxCount` survivors are collected. An empty result means there
 * is nothing to publish.
 */
export function createSelectionEngine(
  registry: Pick<EntryRegistry, "wasPosted">,
  blacklist: BlacklistConfig,
  logger: Logger,
): SelectionEngine {
  return {
    selectBatch(candidates, maxCount) {
      const selected: Array<Candidate> = [];
      const seen = new Set<string>();

      for (const candidate of candidates) {
        if (selected.length >= maxCount) break;
        if (seen.has(candidate.url)) continue;
        seen.add(candidate.url);

        if (registry.wasPosted(candidate.url)) continue;

        if (containsBlacklistedWord(candidate.title, blacklist.words)) {
          logger.info(
            { title: candidate.title },
            "title contains blacklisted words, skipping",
          );
          continue;
        }

        if (hasBlacklistedPrefix(candidate.url, blacklist.urlPrefixes)) {
          logger.info({ url: candidate.url }, "url is blacklisted, skipping");
          continue;
        }

        selected.push(candidate);
      }

      logger.info(
        { candidateCount: candidates.length, selectedCount: selected.length },
        "collected entries to post",
      );
      return selected;
    },
  };
}
