import Parser from "rss-parser";
import type { Logger } from "pino";
import type { Candidate, FeedSource, PollResult } from "./types";

type FeedParser = Pick<Parser<object, object>, "parseURL">;

let parserInstance: FeedParser | null = null;

export function createParser(): Parser<object, object> {
  return new Parser<object, object>({ timeout: 30000 });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

/**
 * Fetches and parses the feed, mapping items to candidates. Items without a
 * link are dropped; a missing title becomes the empty string. Never throws:
 * failures are reported in `error`.
 */
export async function pollFeed(
  feedTitle: string,
  feedUrl: string,
  logger: Logger,
): Promise<PollResult> {
  try {
    const parser = getParserInstance();
    const feed = await parser.parseURL(feedUrl);

    const candidates: Array<Candidate> = [];
    for (const item of feed.items) {
      const url = item.link?.trim();
      if (!url) continue;
      candidates.push({ title: item.title?.trim() ?? "", url });
    }

    logger.info(
      { feedTitle, itemCount: feed.items.length, candidateCount: candidates.length },
      "feed polled successfully",
    );
    return { feedTitle, candidates, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedTitle, feedUrl, error: message }, "feed poll failed");
    return { feedTitle, candidates: [], error: message };
  }
}

export function createFeedSource(
  feedTitle: string,
  feedUrl: string,
  logger: Logger,
): FeedSource {
  return () => pollFeed(feedTitle, feedUrl, logger);
}
