import type { Candidate } from "../pipeline/types";
import type { Tally } from "../reactions/reaction-store";
import type { ReplyControls } from "./types";

export const LIKE_DATA = "like";
export const DISLIKE_DATA = "dislike";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function escapeAttribute(text: string): string {
  return escapeHtml(text).replace(/"/g, "&quot;");
}

/**
 * Telegram HTML for a published entry:
 * the feed title in bold brackets, then the entry title linked to its url.
 */
export function renderEntryText(feedTitle: string, entry: Candidate): string {
  const title = entry.title || entry.url;
  return (
    `<b>[${escapeHtml(feedTitle)}]</b>\n` +
    `<a href="${escapeAttribute(entry.url)}">${escapeHtml(title)}</a>`
  );
}

/**
 * An "open" link row, plus a like/dislike row showing the tally when
 * reactions are tracked.
 */
export function buildEntryControls(
  url: string,
  openLabel: string,
  tally: Tally | null,
): ReplyControls {
  const openRow = [{ kind: "link", label: openLabel, url }] as const;
  if (tally === null) return [openRow];

  return [
    openRow,
    [
      { kind: "callback", label: `👍 ${tally.likes}`, data: LIKE_DATA },
      { kind: "callback", label: `👎 ${tally.dislikes}`, data: DISLIKE_DATA },
    ],
  ];
}
