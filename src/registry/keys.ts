import { createHash } from "node:crypto";

/**
 * Key normalization only: bounds key length and keeps arbitrary URL
 * characters out of the key space. Not a security property.
 */
export function hashUrl(url: string): string {
  return createHash("sha256").update(url).digest("hex");
}

export type EntryIndex =
  | "entry_by_url"
  | "entry_by_message_id"
  | "entry_user_likes"
  | "entry_user_dislikes";

export function indexPrefix(prefix: string, index: EntryIndex): string {
  return `${prefix}:${index}:`;
}

/** `prefix:index:sha256(url)` */
export function entryKey(prefix: string, index: EntryIndex, url: string): string {
  return `${indexPrefix(prefix, index)}${hashUrl(url)}`;
}

export function messageKey(prefix: string, messageId: string): string {
  return `${indexPrefix(prefix, "entry_by_message_id")}${messageId}`;
}

export function lastPostTimeKey(prefix: string): string {
  return `${prefix}:lastposttime`;
}
