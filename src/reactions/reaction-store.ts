// pattern: Imperative Shell
import type { KeyStore } from "../store/key-store";
import { entryKey, indexPrefix } from "../registry/keys";

export type Tally = {
  readonly likes: number;
  readonly dislikes: number;
};

export type ReactionKind = "like" | "dislike";

/** Where a user stands on an entry after a toggle. */
export type ReactionState = "liked" | "disliked" | "none";

export type ReactionStore = {
  readonly toggleLike: (url: string, userId: string) => ReactionState;
  readonly toggleDislike: (url: string, userId: string) => ReactionState;
  readonly toggle: (
    kind: ReactionKind,
    url: string,
    userId: string,
  ) => ReactionState;
  readonly tally: (url: string) => Tally;
  readonly clearAll: () => number;
};

/**
 * Creates the per-entry liker/disliker sets.
 *
 * A user is never in both sets of one entry. Every toggle removes the user
 * from the opposite set and flips membership in its own set inside a single
 * store transaction, so a competing toggle for the same user lands entirely
 * before or after it.
 */
export function createReactionStore(
  store: KeyStore,
  prefix: string,
): ReactionStore {
  const likesKey = (url: string) => entryKey(prefix, "entry_user_likes", url);
  const dislikesKey = (url: string) =>
    entryKey(prefix, "entry_user_dislikes", url);

  const toggle = (
    kind: ReactionKind,
    url: string,
    userId: string,
  ): ReactionState => {
    const own = kind === "like" ? likesKey(url) : dislikesKey(url);
    const opposite = kind === "like" ? dislikesKey(url) : likesKey(url);

    return store.atomically((): ReactionState => {
      store.setRemove(opposite, userId);
      if (store.setRemove(own, userId)) {
        return "none";
      }
      store.setAdd(own, userId);
      return kind === "like" ? "liked" : "disliked";
    });
  };

  return {
    toggleLike: (url, userId) => toggle("like", url, userId),
    toggleDislike: (url, userId) => toggle("dislike", url, userId),
    toggle,

    tally: (url) => ({
      likes: store.setSize(likesKey(url)),
      dislikes: store.setSize(dislikesKey(url)),
    }),

    clearAll() {
      const keys = [
        ...store.keys(indexPrefix(prefix, "entry_user_likes")),
        ...store.keys(indexPrefix(prefix, "entry_user_dislikes")),
      ];
      return store.delete(keys);
    },
  };
}
