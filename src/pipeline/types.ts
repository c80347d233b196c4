/** One entry offered by a feed poll. Never persisted. */
export type Candidate = {
  readonly title: string;
  readonly url: string;
};

export type PollResult = {
  readonly feedTitle: string;
  readonly candidates: ReadonlyArray<Candidate>;
  readonly error: string | null;
};

/** Supplies the current feed contents, in feed order. */
export type FeedSource = () => Promise<PollResult>;
