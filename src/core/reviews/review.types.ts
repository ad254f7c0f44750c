/** Item as handed over by a content source, before any validation. */
export type RawReviewItem = Record<string, unknown>;

export type ReviewRecord = Readonly<{
  reviewerName: string;
  rating: number;       // integer 1..5
  date: string;         // relative phrase as displayed, e.g. "2 weeks ago"
  comment: string;
  reviewId?: string;    // source's own card id, when it exposes one
}>;
