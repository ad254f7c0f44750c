/**
 * Index plan, applied on first use:
 * - reviews: unique { outputName, reviewKey }; see `storedReviewKey` for what the key holds
 * - batch_summaries: { generatedAt: -1 } for "latest run" lookups
 */
export const mongoIndexes = {
  reviewCollection: [
    { keys: { outputName: 1, reviewKey: 1 }, options: { unique: true } }
  ],
  summaryCollection: [
    { keys: { generatedAt: -1 }, options: {} }
  ]
};
