import { randomUUID } from "crypto";
import { MongoClient, type Collection, type Db } from "mongodb";
import type { Coordinates, PlaceConfig } from "../../core/places/place.types";
import { reviewKey } from "../../core/reviews/dedupeReviews";
import type { ReviewRecord } from "../../core/reviews/review.types";
import type { BatchSummary, ScrapeResult } from "../../core/scrape/ScrapeResult";
import type { ResultSink } from "../../ports/ResultSink";
import { mongoIndexes } from "./mongo.indexes";

export type ReviewDoc = {
  _id: string;              // UUIDv4
  outputName: string;
  reviewKey: string;
  reviewId: string | null;
  location: string;
  reviewerName: string;
  rating: number;
  date: string;
  comment: string;
  coordinates: Coordinates | null;
  firstSeenAt: Date;
  lastSeenAt: Date;
};

export type BatchSummaryDoc = BatchSummary & { _id: string };

/**
 * Reviews carrying the source's card id are keyed by it ("id:<reviewId>"),
 * which stays stable across runs. Without one the key falls back to the
 * in-run `reviewKey`, whose relative date phrase ("a week ago") drifts, so a
 * later run stores such a review again.
 */
export const storedReviewKey = (review: ReviewRecord): string =>
  review.reviewId ? `id:${review.reviewId}` : reviewKey(review);

/**
 * Optional result store next to the file export. Reviews are upserted by
 * `{ outputName, reviewKey }`; a re-scrape refreshes `lastSeenAt` of every
 * review whose stored key is unchanged.
 */
export class MongoResultRepository implements ResultSink {
  private client?: MongoClient;
  private db?: Db;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "place_reviews",
    private readonly reviewCollectionName = "reviews",
    private readonly summaryCollectionName = "batch_summaries"
  ) {}

  private async getDb(): Promise<Db> {
    if (this.db) return this.db;

    const client = new MongoClient(this.mongoUri);
    try {
      await client.connect();

      const db = client.db(this.dbName);
      for (const idx of mongoIndexes.reviewCollection) {
        await db.collection(this.reviewCollectionName).createIndex(idx.keys, idx.options);
      }
      for (const idx of mongoIndexes.summaryCollection) {
        await db.collection(this.summaryCollectionName).createIndex(idx.keys, idx.options);
      }

      this.client = client;
      this.db = db;
      return db;
    } catch (err) {
      await client.close().catch((closeError: unknown) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "store.client_close_failed",
          reason: closeError instanceof Error ? closeError.message : String(closeError)
        }));
      });
      throw err;
    }
  }

  private async reviews(): Promise<Collection<ReviewDoc>> {
    return (await this.getDb()).collection<ReviewDoc>(this.reviewCollectionName);
  }

  private async summaries(): Promise<Collection<BatchSummaryDoc>> {
    return (await this.getDb()).collection<BatchSummaryDoc>(this.summaryCollectionName);
  }

  async writePlaceResult(place: PlaceConfig, result: ScrapeResult): Promise<void> {
    if (result.reviews.length === 0) return;

    const col = await this.reviews();
    const ops = result.reviews.map((review) => ({
      updateOne: {
        filter: { outputName: place.outputName, reviewKey: storedReviewKey(review) },
        update: {
          $setOnInsert: {
            _id: randomUUID(),
            outputName: place.outputName,
            reviewKey: storedReviewKey(review),
            firstSeenAt: result.scrapedAt
          },
          $set: {
            location: result.location,
            reviewId: review.reviewId ?? null,
            reviewerName: review.reviewerName,
            rating: review.rating,
            date: review.date,
            comment: review.comment,
            coordinates: result.coordinates,
            lastSeenAt: result.scrapedAt
          }
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    console.log(JSON.stringify({
      event: "store.reviews_upserted",
      outputName: place.outputName,
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    }));
  }

  async writeSummary(summary: BatchSummary): Promise<void> {
    const col = await this.summaries();
    await col.insertOne({ _id: randomUUID(), ...summary });
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.db = undefined;
  }
}
