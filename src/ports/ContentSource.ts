import type { Coordinates } from "../core/places/place.types";
import type { RawReviewItem } from "../core/reviews/review.types";

/** Opaque reference to the scrollable review surface of an opened page. */
export type PanelHandle = {
  readonly id: string;
};

export type LoadBatch = {
  rawItems: RawReviewItem[];
  hasMore: boolean;
  throttled?: boolean;     // explicit throttle indicator from the source
};

/** Order requested for the review list once the panel is open. */
export type ReviewSortOrder = "relevant" | "newest";

export type LoadMoreOptions = {
  timeoutMs: number;       // upper bound for waiting on new content in this pass
};

export class PanelNotFoundError extends Error {
  readonly code = "panel_not_found";

  constructor(message = "Review panel not found on page") {
    super(message);
    this.name = "PanelNotFoundError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ThrottleSignalError extends Error {
  readonly code = "throttled";

  constructor(message = "Content source is throttling requests") {
    super(message);
    this.name = "ThrottleSignalError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An opened place page. */
export interface ContentSource {
  locatePanel(): Promise<PanelHandle>;
  loadMore(panel: PanelHandle, options: LoadMoreOptions): Promise<LoadBatch>;
  resolveCoordinates(): Promise<Coordinates | null>;
  close(): Promise<void>;
}

/** Owns the browser handle shared by every place of a run. */
export interface PlaceBrowser {
  open(url: string): Promise<ContentSource>;
  close(): Promise<void>;
}
