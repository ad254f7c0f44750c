import { TimeoutError, type Page } from "puppeteer-core";
import { coordinatesFromUrl } from "../../core/places/coordinates";
import type { Coordinates } from "../../core/places/place.types";
import type { RawReviewItem } from "../../core/reviews/review.types";
import {
  PanelNotFoundError,
  ThrottleSignalError,
  type ContentSource,
  type LoadBatch,
  type LoadMoreOptions,
  type PanelHandle,
  type ReviewSortOrder
} from "../../ports/ContentSource";
import {
  HARVESTED_ATTRIBUTE,
  PANEL_ATTRIBUTE,
  REVIEWS_BUTTON_LABELS,
  SEL,
  SORT_BUTTON_LABEL,
  SORT_NEWEST_LABEL,
  THROTTLE_TEXT_PATTERN,
  THROTTLE_URL_MARKERS
} from "./maps.selectors";

const PANEL_WAIT_MS = 5000;
const POLL_INTERVAL_MS = 250;
const MAX_EXPAND_CLICKS = 10;
const SORT_MENU_WAIT_MS = 2000;

export type PuppeteerContentSourceOptions = {
  reviewSort?: ReviewSortOrder;
};

export const isThrottledPage = (url: string, bodyText: string): boolean =>
  THROTTLE_URL_MARKERS.some((marker) => url.includes(marker)) || THROTTLE_TEXT_PATTERN.test(bodyText);

/** Strips query and fragment so logs never carry session tokens. */
export const safePageUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return "<invalid url>";
  }
};

const waitOrTimeout = async (pending: Promise<unknown>): Promise<boolean> => {
  try {
    await pending;
    return true;
  } catch (err) {
    if (err instanceof TimeoutError) return false;
    throw err;
  }
};

/**
 * Review list of one opened place page. Each `loadMore` scrolls the panel to
 * its end, waits for reviews that were not harvested yet and returns only
 * those; harvested nodes are tagged in the DOM.
 */
export class PuppeteerContentSource implements ContentSource {
  constructor(
    private readonly page: Page,
    private readonly options: PuppeteerContentSourceOptions = {}
  ) {}

  async locatePanel(): Promise<PanelHandle> {
    await this.page.evaluate((labels: string[]) => {
      const controls = Array.from(document.querySelectorAll<HTMLElement>("button, [role='tab']"));
      for (const label of labels) {
        const control = controls.find((el) => {
          const text = (el.getAttribute("aria-label") ?? el.textContent ?? "").trim().toLowerCase();
          return label === "reviews" ? text === label : text.includes(label);
        });
        if (control) {
          control.click();
          return true;
        }
      }
      return false;
    }, [...REVIEWS_BUTTON_LABELS]);

    await waitOrTimeout(this.page.waitForSelector(SEL.REVIEW, { timeout: PANEL_WAIT_MS }));

    const found = await this.page.evaluate((candidates: string[], attribute: string) => {
      for (const selector of candidates) {
        for (const el of Array.from(document.querySelectorAll<HTMLElement>(selector))) {
          if (el.getClientRects().length > 0) {
            el.setAttribute(attribute, "1");
            return true;
          }
        }
      }
      return false;
    }, [...SEL.PANEL_CANDIDATES], PANEL_ATTRIBUTE);

    if (!found) {
      throw new PanelNotFoundError(`Review panel not found on ${safePageUrl(this.page.url())}`);
    }
    if (this.options.reviewSort === "newest") {
      await this.sortNewest();
    }
    return { id: `[${PANEL_ATTRIBUTE}="1"]` };
  }

  /** Best effort: a page without the sort control keeps its default order. */
  private async sortNewest(): Promise<void> {
    const outcome = await this.page.evaluate(async (buttonLabel: string, optionLabel: string, waitMs: number) => {
      const sortButton = Array.from(document.querySelectorAll<HTMLElement>("button")).find((el) =>
        (el.getAttribute("aria-label") ?? el.textContent ?? "").trim().toLowerCase().includes(buttonLabel)
      );
      if (!sortButton) return "no_sort_control";
      sortButton.click();

      const deadline = Date.now() + waitMs;
      while (Date.now() < deadline) {
        const option = Array.from(document.querySelectorAll<HTMLElement>("[role='menuitemradio'], [role='menuitem'], div"))
          .find((el) => (el.textContent ?? "").trim() === optionLabel);
        if (option) {
          option.click();
          return "sorted";
        }
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
      return "no_sort_option";
    }, SORT_BUTTON_LABEL, SORT_NEWEST_LABEL, SORT_MENU_WAIT_MS);

    if (outcome !== "sorted") {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scrape.sort_unavailable",
        reason: outcome,
        url: safePageUrl(this.page.url())
      }));
      return;
    }
    await waitOrTimeout(this.page.waitForSelector(SEL.REVIEW, { timeout: PANEL_WAIT_MS }));
  }

  async loadMore(panel: PanelHandle, options: LoadMoreOptions): Promise<LoadBatch> {
    const state = await this.page.evaluate((panelSelector: string, expandSelector: string, maxClicks: number) => {
      const container = document.querySelector<HTMLElement>(panelSelector);
      if (!container) {
        return { panelPresent: false, bodyText: (document.body?.innerText ?? "").slice(0, 2000) };
      }
      container.scrollTop = container.scrollHeight;
      Array.from(container.querySelectorAll<HTMLElement>(expandSelector))
        .slice(0, maxClicks)
        .forEach((button) => button.click());
      return { panelPresent: true, bodyText: "" };
    }, panel.id, SEL.EXPAND_TEXT, MAX_EXPAND_CLICKS);

    if (!state.panelPresent) {
      if (isThrottledPage(this.page.url(), state.bodyText)) {
        throw new ThrottleSignalError(`Throttled on ${safePageUrl(this.page.url())}`);
      }
      throw new PanelNotFoundError("Review panel is no longer attached to the page");
    }

    const appeared = await waitOrTimeout(
      this.page.waitForFunction(
        (reviewSelector: string, harvested: string) =>
          document.querySelectorAll(`${reviewSelector}:not([${harvested}])`).length > 0,
        { timeout: options.timeoutMs, polling: POLL_INTERVAL_MS },
        SEL.REVIEW,
        HARVESTED_ATTRIBUTE
      )
    );
    // Maps exposes no end-of-list marker; stagnation detection decides when to stop.
    if (!appeared) return { rawItems: [], hasMore: true };

    const rawItems: RawReviewItem[] = await this.page.evaluate(
      (reviewSelector: string, harvested: string, nameSelector: string, ratingSelector: string) => {
        const fresh = Array.from(document.querySelectorAll<HTMLElement>(`${reviewSelector}:not([${harvested}])`));
        fresh.forEach((el) => el.setAttribute(harvested, "1"));
        // Review cards nest a second node carrying the same id.
        return fresh
          .filter((el) => el.parentElement?.closest(reviewSelector) == null)
          .map((el) => ({
            reviewId: el.getAttribute("data-review-id") ?? "",
            name: el.querySelector(nameSelector)?.textContent ?? "",
            rating: el.querySelector(ratingSelector)?.getAttribute("aria-label") ?? "",
            text: el.innerText
          }));
      },
      SEL.REVIEW,
      HARVESTED_ATTRIBUTE,
      SEL.REVIEWER_NAME,
      SEL.RATING
    );

    return { rawItems, hasMore: true };
  }

  async resolveCoordinates(): Promise<Coordinates | null> {
    const resolved = coordinatesFromUrl(this.page.url());
    if (resolved?.source === "viewport") {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scrape.coordinates_from_viewport",
        url: safePageUrl(this.page.url())
      }));
    }
    return resolved?.coordinates ?? null;
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
