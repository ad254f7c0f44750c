import puppeteer, { TimeoutError, type Browser, type Page } from "puppeteer-core";
import type { ContentSource, PlaceBrowser, ReviewSortOrder } from "../../ports/ContentSource";
import { retry } from "../../shared/retry/retry";
import { CONSENT_HOST, LAUNCH_ARGS, SEL, USER_AGENT } from "./maps.selectors";
import { PuppeteerContentSource, safePageUrl } from "./PuppeteerContentSource";

export type PuppeteerPlaceBrowserOptions = {
  executablePath: string;
  headless: boolean;
  navigationTimeoutMs: number;
  navigationRetries?: number;
  reviewSort?: ReviewSortOrder;
};

const TRANSIENT_NETWORK_ERROR = /net::ERR_(?:CONNECTION_(?:RESET|CLOSED|REFUSED|TIMED_OUT)|TIMED_OUT|NETWORK_CHANGED|INTERNET_DISCONNECTED)/;

export const isTransientNavigationError = (err: unknown): boolean => {
  if (err instanceof TimeoutError) return true;
  return err instanceof Error && TRANSIENT_NETWORK_ERROR.test(err.message);
};

/** Asks for the English UI so labels and relative dates parse. */
export const withEnglishLocale = (url: string): string => {
  const parsed = new URL(url);
  if (!parsed.searchParams.has("hl")) {
    parsed.searchParams.set("hl", "en");
  }
  return parsed.toString();
};

/**
 * One Chrome process for the whole run, launched on first use; every place
 * gets its own tab.
 */
export class PuppeteerPlaceBrowser implements PlaceBrowser {
  private browser?: Browser;

  constructor(private readonly options: PuppeteerPlaceBrowserOptions) {}

  private async getBrowser(): Promise<Browser> {
    if (this.browser?.connected) return this.browser;
    if (this.options.executablePath.trim() === "") {
      throw new Error("CHROME_EXECUTABLE_PATH must point to a Chrome or Chromium binary");
    }

    this.browser = await puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: this.options.headless,
      args: [...LAUNCH_ARGS]
    });
    return this.browser;
  }

  async open(url: string): Promise<ContentSource> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();

    try {
      await page.setUserAgent(USER_AGENT);
      await page.setExtraHTTPHeaders({ "Accept-Language": "en-US,en;q=0.9" });
      await page.setViewport({ width: 1366, height: 900 });
      await this.navigate(page, withEnglishLocale(url));
      await this.acceptConsent(page);
      return new PuppeteerContentSource(page, { reviewSort: this.options.reviewSort });
    } catch (err) {
      await page.close().catch((closeError: unknown) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "scrape.page_close_failed",
          url: safePageUrl(url),
          reason: closeError instanceof Error ? closeError.message : String(closeError)
        }));
      });
      throw err;
    }
  }

  private async navigate(page: Page, url: string): Promise<void> {
    await retry(
      async () => {
        await page.goto(url, { waitUntil: "networkidle2", timeout: this.options.navigationTimeoutMs });
      },
      {
        retries: this.options.navigationRetries ?? 2,
        baseDelayMs: 1000,
        maxDelayMs: 10000,
        shouldRetry: isTransientNavigationError,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "browser.navigation_retry",
            url: safePageUrl(url),
            attempt,
            maxAttempts,
            delayMs,
            reason: error instanceof Error ? error.message : String(error)
          }));
        }
      }
    );
  }

  /** EU sessions land on a consent interstitial first; submitting its form continues to the place. */
  private async acceptConsent(page: Page): Promise<void> {
    if (!page.url().includes(CONSENT_HOST)) return;

    const form = await page.$(SEL.CONSENT_FORM);
    if (!form) return;

    try {
      await Promise.all([
        page.waitForNavigation({ waitUntil: "networkidle2", timeout: this.options.navigationTimeoutMs }),
        form.evaluate((el) => {
          if (el instanceof HTMLFormElement) el.submit();
        })
      ]);
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = undefined;
    await browser?.close();
  }
}
