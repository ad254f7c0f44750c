import { TimeoutError, type Page } from "puppeteer-core";
import { isThrottledPage, PuppeteerContentSource, safePageUrl } from "../../src/infrastructure/puppeteer/PuppeteerContentSource";
import {
  isTransientNavigationError,
  withEnglishLocale
} from "../../src/infrastructure/puppeteer/PuppeteerPlaceBrowser";

describe("puppeteer helpers", () => {
  it("detects throttling from the URL or the page text", () => {
    expect(isThrottledPage("https://www.google.com/sorry/index?continue=x", "")).toBe(true);
    expect(isThrottledPage("https://www.google.com/maps/place/Cafe", "Our systems have detected unusual traffic from your computer network.")).toBe(true);
    expect(isThrottledPage("https://www.google.com/maps/place/Cafe", "Reviews")).toBe(false);
  });

  it("strips query and fragment from logged URLs", () => {
    expect(safePageUrl("https://www.google.com/maps/place/Cafe?authuser=0&token=abc#x")).toBe("https://www.google.com/maps/place/Cafe");
    expect(safePageUrl("not a url")).toBe("<invalid url>");
  });

  it("adds the English locale parameter once", () => {
    expect(withEnglishLocale("https://www.google.com/maps/place/Cafe")).toBe("https://www.google.com/maps/place/Cafe?hl=en");
    expect(withEnglishLocale("https://www.google.com/maps/place/Cafe?hl=de")).toBe("https://www.google.com/maps/place/Cafe?hl=de");
  });

  it("retries only timeouts and transient network failures", () => {
    expect(isTransientNavigationError(new TimeoutError("Navigation timeout of 100 ms exceeded"))).toBe(true);
    expect(isTransientNavigationError(new Error("net::ERR_CONNECTION_RESET at https://x"))).toBe(true);
    expect(isTransientNavigationError(new Error("net::ERR_NAME_NOT_RESOLVED at https://x"))).toBe(false);
    expect(isTransientNavigationError("timeout")).toBe(false);
  });
});

describe("PuppeteerContentSource review sort", () => {
  const fakePage = (sortOutcome: string) => {
    const evaluate = jest.fn()
      .mockResolvedValueOnce(true)
      .mockResolvedValueOnce(true)
      .mockResolvedValueOnce(sortOutcome);
    const page = {
      evaluate,
      waitForSelector: jest.fn().mockResolvedValue(null),
      url: () => "https://www.google.com/maps/place/Cafe?hl=en"
    };
    return { page, evaluate, asPage: page as unknown as Page };
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("keeps the default order unless newest is requested", async () => {
    const { evaluate, asPage } = fakePage("sorted");

    const panel = await new PuppeteerContentSource(asPage).locatePanel();

    expect(panel).toEqual({ id: '[data-review-panel="1"]' });
    expect(evaluate).toHaveBeenCalledTimes(2);
  });

  it("picks the Newest entry of the sort menu after opening the panel", async () => {
    const { page, evaluate, asPage } = fakePage("sorted");

    await new PuppeteerContentSource(asPage, { reviewSort: "newest" }).locatePanel();

    expect(evaluate).toHaveBeenCalledTimes(3);
    expect(evaluate.mock.calls[2].slice(1)).toEqual(["sort", "Newest", 2000]);
    expect(page.waitForSelector).toHaveBeenCalledTimes(2);
  });

  it("logs and carries on when the page offers no sort control", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const { page, asPage } = fakePage("no_sort_control");

    await expect(new PuppeteerContentSource(asPage, { reviewSort: "newest" }).locatePanel())
      .resolves.toEqual({ id: '[data-review-panel="1"]' });

    expect(JSON.parse(String(warn.mock.calls[0][0]))).toEqual({
      event: "scrape.sort_unavailable",
      reason: "no_sort_control",
      url: "https://www.google.com/maps/place/Cafe"
    });
    expect(page.waitForSelector).toHaveBeenCalledTimes(1);
  });
});
