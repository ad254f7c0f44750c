// DOM hooks of the place page. Google changes class names often; keep the
// fallbacks ordered from most to least specific.
export const SEL = {
  REVIEW: "div[data-review-id]",
  REVIEWER_NAME: "div.d4r55",
  RATING: "[role='img'][aria-label*='star' i], span[aria-label*='star' i]",
  EXPAND_TEXT: "button[aria-expanded='false'][aria-label*='more' i], button.w8nwRe",
  PANEL_CANDIDATES: [
    "div[role='dialog'] div[tabindex='-1']",
    "div[role='dialog'] div[class*='m6QErb']",
    "div.m6QErb.DxyBCb",
    "div[role='dialog']",
    "div[aria-modal='true']",
    "div[jsname='lzXdId']"
  ],
  CONSENT_FORM: "form"
} as const;

export const PANEL_ATTRIBUTE = "data-review-panel";
export const HARVESTED_ATTRIBUTE = "data-review-harvested";

// Lower-cased labels of the control that opens the full review list.
export const REVIEWS_BUTTON_LABELS = ["more reviews", "reviews"];

// Sort control of the review list and the visible label of its "Newest" entry.
export const SORT_BUTTON_LABEL = "sort";
export const SORT_NEWEST_LABEL = "Newest";

export const THROTTLE_URL_MARKERS = ["/sorry/", "google.com/sorry"];
export const THROTTLE_TEXT_PATTERN = /unusual traffic|too many requests|try again later/i;
export const CONSENT_HOST = "consent.google.com";

export const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--lang=en-US"
];

export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36";
