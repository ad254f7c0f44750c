import type { RawReviewItem, ReviewRecord } from "./review.types";

export class InvalidReviewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidReviewError";
  }
}

const RELATIVE_DATE_PATTERN = /\b(?:(?:an?|\d+)\s+)?(?:minute|hour|day|week|month|year)s?\s+ago\b/i;
const DAY_WORD_PATTERN = /\b(?:today|yesterday)\b/i;
const RATING_LABEL_PATTERN = /(\d+(?:[.,]\d+)?)\s*(?:stars?\b|out of\b)/i;
const BARE_RATING_PATTERN = /^\s*(\d+(?:[.,]\d+)?)\s*$/;
// Icon fonts render star and action glyphs from the private use area.
const PRIVATE_USE_GLYPHS = /[\uE000-\uF8FF]/g;

const collapseWhitespace = (value: string) => value.replace(/\s+/g, " ").trim();

const parseReviewerName = (value: unknown): string => {
  if (typeof value !== "string" || collapseWhitespace(value) === "") {
    throw new InvalidReviewError("Invalid review: missing reviewer name");
  }
  return collapseWhitespace(value);
};

const parseRating = (value: unknown): number => {
  if (value == null || value === "") {
    throw new InvalidReviewError("Invalid review: missing rating");
  }

  let numeric: number;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string") {
    const match = RATING_LABEL_PATTERN.exec(value) ?? BARE_RATING_PATTERN.exec(value);
    if (!match) {
      throw new InvalidReviewError("Invalid review: rating is not numeric");
    }
    numeric = Number(match[1].replace(",", "."));
  } else {
    throw new InvalidReviewError("Invalid review: rating is not numeric");
  }

  if (!Number.isInteger(numeric) || numeric < 1 || numeric > 5) {
    throw new InvalidReviewError("Invalid review: rating must be an integer between 1 and 5");
  }
  return numeric;
};

/**
 * Finds the relative date phrase ("a week ago", "3 months ago", "today") in a
 * review's full text. Returns "" when none is present.
 */
export const findRelativeDate = (text: string): string => {
  const match = RELATIVE_DATE_PATTERN.exec(text) ?? DAY_WORD_PATTERN.exec(text);
  return match ? match[0].trim() : "";
};

// The card's action row renders as "Like" followed by "Share"; a lone trailing
// control is left when one of the two buttons is hidden.
const ACTION_ROW_PATTERN = /\s*\bLike\s*\n?\s*Share\b[\s\S]*$/;
const TRAILING_CONTROL_PATTERN = /\s*\b(?:Like|Share)\s*$/;

/**
 * The comment is whatever follows the date phrase, minus the "New" badge and
 * the trailing Like/Share controls.
 */
export const commentFromText = (text: string, date: string): string => {
  if (date === "") return "";
  const datePos = text.indexOf(date);
  if (datePos === -1) return "";

  return text
    .slice(datePos + date.length)
    .replace(/^\s*New\b/, "")
    .replace(ACTION_ROW_PATTERN, "")
    .replace(TRAILING_CONTROL_PATTERN, "")
    .replace(PRIVATE_USE_GLYPHS, "")
    .trim();
};

const optionalTrimmed = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

export const extractReview = (raw: RawReviewItem): ReviewRecord => {
  const reviewerName = parseReviewerName(raw.name);
  const rating = parseRating(raw.rating);
  const text = typeof raw.text === "string" ? raw.text : "";
  const date = optionalTrimmed(raw.date) ?? findRelativeDate(text);
  const comment =
    typeof raw.comment === "string"
      ? raw.comment.replace(PRIVATE_USE_GLYPHS, "").trim()
      : commentFromText(text, date);

  const reviewId = optionalTrimmed(raw.reviewId);

  return Object.freeze({ reviewerName, rating, date, comment, ...(reviewId ? { reviewId } : {}) });
};
