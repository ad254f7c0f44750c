import {
  commentFromText,
  extractReview,
  findRelativeDate,
  InvalidReviewError
} from "../../src/core/reviews/extractReview";

describe("extractReview", () => {
  it("normalizes a structured item", () => {
    const record = extractReview({ name: "  Ana   Lima ", rating: "5 stars", date: "a week ago", comment: " Lovely " });

    expect(record).toEqual({ reviewerName: "Ana Lima", rating: 5, date: "a week ago", comment: "Lovely" });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it.each([
    ["Rated 4.0 out of 5", 4],
    ["4,0 stars", 4],
    ["1 star", 1],
    ["3", 3],
    [2, 2]
  ])("parses rating %p as %p", (rating, expected) => {
    expect(extractReview({ name: "Ana", rating, comment: "" }).rating).toBe(expected);
  });

  it.each([
    [undefined, "Invalid review: missing rating"],
    ["", "Invalid review: missing rating"],
    ["no stars here", "Invalid review: rating is not numeric"],
    [{ value: 4 }, "Invalid review: rating is not numeric"],
    ["4.5 stars", "Invalid review: rating must be an integer between 1 and 5"],
    [0, "Invalid review: rating must be an integer between 1 and 5"],
    [6, "Invalid review: rating must be an integer between 1 and 5"]
  ])("rejects rating %p", (rating, message) => {
    const run = () => extractReview({ name: "Ana", rating });

    expect(run).toThrow(InvalidReviewError);
    expect(run).toThrow(message);
  });

  it("rejects a missing or blank reviewer name", () => {
    expect(() => extractReview({ rating: 5 })).toThrow("Invalid review: missing reviewer name");
    expect(() => extractReview({ name: "   ", rating: 5 })).toThrow("Invalid review: missing reviewer name");
  });

  it("derives date and comment from the card text", () => {
    const text = "Cleo\nLocal Guide · 12 reviews\n4 stars\n3 months ago\nNew\nFriendly staff and quick service.\nLike\nShare";

    expect(extractReview({ name: "Cleo", rating: "4 stars", text })).toEqual({
      reviewerName: "Cleo",
      rating: 4,
      date: "3 months ago",
      comment: "Friendly staff and quick service."
    });
  });

  it("keeps the source's card id when present", () => {
    expect(extractReview({ name: "Ana", rating: 5, comment: "Great", reviewId: " card-42 " }).reviewId)
      .toBe("card-42");
    expect(extractReview({ name: "Ana", rating: 5, comment: "Great", reviewId: "" })).toEqual({
      reviewerName: "Ana",
      rating: 5,
      date: "",
      comment: "Great"
    });
  });

  it("strips icon glyphs from comments", () => {
    expect(extractReview({ name: "Ana", rating: 5, comment: "Great\uE838 view" }).comment).toBe("Great view");
  });

  it("leaves date and comment empty when the text has no date phrase", () => {
    const record = extractReview({ name: "Ana", rating: 5, text: "Ana 5 stars" });

    expect(record.date).toBe("");
    expect(record.comment).toBe("");
  });
});

describe("findRelativeDate", () => {
  it.each([
    ["posted a week ago here", "a week ago"],
    ["an hour ago", "an hour ago"],
    ["12 reviews 2 years ago", "2 years ago"],
    ["Dan 5 stars yesterday Best bagels", "yesterday"],
    ["nothing relevant", ""]
  ])("finds the phrase in %p", (text, expected) => {
    expect(findRelativeDate(text)).toBe(expected);
  });
});

describe("commentFromText", () => {
  it("takes the text after the date", () => {
    expect(commentFromText("Dan 5 stars yesterday Best bagels in town", "yesterday")).toBe("Best bagels in town");
  });

  it("keeps the word Like inside the comment and drops only the action row", () => {
    const text = "Eve 5 stars a week ago\nGreat. Like a hidden gem\nLike\nShare";

    expect(commentFromText(text, "a week ago")).toBe("Great. Like a hidden gem");
  });

  it("drops a lone trailing control", () => {
    expect(commentFromText("Eve 4 stars 2 days ago\nWorth the wait\nLike", "2 days ago")).toBe("Worth the wait");
  });

  it("returns an empty comment when the date is absent from the text", () => {
    expect(commentFromText("Dan 5 stars", "a week ago")).toBe("");
    expect(commentFromText("Dan 5 stars", "")).toBe("");
  });
});
