import { describe, expect, it } from "vitest";
import { buildKeywordTable, matchTriggers, toStems, tokenize } from "../keyword-table";

describe("tokenize", () => {
  it("lowercases and drops punctuation", () => {
    expect(tokenize("Cancel my appointment!!")).toEqual(["cancel", "my", "appointment"]);
  });

  it("keeps contractions and numbers as single tokens", () => {
    expect(tokenize("I’m booked for 10 am")).toEqual(["i'm", "booked", "for", "10", "am"]);
  });

  it("returns an empty list for text without words", () => {
    expect(tokenize("?!  ...")).toEqual([]);
  });
});

describe("toStems", () => {
  it("reduces scheduling and schedule to the same stem", () => {
    expect(toStems("scheduling")).toEqual(["schedul"]);
    expect(toStems("schedule")).toEqual(["schedul"]);
  });

  it("splits hyphenated phrases into separate stems", () => {
    expect(toStems("follow-up")).toEqual(["follow", "up"]);
  });
});

describe("buildKeywordTable", () => {
  it("collapses phrases that normalize to the same stems", () => {
    const table = buildKeywordTable({ scheduling: ["book", "booking", "Book"], qna: ["slot", "slots"] });
    expect(table.scheduling.map((t) => t.phrase)).toEqual(["book"]);
    expect(table.qna.map((t) => t.phrase)).toEqual(["slot"]);
  });

  it("skips phrases with no word characters", () => {
    const table = buildKeywordTable({ scheduling: ["  ", "--"], qna: [] });
    expect(table.scheduling).toHaveLength(0);
  });

  it("produces a frozen table", () => {
    const table = buildKeywordTable({ scheduling: ["visit"], qna: ["dosage"] });
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.scheduling)).toBe(true);
  });
});

describe("matchTriggers", () => {
  const table = buildKeywordTable({ scheduling: ["see a doctor"], qna: ["side effect"] });

  it("matches a multi-word trigger as a contiguous run", () => {
    expect(matchTriggers(toStems("I want to see a doctor"), table.scheduling)).toEqual([
      { phrase: "see a doctor", index: 3 },
    ]);
  });

  it("does not match the same words scattered across the message", () => {
    expect(matchTriggers(toStems("a doctor will see me"), table.scheduling)).toEqual([]);
  });

  it("matches inflected forms of the trigger", () => {
    expect(matchTriggers(toStems("side effects of aspirin"), table.qna)).toEqual([
      { phrase: "side effect", index: 0 },
    ]);
  });
});
