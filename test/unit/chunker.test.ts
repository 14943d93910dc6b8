import { describe, it, expect } from "vitest";
import { chunkParagraphs } from "../../src/chunker";
import { InvalidInputError } from "../../src/errors";

describe("chunkParagraphs", () => {
  it("carries the last overlap characters into the next chunk", () => {
    const chunks = chunkParagraphs(
      ["A short intro.", "A second sentence about the project.", "A third."],
      30,
      5,
    );

    expect(chunks).toEqual([
      "A short intro.",
      "ntro.\nA second sentence about the project.",
      "ject.\nA third.",
    ]);
  });

  it("keeps paragraphs together while they fit the budget", () => {
    expect(chunkParagraphs(["one", "two", "three"], 100, 10)).toEqual(["one\ntwo\nthree"]);
  });

  it("emits a paragraph longer than maxChars whole", () => {
    const long = "x".repeat(50);
    const chunks = chunkParagraphs(["ab", long, "cd"], 10, 3);

    expect(chunks).toEqual(["ab", `ab\n${long}`, "xxx\ncd"]);
    expect(chunks[1].length).toBeGreaterThan(10);
  });

  it("returns a single oversized paragraph as its own chunk", () => {
    const long = "y".repeat(40);
    expect(chunkParagraphs([long], 10, 3)).toEqual([long]);
  });

  it("may start the overlap mid-word", () => {
    const chunks = chunkParagraphs(["alpha beta", "gamma"], 12, 3);
    expect(chunks).toEqual(["alpha beta", "eta\ngamma"]);
  });

  it("carries nothing over when overlap is zero", () => {
    expect(chunkParagraphs(["aaaa", "bbbb"], 6, 0)).toEqual(["aaaa", "bbbb"]);
  });

  it("rejects an empty document", () => {
    expect(() => chunkParagraphs([], 100, 10)).toThrow(InvalidInputError);
    expect(() => chunkParagraphs([], 100, 10)).toThrow("Document is empty");
  });

  it("rejects invalid sizing", () => {
    expect(() => chunkParagraphs(["a"], 0, 0)).toThrow(InvalidInputError);
    expect(() => chunkParagraphs(["a"], 10.5, 0)).toThrow(InvalidInputError);
    expect(() => chunkParagraphs(["a"], 10, -1)).toThrow(InvalidInputError);
  });

  it("uses 1200/150 sizing by default", () => {
    const para = "p".repeat(700);
    const chunks = chunkParagraphs([para, para]);

    expect(chunks).toHaveLength(2);
    expect(chunks[1]).toBe(`${"p".repeat(150)}\n${para}`);
  });
});
