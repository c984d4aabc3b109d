import { describe, expect, it } from "vitest";
import { chunkRulebook, citationLabel } from "../ruleChunker";

describe("chunkRulebook", () => {
  it("slides an overlapping window across each page", () => {
    const chunks = chunkRulebook([{ page: 1, text: "abcdefghij" }], { size: 4, overlap: 2 });
    expect(chunks.map((chunk) => [chunk.id, chunk.text])).toEqual([
      ["p1-c0", "abcd"],
      ["p1-c1", "cdef"],
      ["p1-c2", "efgh"],
      ["p1-c3", "ghij"],
    ]);
    expect(chunks[0]?.citation).toEqual({ page: 1, section: null, label: "page 1" });
  });

  it("cites the last heading that starts before the chunk ends", () => {
    const chunks = chunkRulebook([{ page: 3, text: "Preamble words here.\n4 Fees\nPay." }], {
      size: 12,
      overlap: 0,
    });
    expect(chunks.map((chunk) => chunk.citation.section)).toEqual([null, "4", "4"]);
    expect(chunks[1]?.citation.label).toBe("page 3, section 4");
  });

  it("reads dotted section numbers and ignores numbers inside a line", () => {
    const [chunk] = chunkRulebook(
      [{ page: 2, text: "Intro text\n3.2 Fees\nA grade of 3.0 or better." }],
      { size: 1000, overlap: 100 }
    );
    expect(chunk?.citation.section).toBe("3.2");
  });

  it("rejects an overlap that does not fit the chunk size", () => {
    expect(() => chunkRulebook([{ page: 1, text: "abc" }], { size: 10, overlap: 10 })).toThrow(
      "Chunk overlap must be smaller than the chunk size."
    );
  });

  it("formats citation labels", () => {
    expect(citationLabel(4, "4.1")).toBe("page 4, section 4.1");
    expect(citationLabel(4, null)).toBe("page 4");
  });
});
