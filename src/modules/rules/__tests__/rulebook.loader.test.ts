import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadRulebookPages,
  parseRulebookJson,
  parseRulebookPdf,
  renderPdfPageText,
  splitRulebookText,
  type PdfPage,
  type PdfParser,
} from "../rulebook.loader";
import { chunkRulebook } from "../ruleChunker";

function pdfPage(lines: Array<[string, number]>): PdfPage {
  return {
    getTextContent: async () => ({
      items: lines.map(([str, y]) => ({ str, transform: [1, 0, 0, 1, 0, y] })),
    }),
  };
}

function fakePdfParser(pages: PdfPage[]): PdfParser {
  return async (_buffer, options) => {
    for (const page of pages) {
      await options.pagerender(page);
    }
    return { numpages: pages.length };
  };
}

describe("rulebook loader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rulebook-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("splits text rulebooks on form feeds and keeps page numbers", () => {
    expect(splitRulebookText("Page one\f\fPage three\r\nline")).toEqual([
      { page: 1, text: "Page one" },
      { page: 3, text: "Page three\nline" },
    ]);
  });

  it("accepts JSON page arrays in either shape", () => {
    expect(parseRulebookJson('{"pages":[{"page":2,"text":"b"},{"page":1,"text":"a"}]}')).toEqual([
      { page: 1, text: "a" },
      { page: 2, text: "b" },
    ]);
    expect(parseRulebookJson('[{"page":1,"text":"a"}]')).toEqual([{ page: 1, text: "a" }]);
    expect(() => parseRulebookJson('{"pages":[{"page":0,"text":"a"}]}')).toThrow();
  });

  it("rejects JSON rulebooks that repeat a page", () => {
    const raw = '[{"page":1,"text":"1.1 Fees"},{"page":1,"text":"1.2 Deadlines"}]';

    expect(() => parseRulebookJson(raw)).toThrow("Duplicate rulebook page 1.");
    expect(() => parseRulebookJson(`{"pages":${raw}}`)).toThrow("Duplicate rulebook page 1.");
  });

  it("gives every chunk of a JSON rulebook its own id", () => {
    const pages = parseRulebookJson('[{"page":2,"text":"2.1 Fees"},{"page":1,"text":"1.1 Scope"}]');

    const ids = chunkRulebook(pages, { size: 1000, overlap: 100 }).map((chunk) => chunk.id);

    expect(new Set(ids).size).toBe(ids.length);
  });

  it("renders PDF text items line by line", () => {
    const page = {
      items: [
        { str: "4.1 Work experience", transform: [1, 0, 0, 1, 0, 700] },
        { str: "At least 36 months", transform: [1, 0, 0, 1, 0, 680] },
        { str: " are required.", transform: [1, 0, 0, 1, 0, 680] },
      ],
    };

    expect(renderPdfPageText(page)).toBe("4.1 Work experience\nAt least 36 months are required.");
  });

  it("numbers PDF rulebook pages in render order and drops blank pages", async () => {
    const parser = fakePdfParser([
      pdfPage([["1 Scope", 700]]),
      pdfPage([]),
      pdfPage([
        ["3.1 Fees", 700],
        ["No tuition fees.", 680],
      ]),
    ]);

    await expect(parseRulebookPdf(Buffer.from("%PDF-1.4"), parser)).resolves.toEqual([
      { page: 1, text: "1 Scope" },
      { page: 3, text: "3.1 Fees\nNo tuition fees." },
    ]);
  });

  it("picks the parser from the file extension", async () => {
    const textPath = join(dir, "rules.txt");
    const jsonPath = join(dir, "rules.json");
    await writeFile(textPath, "1 Scope\fWork experience", "utf8");
    await writeFile(jsonPath, '[{"page":5,"text":"Fees"}]', "utf8");

    await expect(loadRulebookPages(textPath)).resolves.toEqual([
      { page: 1, text: "1 Scope" },
      { page: 2, text: "Work experience" },
    ]);
    await expect(loadRulebookPages(jsonPath)).resolves.toEqual([{ page: 5, text: "Fees" }]);
  });
});
