import { readFile } from "fs/promises";
import { extname } from "path";
import { z } from "zod";
import type { RulebookPage } from "./rules.types";

const pageSchema = z.object({
  page: z.number().int().positive(),
  text: z.string(),
});

/** Chunk ids are derived from page numbers, so a page may appear only once. */
const pagesSchema = z.array(pageSchema).superRefine((pages, ctx) => {
  const seen = new Set<number>();
  pages.forEach((entry, index) => {
    if (seen.has(entry.page)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "page"],
        message: `Duplicate rulebook page ${entry.page}.`,
      });
    }
    seen.add(entry.page);
  });
});

/** Accepts a bare page array or `{ pages: [...] }`. */
const rulebookJsonSchema = z.preprocess(
  (value) =>
    value !== null && typeof value === "object" && !Array.isArray(value) && "pages" in value
      ? value.pages
      : value,
  pagesSchema
);

type PdfTextContent = {
  items: Array<{ str: string; transform: number[] }>;
};

export type PdfPage = {
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<PdfTextContent>;
};

export type PdfParser = (
  buffer: Buffer,
  options: { pagerender: (page: PdfPage) => Promise<string> }
) => Promise<unknown>;

const parsePdf: PdfParser = async (buffer, options) => {
  const { default: pdfParse } = await import("pdf-parse");
  return pdfParse(buffer, options);
};

/** Starts a new line whenever the baseline of the next text item moves. */
export function renderPdfPageText(content: PdfTextContent): string {
  let text = "";
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    if (lastY !== undefined && y !== lastY) {
      text += "\n";
    }
    text += item.str;
    lastY = y;
  }
  return text;
}

/** Text rulebooks separate pages with form feeds; pages are numbered from 1. */
export function splitRulebookText(text: string): RulebookPage[] {
  return text
    .replace(/\r\n/g, "\n")
    .split("\f")
    .map((pageText, index) => ({ page: index + 1, text: pageText.trim() }))
    .filter((page) => page.text.length > 0);
}

export function parseRulebookJson(raw: string): RulebookPage[] {
  const pages = rulebookJsonSchema.parse(JSON.parse(raw));
  return [...pages].sort((a, b) => a.page - b.page);
}

/** pdf-parse renders pages in order, one at a time. */
export async function parseRulebookPdf(
  buffer: Buffer,
  parser: PdfParser = parsePdf
): Promise<RulebookPage[]> {
  const pages: RulebookPage[] = [];
  let rendered = 0;
  await parser(buffer, {
    pagerender: async (pdfPage) => {
      rendered += 1;
      const page = rendered;
      const text = renderPdfPageText(
        await pdfPage.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
      );
      pages.push({ page, text: text.trim() });
      return text;
    },
  });
  return pages.filter((page) => page.text.length > 0);
}

export async function loadRulebookPages(path: string): Promise<RulebookPage[]> {
  const extension = extname(path).toLowerCase();
  if (extension === ".pdf") {
    return parseRulebookPdf(await readFile(path));
  }
  const raw = await readFile(path, "utf8");
  return extension === ".json" ? parseRulebookJson(raw) : splitRulebookText(raw);
}
