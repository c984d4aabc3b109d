import type { Citation, RulebookPage } from "./rules.types";

export type ChunkDraft = {
  id: string;
  text: string;
  citation: Citation;
};

const HEADING_PATTERN = /^(\d{1,2}(?:\.\d{1,2})*)\.?[ \t]+\S/gm;

type Heading = { index: number; section: string };

function findHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  for (const match of text.matchAll(HEADING_PATTERN)) {
    if (match[1] !== undefined && match.index !== undefined) {
      headings.push({ index: match.index, section: match[1] });
    }
  }
  return headings;
}

export function citationLabel(page: number, section: string | null): string {
  return section ? `page ${page}, section ${section}` : `page ${page}`;
}

/**
 * Splits each page into overlapping fixed-size character windows. A chunk is
 * cited with the last section heading that starts before its end.
 */
export function chunkRulebook(
  pages: readonly RulebookPage[],
  options: { size: number; overlap: number }
): ChunkDraft[] {
  if (options.size <= 0 || options.overlap < 0 || options.overlap >= options.size) {
    throw new Error("Chunk overlap must be smaller than the chunk size.");
  }
  const step = options.size - options.overlap;
  const chunks: ChunkDraft[] = [];

  for (const page of pages) {
    const headings = findHeadings(page.text);
    let position = 0;
    for (let start = 0; start < page.text.length; start += step) {
      const end = Math.min(start + options.size, page.text.length);
      const text = page.text.slice(start, end).trim();
      if (text.length > 0) {
        const heading = headings.filter((entry) => entry.index < end).pop();
        const section = heading?.section ?? null;
        chunks.push({
          id: `p${page.page}-c${position}`,
          text,
          citation: { page: page.page, section, label: citationLabel(page.page, section) },
        });
        position += 1;
      }
      if (end === page.text.length) {
        break;
      }
    }
  }

  return chunks;
}
