export type ExtractableFile = {
  fileName: string;
  mimeType: string;
  buffer: Buffer;
};

export interface TextExtractor {
  extract(file: ExtractableFile): Promise<string>;
}

export function isPdfFile(file: Pick<ExtractableFile, "fileName" | "mimeType">): boolean {
  return file.mimeType === "application/pdf" || file.fileName.toLowerCase().endsWith(".pdf");
}

export function normalizeText(text: string): string {
  return text
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(/[ \t]+\n/g, "\n")
    .trim();
}

export class PdfTextExtractor implements TextExtractor {
  constructor(private readonly maxPages?: number) {}

  async extract(file: ExtractableFile): Promise<string> {
    if (isPdfFile(file)) {
      const { default: pdfParse } = await import("pdf-parse");
      const parsed = await pdfParse(file.buffer, this.maxPages ? { max: this.maxPages } : undefined);
      return normalizeText(parsed.text ?? "");
    }
    if (file.mimeType.startsWith("text/")) {
      return normalizeText(file.buffer.toString("utf8"));
    }
    return "";
  }
}
