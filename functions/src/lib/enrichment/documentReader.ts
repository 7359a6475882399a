import { readFile } from "node:fs/promises";
import { fileExtension } from "../attachments/fetcher";
import type { DocumentsConfig } from "../config";

/** Plain text of a downloaded document, or null when it carries none. */
export interface DocumentReader {
  read(path: string): Promise<string | null>;
}

async function pdfText(path: string, maxPages: number) {
  // loaded on first use: pdf-parse runs self-test code when imported without a parent module
  const { default: pdfParse } = await import("pdf-parse");
  const data = await pdfParse(await readFile(path), { max: maxPages });
  return data.text;
}

export function createDocumentReader(
  docs: Pick<DocumentsConfig, "maxPdfPages" | "minTextLength">
): DocumentReader {
  return {
    async read(path) {
      const ext = fileExtension(path);
      let text: string;
      if (ext === "pdf") text = await pdfText(path, docs.maxPdfPages);
      else if (ext === "txt") text = await readFile(path, "utf8");
      else return null;

      const trimmed = text.replace(/\r\n/g, "\n").trim();
      return trimmed.length >= docs.minTextLength ? trimmed : null;
    },
  };
}
