import { PDFParse } from "pdf-parse";
import { toErrorMessage } from "../errors";
import type { Logger } from "../observability";

export interface ExtractedText {
  text: string;
  pageCount: number;
}

export type TextExtractor = (body: Buffer) => Promise<ExtractedText>;

interface ParserLike {
  getText(): Promise<{ text?: string; total: number }>;
  destroy(): Promise<void>;
}

export interface PdfTextExtractorDeps {
  logger: Logger;
  parserFactory?: (data: Buffer) => ParserLike;
}

/** Text layer of a PDF. Scans without one come back as empty text. */
export function createPdfTextExtractor(deps: PdfTextExtractorDeps): TextExtractor {
  const parserFactory = deps.parserFactory ?? ((data: Buffer) => new PDFParse({ data }));

  return async (body) => {
    const parser = parserFactory(body);
    try {
      const parsed = await parser.getText();
      return { text: parsed.text ?? "", pageCount: parsed.total };
    } finally {
      await parser.destroy().catch((error: unknown) => {
        deps.logger.debug("pdf_parser_destroy_failed", { error: toErrorMessage(error) });
      });
    }
  };
}
