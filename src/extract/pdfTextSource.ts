import { PDFParse } from "pdf-parse";
import type { DocumentStore } from "../store";
import type { PageTextSource } from "./textSource";

interface ParserLike {
  getText(): Promise<{
    total: number;
    text: string;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  destroy(): Promise<void>;
}

interface PdfTextSourceDeps {
  parserFactory?: (data: Buffer) => ParserLike;
}

export class PdfParseTextSource implements PageTextSource {
  private readonly store: DocumentStore;
  private readonly parserFactory: (data: Buffer) => ParserLike;

  constructor(store: DocumentStore, deps?: PdfTextSourceDeps) {
    this.store = store;
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
  }

  async readPages(docId: string): Promise<string[]> {
    const pdfBuffer = await this.store.read(docId);
    const parser = this.parserFactory(pdfBuffer);

    let textResult;
    try {
      textResult = await parser.getText();
    } finally {
      await parser.destroy().catch(() => undefined);
    }

    if (textResult.pages.length === 0) {
      return [textResult.text];
    }

    return [...textResult.pages].sort((a, b) => a.num - b.num).map((page) => page.text);
  }
}
