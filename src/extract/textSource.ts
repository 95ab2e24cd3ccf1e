export interface PageTextSource {
  /** Text of every page of the stored document, in page order. */
  readPages(docId: string): Promise<string[]>;
}
