export * from "./pdfTextSource";
export * from "./referenceExtractor";
export type { PageTextSource } from "./textSource";
