import type { DocumentStore, StoredDocumentInfo } from "./types";

export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, Buffer>();

  constructor(initial?: Record<string, Uint8Array | string>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.documents.set(key, typeof value === "string" ? Buffer.from(value, "utf-8") : Buffer.from(value));
    }
  }

  async init(): Promise<void> {
    return;
  }

  locate(key: string): string {
    return `memory://${key}`;
  }

  async has(key: string): Promise<boolean> {
    return this.documents.has(key);
  }

  async read(key: string): Promise<Buffer> {
    const content = this.documents.get(key);
    if (!content) {
      throw new Error(`Document ${key} is not stored`);
    }
    return content;
  }

  async write(key: string, content: Uint8Array): Promise<StoredDocumentInfo> {
    this.documents.set(key, Buffer.from(content));
    return { key, location: this.locate(key), bytes: content.byteLength };
  }

  async list(): Promise<string[]> {
    return [...this.documents.keys()].sort();
  }
}
