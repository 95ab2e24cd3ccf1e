export interface StoredDocumentInfo {
  key: string;
  location: string;
  bytes: number;
}

/**
 * Key-value view over stored artifacts. Keys are canonical document IDs;
 * existence of a key is the only record that a document has been fetched.
 */
export interface DocumentStore {
  init(): Promise<void>;
  has(key: string): Promise<boolean>;
  read(key: string): Promise<Buffer>;
  write(key: string, content: Uint8Array): Promise<StoredDocumentInfo>;
  list(): Promise<string[]>;
  locate(key: string): string;
}

export class StoreInitializationError extends Error {
  readonly location: string;

  constructor(location: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to initialise document store at ${location}: ${reason}`);
    this.name = "StoreInitializationError";
    this.location = location;
  }
}
