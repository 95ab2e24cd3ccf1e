import type { AppConfig } from "../config";
import { FileDocumentStore } from "./fileStore";
import type { DocumentStore } from "./types";

export function createStore(config: AppConfig): DocumentStore {
  return new FileDocumentStore(config.storeDir, config.fileExtension);
}

export * from "./fileStore";
export * from "./memoryStore";
export * from "./types";
