import fs from "node:fs";
import path from "node:path";
import type { DocumentStore, StoredDocumentInfo } from "./types";
import { StoreInitializationError } from "./types";

export class FileDocumentStore implements DocumentStore {
  private readonly rootDir: string;
  private readonly extension: string;

  constructor(rootDir: string, extension = ".pdf") {
    this.rootDir = path.resolve(rootDir);
    this.extension = extension;
  }

  async init(): Promise<void> {
    try {
      await fs.promises.mkdir(this.rootDir, { recursive: true });
      await fs.promises.access(this.rootDir, fs.constants.R_OK | fs.constants.W_OK);
    } catch (error) {
      throw new StoreInitializationError(this.rootDir, error);
    }
  }

  locate(key: string): string {
    return path.join(this.rootDir, `${key}${this.extension}`);
  }

  async has(key: string): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(this.locate(key));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async read(key: string): Promise<Buffer> {
    return fs.promises.readFile(this.locate(key));
  }

  async write(key: string, content: Uint8Array): Promise<StoredDocumentInfo> {
    const finalPath = this.locate(key);
    const tempPath = `${finalPath}.part`;

    try {
      await fs.promises.writeFile(tempPath, content);
      await fs.promises.rename(tempPath, finalPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    return { key, location: finalPath, bytes: content.byteLength };
  }

  async list(): Promise<string[]> {
    const entries = await fs.promises.readdir(this.rootDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(this.extension))
      .map((entry) => entry.name.slice(0, entry.name.length - this.extension.length))
      .sort();
  }
}
