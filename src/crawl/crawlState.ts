/**
 * Frontier bookkeeping for one traversal run. `processed` and `failed` are
 * disjoint, and an ID that is processed, failed or already queued is never
 * queued again. `queued` mirrors the frontier so membership checks stay O(1).
 */
export class CrawlState {
  private readonly community: string;
  private readonly frontier: string[] = [];
  private readonly queued = new Set<string>();
  private readonly processed = new Set<string>();
  private readonly failed = new Set<string>();
  private head = 0;

  constructor(community: string, startKey: string) {
    this.community = community;
    this.enqueue(startKey);
  }

  get pendingCount(): number {
    return this.frontier.length - this.head;
  }

  get processedCount(): number {
    return this.processed.size;
  }

  get failedCount(): number {
    return this.failed.size;
  }

  hasPending(): boolean {
    return this.pendingCount > 0;
  }

  /** Removes and returns the head of the frontier. */
  next(): string | undefined {
    if (!this.hasPending()) {
      return undefined;
    }
    const key = this.frontier[this.head];
    this.head += 1;
    this.queued.delete(key);
    if (this.head > 1024 && this.head * 2 > this.frontier.length) {
      this.frontier.splice(0, this.head);
      this.head = 0;
    }
    return key;
  }

  isSettled(key: string): boolean {
    return this.processed.has(key) || this.failed.has(key);
  }

  isQueued(key: string): boolean {
    return this.queued.has(key);
  }

  /** Returns false when the key was rejected (other community, settled or already queued). */
  enqueue(key: string): boolean {
    if (!key.startsWith(`${this.community}-`) || this.isSettled(key) || this.queued.has(key)) {
      return false;
    }
    this.frontier.push(key);
    this.queued.add(key);
    return true;
  }

  markProcessed(key: string): void {
    this.failed.delete(key);
    this.processed.add(key);
  }

  markFailed(key: string): void {
    if (!this.processed.has(key)) {
      this.failed.add(key);
    }
  }

  processedKeys(): string[] {
    return [...this.processed].sort();
  }

  failedKeys(): string[] {
    return [...this.failed].sort();
  }
}
