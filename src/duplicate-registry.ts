// src/duplicate-registry.ts

/**
 * In-memory view of what the destination already holds (content hash ->
 * canonical remote path) and which local files earlier sessions on the same
 * source/destination pair already delivered.
 *
 * Not synchronized: the pipeline processes files one at a time.
 */
export class DuplicateRegistry {
  private readonly remoteHashIndex = new Map<string, string>();
  private readonly processedLocalPaths = new Set<string>();
  private readonly processedHashes = new Set<string>();

  /** Seed from a (local path -> hash) map of confirmed transfers. */
  loadProcessed(processed: ReadonlyMap<string, string>): void {
    for (const [path, hash] of processed) {
      this.processedLocalPaths.add(path);
      if (hash) this.processedHashes.add(hash);
    }
  }

  addProcessedPaths(paths: Iterable<string>): void {
    for (const p of paths) this.processedLocalPaths.add(p);
  }

  /**
   * Path match, or, when a hash is given, content already delivered under
   * some other local path (the file was moved or renamed).
   */
  alreadyProcessed(localPath: string, hash?: string): boolean {
    if (this.processedLocalPaths.has(localPath)) return true;
    return hash != null && this.processedHashes.has(hash);
  }

  isDuplicate(hash: string): boolean {
    return this.remoteHashIndex.has(hash);
  }

  canonicalPath(hash: string): string | undefined {
    return this.remoteHashIndex.get(hash);
  }

  /**
   * Record that `path` on the destination holds content `hash`. The first
   * path registered for a hash stays canonical; returns true when this call
   * made it so.
   */
  registerRemote(hash: string, path: string): boolean {
    if (this.remoteHashIndex.has(hash)) return false;
    this.remoteHashIndex.set(hash, path);
    return true;
  }

  get remoteCount(): number {
    return this.remoteHashIndex.size;
  }

  get processedCount(): number {
    return this.processedLocalPaths.size;
  }
}
