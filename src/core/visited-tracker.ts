/**
 * Once-only admission set for crawl targets, scoped to a single run.
 *
 * `tryAdmit` checks and inserts in one synchronous step. Branches only
 * interleave at `await` points, so no two callers can both observe a target
 * as absent. The set itself is never handed out.
 */
export class VisitedTracker {
  private readonly visited = new Set<string>();

  /** Returns true iff this call inserted `target`. */
  tryAdmit(target: string): boolean {
    if (this.visited.has(target)) return false;
    this.visited.add(target);
    return true;
  }

  has(target: string): boolean {
    return this.visited.has(target);
  }

  get size(): number {
    return this.visited.size;
  }

  /** Snapshot of admitted targets in admission order */
  toArray(): string[] {
    return [...this.visited];
  }
}
