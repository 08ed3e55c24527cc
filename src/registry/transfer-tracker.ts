/**
 * Transfer State Tracker
 *
 * Per asset: Untransferred -> Transferred, and never back.
 * Absent entries read as Untransferred.
 */
export class TransferTracker {
  private transferred: Set<number> = new Set();

  isTransferred(id: number): boolean {
    return this.transferred.has(id);
  }

  markTransferred(id: number): void {
    this.transferred.add(id);
  }

  /** Transferred ids in ascending order */
  list(): number[] {
    return Array.from(this.transferred).sort((a, b) => a - b);
  }

  size(): number {
    return this.transferred.size;
  }

  importIds(ids: Iterable<number>): void {
    this.transferred = new Set(ids);
  }
}
