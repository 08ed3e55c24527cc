/**
 * Query / Pagination Engine
 *
 * Read-only. Derives bounded, ascending id ranges from (start, count) and
 * resolves each id to a composite view. Every function here is total:
 * ids past latestId resolve to an empty view instead of failing.
 */

import { AssetView, Identity, PaginatedAssets, PaginationInfo } from './registry-types';
import { effectiveCount } from './validation';

export interface RegistryReader {
  getLatestId(): number;
  getDetails(id: number): string | null;
  getOwner(id: number): Identity | null;
  isTransferred(id: number): boolean;
}

export class QueryEngine {
  constructor(private readonly reader: RegistryReader) {}

  /**
   * Up to MAX_BATCH_SIZE consecutive ids beginning at start.
   */
  idRange(start: number, count: number): number[] {
    const n = effectiveCount(count);
    const ids: number[] = [];
    for (let i = 0; i < n; i++) {
      ids.push(start + i);
    }
    return ids;
  }

  view(id: number): AssetView {
    return {
      id,
      details: this.reader.getDetails(id),
      owner: this.reader.getOwner(id),
      transferred: this.reader.isTransferred(id),
    };
  }

  listArtworks(start: number, count: number): AssetView[] {
    return this.idRange(start, count).map(id => this.view(id));
  }

  listTransferred(start: number, count: number): number[] {
    return this.idRange(start, count).filter(id => this.reader.isTransferred(id));
  }

  /**
   * Metadata for the requested window; count is reported as asked, the
   * listing cap does not apply here.
   */
  paginateInfo(start: number, count: number): PaginationInfo {
    const total = this.reader.getLatestId();
    return {
      total,
      start,
      count,
      hasMore: total > start + count,
    };
  }

  listArtworksPaginated(start: number, count: number): PaginatedAssets {
    return {
      items: this.listArtworks(start, count),
      pagination: this.paginateInfo(start, count),
    };
  }
}
