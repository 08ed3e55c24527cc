/**
 * ARTWORK REGISTRY TYPES
 *
 * The registry mints artwork records under a dense integer id space,
 * tracks the single current owner of each record, and remembers whether a
 * record has ever changed hands.
 *
 * Key principles:
 * - Ids are allocated sequentially, starting at 1, only at latestId + 1
 * - Exactly one owner per minted id
 * - The transfer flag only ever flips false -> true
 * - Records are never destroyed
 */

/** Identity of a caller or owner (an account id, address, etc.) */
export type Identity = string;

export const MIN_DETAILS_LENGTH = 1;
export const MAX_DETAILS_LENGTH = 512;

/** Upper bound for batch mints and for every listing page */
export const MAX_BATCH_SIZE = 50;

/**
 * Minted Artwork Record
 */
export interface AssetRecord {
  id: number;
  details: string;
  owner: Identity;
  transferred: boolean;
}

/**
 * Composite read view used by listings.
 * Ids that were never minted resolve to null details/owner.
 */
export interface AssetView {
  id: number;
  details: string | null;
  owner: Identity | null;
  transferred: boolean;
}

export interface PaginationInfo {
  total: number;
  start: number;
  count: number;
  hasMore: boolean;
}

export interface PaginatedAssets {
  items: AssetView[];
  pagination: PaginationInfo;
}

/**
 * Who may rewrite an artwork's details:
 * - strict: only the current owner
 * - permissive: the current owner or the administrator
 */
export type UpdatePolicy = 'strict' | 'permissive';

/**
 * Persisted state layout.
 * One counter, plus id-keyed details/owner maps and the set of transferred ids.
 */
export interface RegistrySnapshot {
  admin: Identity;
  latestId: number;
  details: Record<string, string>;
  owners: Record<string, Identity>;
  transferred: number[];
}
