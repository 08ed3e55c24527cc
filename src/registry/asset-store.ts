/**
 * Asset Store
 *
 * Identifier allocator plus the id-keyed details and owner stores.
 * New records are only ever inserted at latestId + 1, so the minted ids
 * form a dense prefix of the id space (apart from ranges skipped by
 * advance()).
 */

import { Identity } from './registry-types';
import { RegistryError, RegistryErrorCode } from './registry-errors';
import { OwnerLookup } from './identity-gate';

export interface AssetStoreState {
  latestId: number;
  details: Map<number, string>;
  owners: Map<number, Identity>;
}

export class AssetStore implements OwnerLookup {
  private latestId: number = 0;
  private details: Map<number, string> = new Map();
  private owners: Map<number, Identity> = new Map();

  getLatestId(): number {
    return this.latestId;
  }

  has(id: number): boolean {
    return this.owners.has(id);
  }

  getDetails(id: number): string | null {
    return this.details.get(id) ?? null;
  }

  getOwner(id: number): Identity | null {
    return this.owners.get(id) ?? null;
  }

  /**
   * Allocate the next id and record its owner and details.
   * Details must already be validated. Nothing is written if the
   * allocated id is somehow already owned.
   */
  allocate(details: string, owner: Identity): number {
    if (this.latestId >= Number.MAX_SAFE_INTEGER) {
      throw new RangeError(`Identifier space exhausted at ${this.latestId}`);
    }
    const newId = this.latestId + 1;
    if (this.owners.has(newId)) {
      throw new RegistryError(RegistryErrorCode.AssetExists, `Asset ${newId} already exists`);
    }

    this.owners.set(newId, owner);
    this.details.set(newId, details);
    this.latestId = newId;
    return newId;
  }

  setDetails(id: number, details: string): void {
    if (!this.owners.has(id)) {
      throw new RegistryError(RegistryErrorCode.AssetNotFound, `Asset ${id} not found`);
    }
    this.details.set(id, details);
  }

  setOwner(id: number, owner: Identity): void {
    if (!this.owners.has(id)) {
      throw new RegistryError(RegistryErrorCode.AssetNotFound, `Asset ${id} not found`);
    }
    this.owners.set(id, owner);
  }

  /**
   * Bump the counter without minting anything.
   */
  advance(count: number): number {
    if (count > Number.MAX_SAFE_INTEGER - this.latestId) {
      throw new RangeError(`Cannot advance ${this.latestId} by ${count} past ${Number.MAX_SAFE_INTEGER}`);
    }
    this.latestId += count;
    return this.latestId;
  }

  exportState(): AssetStoreState {
    return {
      latestId: this.latestId,
      details: new Map(this.details),
      owners: new Map(this.owners),
    };
  }

  importState(state: AssetStoreState): void {
    this.latestId = state.latestId;
    this.details = new Map(state.details);
    this.owners = new Map(state.owners);
  }
}
