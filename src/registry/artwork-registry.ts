/**
 * Artwork Registry
 *
 * The single entry point for every registry operation. Mutations run
 * through commit(): each one is applied as a unit, persisted once, and
 * rolled back in memory if persisting fails.
 */

import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import { AssetStore } from './asset-store';
import { processBatch } from './batch-processor';
import { IdentityGate } from './identity-gate';
import { QueryEngine } from './query-engine';
import { RegistryError, RegistryErrorCode } from './registry-errors';
import {
  AssetView,
  Identity,
  PaginatedAssets,
  PaginationInfo,
  RegistrySnapshot,
  UpdatePolicy,
} from './registry-types';
import { TransferTracker } from './transfer-tracker';
import { assertBatchSize, assertValidDetails, isValidDetails } from './validation';

const COMPONENT = 'Registry';

/**
 * Somewhere to keep the registry state between restarts.
 */
export interface SnapshotStore {
  load(): RegistrySnapshot | null;
  save(snapshot: RegistrySnapshot): void;
}

export interface ArtworkRegistryOptions {
  admin: Identity;
  logger?: StructuredLogger;
  snapshotStore?: SnapshotStore;
}

export class ArtworkRegistry {
  private readonly assets = new AssetStore();
  private readonly transfers = new TransferTracker();
  private readonly gate: IdentityGate;
  private readonly query: QueryEngine;
  private readonly logger: StructuredLogger;
  private readonly snapshotStore?: SnapshotStore;

  constructor(options: ArtworkRegistryOptions) {
    this.gate = new IdentityGate(options.admin, this.assets);
    this.query = new QueryEngine({
      getLatestId: () => this.assets.getLatestId(),
      getDetails: id => this.assets.getDetails(id),
      getOwner: id => this.assets.getOwner(id),
      isTransferred: id => this.transfers.isTransferred(id),
    });
    this.logger = (options.logger ?? defaultLogger).child({ admin: options.admin });
    this.snapshotStore = options.snapshotStore;

    const persisted = this.snapshotStore?.load();
    if (persisted) {
      this.restore(persisted);
      this.logger.info(COMPONENT, 'Loaded registry state', {
        latestId: this.assets.getLatestId(),
        transferred: this.transfers.size(),
      });
    }
  }

  // ============================================================================
  // Identity
  // ============================================================================

  isAdmin(caller: Identity): boolean {
    return this.gate.isAdmin(caller);
  }

  isOwner(id: number, caller: Identity): boolean {
    return this.gate.isOwner(id, caller);
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  /**
   * Mint a single artwork. Administrator only.
   */
  addArtwork(details: string, caller: Identity): number {
    this.requireAdmin(caller);
    const id = this.commit(() => this.mint(details, caller));
    this.logger.info(COMPONENT, 'Artwork minted', { id, owner: caller });
    return id;
  }

  /**
   * Mint up to MAX_BATCH_SIZE artworks in one transaction.
   * Items with invalid details are dropped; the returned ids are those
   * that were minted, in submission order.
   */
  batchMint(detailsList: readonly string[], caller: Identity): number[] {
    this.requireAdmin(caller);
    assertBatchSize(detailsList.length);

    const outcome = this.commit(() =>
      processBatch(detailsList, details => this.mint(details, caller))
    );

    for (const drop of outcome.dropped) {
      this.logger.debug(COMPONENT, 'Batch item dropped', {
        index: drop.index,
        code: drop.error.codeName,
      });
    }
    this.logger.info(COMPONENT, 'Batch minted', {
      requested: detailsList.length,
      minted: outcome.results.length,
      firstId: outcome.results[0],
      lastId: outcome.results[outcome.results.length - 1],
    });

    return outcome.results;
  }

  /**
   * One-shot ownership transfer. Submitted by the recipient; `from` only
   * names the expected current owner. An asset that has been transferred
   * once can never be transferred again.
   */
  transfer(id: number, from: Identity, to: Identity, caller: Identity): void {
    const owner = this.assets.getOwner(id);
    if (owner === null) {
      throw new RegistryError(RegistryErrorCode.AssetNotFound, `Asset ${id} not found`);
    }
    if (caller !== to) {
      throw new RegistryError(RegistryErrorCode.NotOwner, 'Transfer must be submitted by the recipient');
    }
    if (this.transfers.isTransferred(id)) {
      throw new RegistryError(RegistryErrorCode.AssetNotFound, `Asset ${id} has already been transferred`);
    }
    if (owner !== from) {
      throw new RegistryError(RegistryErrorCode.NotOwner, `Asset ${id} is not owned by ${from}`);
    }

    this.commit(() => {
      this.assets.setOwner(id, to);
      this.transfers.markTransferred(id);
    });
    this.logger.info(COMPONENT, 'Artwork transferred', { id, from, to });
  }

  /**
   * Rewrite an artwork's details. Under the strict policy only the owner
   * may do so; under the permissive policy the administrator may as well.
   */
  updateDetails(id: number, newDetails: string, caller: Identity, policy: UpdatePolicy = 'strict'): void {
    if (!this.assets.has(id)) {
      throw new RegistryError(RegistryErrorCode.AssetNotFound, `Asset ${id} not found`);
    }

    const allowed = this.gate.isOwner(id, caller)
      || (policy === 'permissive' && this.gate.isAdmin(caller));
    if (!allowed) {
      throw new RegistryError(RegistryErrorCode.NotOwner, `Caller may not update asset ${id}`);
    }

    assertValidDetails(newDetails);

    this.commit(() => this.assets.setDetails(id, newDetails));
    this.logger.info(COMPONENT, 'Artwork details updated', { id, by: caller, policy });
  }

  /**
   * Details update with administrator override.
   */
  secureUpdateDetails(id: number, newDetails: string, caller: Identity): void {
    this.updateDetails(id, newDetails, caller, 'permissive');
  }

  /**
   * Advance the id counter without minting. Not restricted to the
   * administrator.
   */
  reserveIds(count: number, caller: Identity): number {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`Reserve count must be a non-negative integer, got ${count}`);
    }
    if (count > Number.MAX_SAFE_INTEGER - this.assets.getLatestId()) {
      throw new RangeError(
        `Reserving ${count} ids would push latestId ${this.assets.getLatestId()} past ${Number.MAX_SAFE_INTEGER}`
      );
    }

    const latestId = this.commit(() => this.assets.advance(count));
    this.logger.warn(COMPONENT, 'Ids reserved without minting', { count, latestId, caller });
    return latestId;
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getDetails(id: number): string | null {
    return this.assets.getDetails(id);
  }

  getOwner(id: number): Identity | null {
    return this.assets.getOwner(id);
  }

  isTransferred(id: number): boolean {
    return this.transfers.isTransferred(id);
  }

  getLatestId(): number {
    return this.assets.getLatestId();
  }

  getTotalCount(): number {
    return this.assets.getLatestId();
  }

  validateId(id: number): boolean {
    return id > 0 && id <= this.assets.getLatestId();
  }

  getArtwork(id: number): AssetView {
    return this.query.view(id);
  }

  listArtworks(start: number, count: number): AssetView[] {
    return this.query.listArtworks(start, count);
  }

  listArtworksPaginated(start: number, count: number): PaginatedAssets {
    return this.query.listArtworksPaginated(start, count);
  }

  listTransferred(start: number, count: number): number[] {
    return this.query.listTransferred(start, count);
  }

  paginateInfo(start: number, count: number): PaginationInfo {
    return this.query.paginateInfo(start, count);
  }

  // ============================================================================
  // State
  // ============================================================================

  snapshot(): RegistrySnapshot {
    const state = this.assets.exportState();
    const details: Record<string, string> = {};
    const owners: Record<string, Identity> = {};
    for (const [id, text] of state.details) details[String(id)] = text;
    for (const [id, owner] of state.owners) owners[String(id)] = owner;

    return {
      admin: this.gate.getAdmin(),
      latestId: state.latestId,
      details,
      owners,
      transferred: this.transfers.list(),
    };
  }

  private restore(snapshot: RegistrySnapshot): void {
    if (snapshot.admin !== this.gate.getAdmin()) {
      throw new Error(
        `Persisted registry belongs to administrator ${snapshot.admin}, configured administrator is ${this.gate.getAdmin()}`
      );
    }
    if (!Number.isSafeInteger(snapshot.latestId) || snapshot.latestId < 0) {
      throw new Error(`Corrupt registry snapshot: invalid latestId ${snapshot.latestId}`);
    }

    const owners = new Map<number, Identity>();
    const details = new Map<number, string>();
    for (const [key, owner] of Object.entries(snapshot.owners)) {
      const id = this.parseSnapshotId(key, snapshot.latestId);
      const text = snapshot.details[key];
      if (!isValidDetails(text)) {
        throw new Error(`Corrupt registry snapshot: invalid details for asset ${id}`);
      }
      owners.set(id, owner);
      details.set(id, text);
    }
    if (Object.keys(snapshot.details).length !== owners.size) {
      throw new Error('Corrupt registry snapshot: details without an owner');
    }
    for (const id of snapshot.transferred) {
      if (!owners.has(id)) {
        throw new Error(`Corrupt registry snapshot: transferred asset ${id} was never minted`);
      }
    }

    this.assets.importState({ latestId: snapshot.latestId, details, owners });
    this.transfers.importIds(snapshot.transferred);
  }

  private parseSnapshotId(key: string, latestId: number): number {
    const id = Number(key);
    if (!Number.isSafeInteger(id) || id < 1 || id > latestId) {
      throw new Error(`Corrupt registry snapshot: asset id ${key} outside [1, ${latestId}]`);
    }
    return id;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private requireAdmin(caller: Identity): void {
    if (!this.gate.isAdmin(caller)) {
      throw new RegistryError(RegistryErrorCode.NotAdmin);
    }
  }

  private mint(details: string, caller: Identity): number {
    assertValidDetails(details);
    return this.assets.allocate(details, caller);
  }

  private commit<T>(apply: () => T): T {
    if (!this.snapshotStore) return apply();

    const assetsBefore = this.assets.exportState();
    const transfersBefore = this.transfers.list();
    try {
      const result = apply();
      this.snapshotStore.save(this.snapshot());
      return result;
    } catch (err) {
      this.assets.importState(assetsBefore);
      this.transfers.importIds(transfersBefore);
      throw err;
    }
  }
}
