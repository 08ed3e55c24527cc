import { ArtworkRegistry, SnapshotStore } from './artwork-registry';
import { RegistryError, RegistryErrorCode } from './registry-errors';
import { RegistrySnapshot } from './registry-types';
import { LogLevel, StructuredLogger } from '../logging/structured-logger';

const ADMIN = 'admin-account';
const ALICE = 'alice';
const BOB = 'bob';
const CAROL = 'carol';

const quietLogger = new StructuredLogger({ minLevel: LogLevel.ERROR });

function createRegistry(snapshotStore?: SnapshotStore): ArtworkRegistry {
  return new ArtworkRegistry({ admin: ADMIN, logger: quietLogger, snapshotStore });
}

function expectRegistryError(fn: () => unknown, code: RegistryErrorCode): void {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(RegistryError);
    expect(err instanceof RegistryError && err.code).toBe(code);
    return;
  }
  throw new Error(`Expected RegistryError ${RegistryErrorCode[code]}`);
}

describe('ArtworkRegistry', () => {
  describe('minting', () => {
    it('allocates ids sequentially from 1', () => {
      const registry = createRegistry();

      expect(registry.addArtwork('first', ADMIN)).toBe(1);
      expect(registry.addArtwork('second', ADMIN)).toBe(2);
      expect(registry.addArtwork('third', ADMIN)).toBe(3);

      expect(registry.getLatestId()).toBe(3);
      expect(registry.listArtworks(1, 3).map(v => v.id)).toEqual([1, 2, 3]);
    });

    it('records the administrator as owner of freshly minted artworks', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('Sunset over the bay', ADMIN);

      expect(registry.getOwner(id)).toBe(ADMIN);
      expect(registry.getDetails(id)).toBe('Sunset over the bay');
      expect(registry.isTransferred(id)).toBe(false);
    });

    it('rejects non-admin minting without touching the counter', () => {
      const registry = createRegistry();

      expectRegistryError(() => registry.addArtwork('stolen', ALICE), RegistryErrorCode.NotAdmin);
      expect(registry.getLatestId()).toBe(0);
    });

    it('enforces the details length bounds', () => {
      const registry = createRegistry();

      expectRegistryError(() => registry.addArtwork('', ADMIN), RegistryErrorCode.InvalidDetails);
      expectRegistryError(() => registry.addArtwork('x'.repeat(513), ADMIN), RegistryErrorCode.InvalidDetails);
      expect(registry.getLatestId()).toBe(0);

      expect(registry.addArtwork('x', ADMIN)).toBe(1);
      expect(registry.addArtwork('x'.repeat(512), ADMIN)).toBe(2);
    });

    it('counts characters rather than UTF-16 units', () => {
      const registry = createRegistry();
      const emoji = '\u{1F3A8}';

      expect(registry.addArtwork(emoji.repeat(512), ADMIN)).toBe(1);
      expectRegistryError(() => registry.addArtwork(emoji.repeat(513), ADMIN), RegistryErrorCode.InvalidDetails);
    });

    it('checks admin before details', () => {
      const registry = createRegistry();
      expectRegistryError(() => registry.addArtwork('', ALICE), RegistryErrorCode.NotAdmin);
    });
  });

  describe('batch minting', () => {
    it('drops invalid items and keeps submission order', () => {
      const registry = createRegistry();
      registry.addArtwork('existing', ADMIN);

      const ids = registry.batchMint(['a', '', 'c', '', 'e'], ADMIN);

      expect(ids).toEqual([2, 3, 4]);
      expect(registry.getLatestId()).toBe(4);
      expect(registry.getDetails(2)).toBe('a');
      expect(registry.getDetails(3)).toBe('c');
      expect(registry.getDetails(4)).toBe('e');
    });

    it('rejects empty and oversized batches', () => {
      const registry = createRegistry();

      expectRegistryError(() => registry.batchMint([], ADMIN), RegistryErrorCode.MaxBatchSize);
      expectRegistryError(
        () => registry.batchMint(Array.from({ length: 51 }, (_, i) => `item ${i}`), ADMIN),
        RegistryErrorCode.MaxBatchSize
      );
      expect(registry.getLatestId()).toBe(0);
    });

    it('accepts a full batch of 50', () => {
      const registry = createRegistry();
      const ids = registry.batchMint(Array.from({ length: 50 }, (_, i) => `item ${i}`), ADMIN);

      expect(ids).toHaveLength(50);
      expect(ids[0]).toBe(1);
      expect(ids[49]).toBe(50);
      expect(registry.getLatestId()).toBe(50);
    });

    it('returns an empty list when every item is invalid', () => {
      const registry = createRegistry();

      expect(registry.batchMint(['', 'y'.repeat(600)], ADMIN)).toEqual([]);
      expect(registry.getLatestId()).toBe(0);
    });

    it('checks admin before batch size', () => {
      const registry = createRegistry();
      expectRegistryError(() => registry.batchMint([], ALICE), RegistryErrorCode.NotAdmin);
    });
  });

  describe('transfer', () => {
    it('moves ownership once and sets the transfer flag', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('piece', ADMIN);

      registry.transfer(id, ADMIN, BOB, BOB);

      expect(registry.getOwner(id)).toBe(BOB);
      expect(registry.isTransferred(id)).toBe(true);
      expect(registry.getDetails(id)).toBe('piece');
    });

    it('forbids any second transfer, even though the asset exists', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('piece', ADMIN);
      registry.transfer(id, ADMIN, BOB, BOB);

      expectRegistryError(() => registry.transfer(id, BOB, CAROL, CAROL), RegistryErrorCode.AssetNotFound);
      expectRegistryError(() => registry.transfer(id, BOB, ADMIN, ADMIN), RegistryErrorCode.AssetNotFound);
      expect(registry.getOwner(id)).toBe(BOB);
    });

    it('fails for an unknown asset', () => {
      const registry = createRegistry();
      expectRegistryError(() => registry.transfer(7, ADMIN, BOB, BOB), RegistryErrorCode.AssetNotFound);
    });

    it('must be submitted by the recipient', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('piece', ADMIN);

      expectRegistryError(() => registry.transfer(id, ADMIN, BOB, ADMIN), RegistryErrorCode.NotOwner);
      expect(registry.getOwner(id)).toBe(ADMIN);
      expect(registry.isTransferred(id)).toBe(false);
    });

    it('requires from to match the current owner', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('piece', ADMIN);

      expectRegistryError(() => registry.transfer(id, ALICE, BOB, BOB), RegistryErrorCode.NotOwner);
      expect(registry.getOwner(id)).toBe(ADMIN);
      expect(registry.isTransferred(id)).toBe(false);
    });
  });

  describe('details updates', () => {
    it('lets the owner rewrite details without touching owner or flag', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('draft', ADMIN);
      registry.transfer(id, ADMIN, ALICE, ALICE);

      registry.updateDetails(id, 'final', ALICE);

      expect(registry.getDetails(id)).toBe('final');
      expect(registry.getOwner(id)).toBe(ALICE);
      expect(registry.isTransferred(id)).toBe(true);
    });

    it('rejects a non-owner under the strict policy, even the administrator', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('draft', ADMIN);
      registry.transfer(id, ADMIN, ALICE, ALICE);

      expectRegistryError(() => registry.updateDetails(id, 'hijack', BOB), RegistryErrorCode.NotOwner);
      expectRegistryError(() => registry.updateDetails(id, 'override', ADMIN), RegistryErrorCode.NotOwner);
      expect(registry.getDetails(id)).toBe('draft');
    });

    it('lets the administrator override through secureUpdateDetails', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('draft', ADMIN);
      registry.transfer(id, ADMIN, ALICE, ALICE);

      registry.secureUpdateDetails(id, 'corrected', ADMIN);

      expect(registry.getDetails(id)).toBe('corrected');
      expect(registry.getOwner(id)).toBe(ALICE);
    });

    it('still rejects strangers under the permissive policy', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('draft', ADMIN);

      expectRegistryError(() => registry.secureUpdateDetails(id, 'nope', BOB), RegistryErrorCode.NotOwner);
    });

    it('checks existence, then authorization, then validity', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('draft', ADMIN);

      expectRegistryError(() => registry.updateDetails(99, '', BOB), RegistryErrorCode.AssetNotFound);
      expectRegistryError(() => registry.updateDetails(id, '', BOB), RegistryErrorCode.NotOwner);
      expectRegistryError(() => registry.updateDetails(id, '', ADMIN), RegistryErrorCode.InvalidDetails);
      expect(registry.getDetails(id)).toBe('draft');
    });
  });

  describe('reserveIds', () => {
    it('advances the counter without minting', () => {
      const registry = createRegistry();
      registry.addArtwork('one', ADMIN);

      expect(registry.reserveIds(3, ALICE)).toBe(4);
      expect(registry.getLatestId()).toBe(4);
      expect(registry.validateId(3)).toBe(true);
      expect(registry.getOwner(3)).toBeNull();

      expect(registry.addArtwork('five', ADMIN)).toBe(5);
    });

    it('rejects negative or fractional counts', () => {
      const registry = createRegistry();

      expect(() => registry.reserveIds(-1, ADMIN)).toThrow(RangeError);
      expect(() => registry.reserveIds(1.5, ADMIN)).toThrow(RangeError);
      expect(registry.getLatestId()).toBe(0);
    });

    it('refuses to push the counter past the safe integer range', () => {
      const registry = createRegistry();
      registry.addArtwork('one', ADMIN);

      expect(() => registry.reserveIds(Number.MAX_SAFE_INTEGER, 'mallory')).toThrow(RangeError);
      expect(registry.getLatestId()).toBe(1);

      expect(registry.reserveIds(Number.MAX_SAFE_INTEGER - 1, 'mallory')).toBe(Number.MAX_SAFE_INTEGER);
      expect(() => registry.reserveIds(1, 'mallory')).toThrow(RangeError);
      expect(() => registry.addArtwork('two', ADMIN)).toThrow('Identifier space exhausted at 9007199254740991');
      expect(registry.getLatestId()).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('leaves reserved ids unmintable by transfer or update', () => {
      const registry = createRegistry();
      registry.reserveIds(2, ADMIN);

      expectRegistryError(() => registry.transfer(1, ADMIN, BOB, BOB), RegistryErrorCode.AssetNotFound);
      expectRegistryError(() => registry.updateDetails(2, 'x', ADMIN), RegistryErrorCode.AssetNotFound);
    });
  });

  describe('reads', () => {
    it('are total and repeatable', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('stable', ADMIN);

      for (let i = 0; i < 3; i++) {
        expect(registry.getDetails(id)).toBe('stable');
        expect(registry.getOwner(id)).toBe(ADMIN);
        expect(registry.isTransferred(id)).toBe(false);
      }

      expect(registry.getDetails(42)).toBeNull();
      expect(registry.getOwner(42)).toBeNull();
      expect(registry.isTransferred(42)).toBe(false);
      expect(registry.getLatestId()).toBe(1);
    });

    it('validates ids against the counter', () => {
      const registry = createRegistry();
      registry.batchMint(['a', 'b'], ADMIN);

      expect(registry.validateId(0)).toBe(false);
      expect(registry.validateId(1)).toBe(true);
      expect(registry.validateId(2)).toBe(true);
      expect(registry.validateId(3)).toBe(false);
      expect(registry.getTotalCount()).toBe(2);
    });

    it('answers identity questions', () => {
      const registry = createRegistry();
      const id = registry.addArtwork('piece', ADMIN);

      expect(registry.isAdmin(ADMIN)).toBe(true);
      expect(registry.isAdmin(ALICE)).toBe(false);
      expect(registry.isOwner(id, ADMIN)).toBe(true);
      expect(registry.isOwner(id, ALICE)).toBe(false);
      expect(registry.isOwner(99, ADMIN)).toBe(false);
    });

    it('reports pagination metadata', () => {
      const registry = createRegistry();
      registry.batchMint(Array.from({ length: 10 }, (_, i) => `art ${i + 1}`), ADMIN);

      expect(registry.paginateInfo(1, 5)).toEqual({ total: 10, start: 1, count: 5, hasMore: true });
      expect(registry.paginateInfo(6, 5)).toEqual({ total: 10, start: 6, count: 5, hasMore: false });
    });

    it('lists transferred ids within the range', () => {
      const registry = createRegistry();
      registry.batchMint(['a', 'b', 'c', 'd'], ADMIN);
      registry.transfer(2, ADMIN, BOB, BOB);
      registry.transfer(4, ADMIN, CAROL, CAROL);

      expect(registry.listTransferred(1, 4)).toEqual([2, 4]);
      expect(registry.listTransferred(3, 10)).toEqual([4]);
    });
  });

  describe('snapshots', () => {
    class MemoryStore implements SnapshotStore {
      saved: RegistrySnapshot | null = null;
      saves = 0;
      failNext = false;

      load(): RegistrySnapshot | null {
        return this.saved;
      }

      save(snapshot: RegistrySnapshot): void {
        if (this.failNext) {
          this.failNext = false;
          throw new Error('disk full');
        }
        this.saves++;
        this.saved = snapshot;
      }
    }

    it('persists once per mutating operation', () => {
      const store = new MemoryStore();
      const registry = createRegistry(store);

      registry.addArtwork('a', ADMIN);
      registry.batchMint(['b', '', 'c'], ADMIN);
      registry.transfer(1, ADMIN, BOB, BOB);

      expect(store.saves).toBe(3);
      expect(store.saved).toEqual({
        admin: ADMIN,
        latestId: 3,
        details: { '1': 'a', '2': 'b', '3': 'c' },
        owners: { '1': BOB, '2': ADMIN, '3': ADMIN },
        transferred: [1],
      });
    });

    it('does not persist failed operations', () => {
      const store = new MemoryStore();
      const registry = createRegistry(store);

      expectRegistryError(() => registry.addArtwork('', ADMIN), RegistryErrorCode.InvalidDetails);
      expect(store.saves).toBe(0);
    });

    it('restores state written by a previous instance', () => {
      const store = new MemoryStore();
      const first = createRegistry(store);
      first.batchMint(['a', 'b'], ADMIN);
      first.transfer(2, ADMIN, ALICE, ALICE);

      const second = createRegistry(store);
      expect(second.getLatestId()).toBe(2);
      expect(second.getOwner(2)).toBe(ALICE);
      expect(second.isTransferred(2)).toBe(true);
      expectRegistryError(() => second.transfer(2, ALICE, BOB, BOB), RegistryErrorCode.AssetNotFound);
      expect(second.addArtwork('c', ADMIN)).toBe(3);
    });

    it('rolls memory back when the snapshot cannot be written', () => {
      const store = new MemoryStore();
      const registry = createRegistry(store);
      registry.addArtwork('a', ADMIN);

      store.failNext = true;
      expect(() => registry.transfer(1, ADMIN, BOB, BOB)).toThrow('disk full');

      expect(registry.getOwner(1)).toBe(ADMIN);
      expect(registry.isTransferred(1)).toBe(false);

      store.failNext = true;
      expect(() => registry.batchMint(['b', 'c'], ADMIN)).toThrow('disk full');
      expect(registry.getLatestId()).toBe(1);
      expect(registry.getDetails(2)).toBeNull();
    });

    it('restarts on a snapshot taken at the top of the id space', () => {
      const store = new MemoryStore();
      const first = createRegistry(store);
      first.reserveIds(Number.MAX_SAFE_INTEGER - 1, 'mallory');
      expect(first.addArtwork('last', ADMIN)).toBe(Number.MAX_SAFE_INTEGER);
      expect(() => first.addArtwork('overflow', ADMIN)).toThrow(RangeError);

      const second = createRegistry(store);
      expect(second.getLatestId()).toBe(Number.MAX_SAFE_INTEGER);
      expect(second.getDetails(Number.MAX_SAFE_INTEGER)).toBe('last');
    });

    it('refuses a snapshot that belongs to another administrator', () => {
      const store = new MemoryStore();
      store.saved = { admin: 'someone-else', latestId: 0, details: {}, owners: {}, transferred: [] };

      expect(() => createRegistry(store)).toThrow(/someone-else/);
    });

    it('refuses a snapshot with ids outside the counter', () => {
      const store = new MemoryStore();
      store.saved = { admin: ADMIN, latestId: 1, details: { '2': 'x' }, owners: { '2': ADMIN }, transferred: [] };

      expect(() => createRegistry(store)).toThrow(/outside \[1, 1\]/);
    });
  });
});
