/**
 * Storage Module Exports
 *
 * Atomic, crash-safe storage for the registry state.
 */

export { AtomicStorage, sha256 } from './atomic-storage';
export type { ChecksummedFile, DataGuard, ReadResult } from './atomic-storage';
export { RegistrySnapshotStore, SNAPSHOT_FILE, isRegistrySnapshot } from './registry-snapshot-store';
