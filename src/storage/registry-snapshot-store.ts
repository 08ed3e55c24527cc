/**
 * Registry Snapshot Store
 *
 * Persists the registry state (counter, details, owners, transfer flags)
 * as one checksummed file in the data directory.
 */

import * as path from 'path';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import { RegistrySnapshot, SnapshotStore } from '../registry';
import { AtomicStorage } from './atomic-storage';

const COMPONENT = 'SnapshotStore';
export const SNAPSHOT_FILE = 'registry-state.json';

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(v => typeof v === 'string');
}

export function isRegistrySnapshot(value: unknown): value is RegistrySnapshot {
  if (typeof value !== 'object' || value === null) return false;
  if (!('admin' in value) || typeof value.admin !== 'string') return false;
  if (!('latestId' in value) || typeof value.latestId !== 'number') return false;
  if (!('details' in value) || !isStringRecord(value.details)) return false;
  if (!('owners' in value) || !isStringRecord(value.owners)) return false;
  if (!('transferred' in value) || !Array.isArray(value.transferred)) return false;
  return value.transferred.every((id: unknown) => typeof id === 'number');
}

export class RegistrySnapshotStore implements SnapshotStore {
  private readonly filePath: string;
  private readonly storage: AtomicStorage;

  constructor(
    dataDir: string,
    private readonly logger: StructuredLogger = defaultLogger
  ) {
    this.filePath = path.join(dataDir, SNAPSHOT_FILE);
    this.storage = new AtomicStorage(logger);
    this.storage.cleanupTempFiles(dataDir);
  }

  getFilePath(): string {
    return this.filePath;
  }

  load(): RegistrySnapshot | null {
    if (!this.storage.exists(this.filePath)) {
      this.logger.info(COMPONENT, 'No persisted registry state, starting empty', { filePath: this.filePath });
      return null;
    }

    const result = this.storage.readFileAtomic(this.filePath, isRegistrySnapshot);
    if (!result.success) {
      throw new Error(`Failed to load registry state from ${this.filePath}: ${result.error}`);
    }
    return result.data;
  }

  save(snapshot: RegistrySnapshot): void {
    this.storage.writeFileAtomic(this.filePath, snapshot);
  }
}
