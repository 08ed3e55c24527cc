/**
 * Atomic Storage Module
 *
 * Crash-safe JSON files: write-to-temp + fsync + atomic-rename, with a
 * checksum over the payload and one backup generation to recover from.
 * After a crash at any point, either the old file or the new one is intact.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';

const COMPONENT = 'AtomicStorage';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;        // Schema version for future migrations
  checksum: string;       // SHA-256 of the data
  data: T;
  writtenAt: number;
}

/**
 * Result of a read operation
 */
export type ReadResult<T> =
  | { success: true; data: T; recoveredFromBackup?: boolean }
  | { success: false; error: string };

export type DataGuard<T> = (data: unknown) => data is T;

export function sha256(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AtomicStorage {
  static readonly CURRENT_VERSION = 1;
  static readonly TEMP_SUFFIX = '.tmp';
  static readonly BACKUP_SUFFIX = '.bak';

  constructor(private readonly logger: StructuredLogger = defaultLogger) {}

  /**
   * Atomically write data to a file with checksum
   *
   * 1. Serialize data with checksum
   * 2. Write to temporary file and fsync
   * 3. Move the existing file (if any) to the backup slot
   * 4. Rename temp -> target
   */
  writeFileAtomic<T>(filePath: string, data: T): void {
    const tempPath = filePath + AtomicStorage.TEMP_SUFFIX;
    const backupPath = filePath + AtomicStorage.BACKUP_SUFFIX;

    const wrapper: ChecksummedFile<T> = {
      version: AtomicStorage.CURRENT_VERSION,
      checksum: sha256(JSON.stringify(data)),
      data,
      writtenAt: Date.now(),
    };

    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(wrapper, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      fs.rmSync(backupPath, { force: true });
      fs.renameSync(filePath, backupPath);
    }

    fs.renameSync(tempPath, filePath);
    this.syncDirectory(dir);
  }

  /**
   * Read a file with checksum verification, falling back to the backup
   * (and restoring it) when the main file is missing or corrupted.
   */
  readFileAtomic<T>(filePath: string, isValid: DataGuard<T>): ReadResult<T> {
    const mainResult = this.tryReadFile(filePath, isValid);
    if (mainResult.success) {
      return mainResult;
    }

    const backupPath = filePath + AtomicStorage.BACKUP_SUFFIX;
    const backupResult = this.tryReadFile(backupPath, isValid);
    if (!backupResult.success) {
      return {
        success: false,
        error: `Both main file and backup are unreadable: ${mainResult.error}; backup: ${backupResult.error}`,
      };
    }

    this.logger.warn(COMPONENT, 'Recovered from backup', { filePath, reason: mainResult.error });
    fs.copyFileSync(backupPath, filePath);

    return { success: true, data: backupResult.data, recoveredFromBackup: true };
  }

  /**
   * Read and verify a single file
   */
  tryReadFile<T>(filePath: string, isValid: DataGuard<T>): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch {
      return { success: false, error: 'Invalid JSON' };
    }

    if (!isRecord(parsed) || typeof parsed.checksum !== 'string' || !('data' in parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculated = sha256(JSON.stringify(parsed.data));
    if (calculated !== parsed.checksum) {
      return {
        success: false,
        error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}`,
      };
    }

    if (!isValid(parsed.data)) {
      return { success: false, error: 'Unexpected data shape' };
    }

    return { success: true, data: parsed.data };
  }

  /**
   * Check if a file exists (main or backup)
   */
  exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + AtomicStorage.BACKUP_SUFFIX);
  }

  /**
   * Clean up any orphaned temp files (from interrupted writes)
   */
  cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) {
      return 0;
    }

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(AtomicStorage.TEMP_SUFFIX)) continue;
      fs.unlinkSync(path.join(directory, file));
      cleaned++;
      this.logger.info(COMPONENT, 'Cleaned up orphaned temp file', { file });
    }
    return cleaned;
  }

  private syncDirectory(dir: string): void {
    // Directory fsync is unsupported on some platforms (e.g. Windows)
    let dirFd: number | undefined;
    try {
      dirFd = fs.openSync(dir, 'r');
      fs.fsyncSync(dirFd);
    } catch (err) {
      this.logger.debug(COMPONENT, 'Directory sync skipped', {
        dir,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      if (dirFd !== undefined) fs.closeSync(dirFd);
    }
  }
}
