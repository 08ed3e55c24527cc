/**
 * Registry Module
 */

export * from './registry-types';
export * from './registry-errors';
export * from './identity-gate';
export * from './asset-store';
export * from './transfer-tracker';
export * from './batch-processor';
export * from './query-engine';
export * from './validation';
export * from './artwork-registry';
