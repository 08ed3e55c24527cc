/**
 * Registry error taxonomy.
 * Numeric codes are part of the external interface and must stay stable.
 */
export enum RegistryErrorCode {
  NotAdmin = 1,
  NotOwner = 2,
  AssetExists = 3,
  AssetNotFound = 4,
  InvalidDetails = 5,
  MaxBatchSize = 6,
}

export type RegistryErrorName = keyof typeof RegistryErrorCode;

const CODE_NAMES: Record<RegistryErrorCode, RegistryErrorName> = {
  [RegistryErrorCode.NotAdmin]: 'NotAdmin',
  [RegistryErrorCode.NotOwner]: 'NotOwner',
  [RegistryErrorCode.AssetExists]: 'AssetExists',
  [RegistryErrorCode.AssetNotFound]: 'AssetNotFound',
  [RegistryErrorCode.InvalidDetails]: 'InvalidDetails',
  [RegistryErrorCode.MaxBatchSize]: 'MaxBatchSize',
};

const DEFAULT_MESSAGES: Record<RegistryErrorCode, string> = {
  [RegistryErrorCode.NotAdmin]: 'Caller is not the administrator',
  [RegistryErrorCode.NotOwner]: 'Caller is not the owner',
  [RegistryErrorCode.AssetExists]: 'Asset already exists',
  [RegistryErrorCode.AssetNotFound]: 'Asset not found',
  [RegistryErrorCode.InvalidDetails]: 'Details must be between 1 and 512 characters',
  [RegistryErrorCode.MaxBatchSize]: 'Batch size must be between 1 and 50',
};

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly codeName: RegistryErrorName;

  constructor(code: RegistryErrorCode, message?: string) {
    super(message ?? DEFAULT_MESSAGES[code]);
    this.name = 'RegistryError';
    this.code = code;
    this.codeName = CODE_NAMES[code];
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}
