/**
 * Request parsing helpers — listing params, ids and caller identity
 *
 * start defaults to 1, count to MAX_BATCH_SIZE.
 */

import { Request } from 'express';
import { MAX_BATCH_SIZE } from '../registry';

export const CALLER_HEADER = 'x-caller-id';

export interface ListingParams {
  start: number;
  count: number;
}

export type ApiErrorName = 'BadRequest' | 'Unauthenticated';

/**
 * Malformed request, rejected before it reaches the registry.
 */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly codeName: ApiErrorName,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function badRequest(message: string): ApiError {
  return new ApiError(400, 'BadRequest', message);
}

function bodyField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null || !(field in body)) return undefined;
  return Reflect.get(body, field);
}

/**
 * Parse a base-10 integer, rejecting anything with trailing junk ("12abc", "1.5").
 */
export function parseInteger(raw: unknown, field: string): number {
  const text = typeof raw === 'number' ? String(raw) : typeof raw === 'string' ? raw.trim() : '';
  if (!/^-?\d+$/.test(text)) {
    throw badRequest(`${field} must be an integer`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw badRequest(`${field} is out of range`);
  }
  return value;
}

function firstQueryValue(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

export function parseListing(query: Request['query']): ListingParams {
  const rawStart = firstQueryValue(query.start);
  const rawCount = firstQueryValue(query.count);
  return {
    start: rawStart === undefined ? 1 : parseInteger(rawStart, 'start'),
    count: rawCount === undefined ? MAX_BATCH_SIZE : parseInteger(rawCount, 'count'),
  };
}

export function parseAssetId(req: Request): number {
  return parseInteger(req.params.id, 'id');
}

export function requireCaller(req: Request): string {
  const caller = String(req.header(CALLER_HEADER) || '').trim();
  if (!caller) {
    throw new ApiError(401, 'Unauthenticated', `Missing ${CALLER_HEADER} header`);
  }
  return caller;
}

export function requireString(body: unknown, field: string): string {
  const value = bodyField(body, field);
  if (typeof value !== 'string') {
    throw badRequest(`${field} must be a string`);
  }
  return value;
}

export function requireStringArray(body: unknown, field: string): string[] {
  const value = bodyField(body, field);
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw badRequest(`${field} must be an array of strings`);
  }
  return value;
}

export function requireInteger(body: unknown, field: string): number {
  const value = bodyField(body, field);
  if (typeof value !== 'number') {
    throw badRequest(`${field} must be an integer`);
  }
  return parseInteger(value, field);
}
