// src/server/sync/syncEntities.ts

import { makeSyncError } from '~/server/http/error';
import type { SyncEntityType, SyncFields, SyncFieldValue } from './syncTypes';
import { SYNC_ENTITY_TYPES } from './syncTypes';

/**
 * Keys that belong to the sync envelope, not to the domain payload.
 * They are dropped from anything a client sends as `fields` / `client_data`.
 */
const RESERVED_FIELD_KEYS = new Set([
  'id',
  'server_id',
  'local_id',
  'version',
  'entity_type',
  'created_at',
  'updated_at',
  'last_synced_at',
]);

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

type FieldRule =
  | { type: 'string'; required?: boolean; maxLen: number; allowEmpty?: boolean }
  | { type: 'enum'; required?: boolean; values: readonly string[] }
  | { type: 'number'; required?: boolean; min?: number }
  | { type: 'id'; required?: boolean }
  | { type: 'date'; required?: boolean };

export interface SyncEntityDefinition {
  entityType: SyncEntityType;

  /** Human label used in audit descriptions and error details. */
  label: string;

  /** When set, creates without a `code` get a generated one with this prefix. */
  codePrefix?: string;

  /** Filled in on create when the client leaves them out. */
  createDefaults?: SyncFields;

  rules: Record<string, FieldRule>;
}

const STATUS_VALUES = ['active', 'inactive'] as const;

export const SYNC_ENTITIES: Record<SyncEntityType, SyncEntityDefinition> = {
  supplier: {
    entityType: 'supplier',
    label: 'Supplier',
    codePrefix: 'SUP',
    createDefaults: { status: 'active' },
    rules: {
      name: { type: 'string', required: true, maxLen: 255 },
      code: { type: 'string', maxLen: 50 },
      status: { type: 'enum', values: STATUS_VALUES },
    },
  },
  product: {
    entityType: 'product',
    label: 'Product',
    codePrefix: 'PRD',
    createDefaults: { status: 'active' },
    rules: {
      name: { type: 'string', required: true, maxLen: 255 },
      code: { type: 'string', maxLen: 50 },
      base_unit: { type: 'string', required: true, maxLen: 20 },
      status: { type: 'enum', values: STATUS_VALUES },
    },
  },
  collection: {
    entityType: 'collection',
    label: 'Collection',
    rules: {
      supplier_id: { type: 'id', required: true },
      product_id: { type: 'id', required: true },
      quantity: { type: 'number', required: true, min: 0 },
      unit: { type: 'string', required: true, maxLen: 20 },
      collection_date: { type: 'date', required: true },
      rate_per_unit: { type: 'number', min: 0 },
      notes: { type: 'string', maxLen: 1000, allowEmpty: true },
    },
  },
  payment: {
    entityType: 'payment',
    label: 'Payment',
    rules: {
      supplier_id: { type: 'id', required: true },
      amount: { type: 'number', required: true, min: 0 },
      payment_date: { type: 'date', required: true },
      payment_type: { type: 'enum', required: true, values: ['advance', 'partial', 'final', 'adjustment'] },
      payment_method: { type: 'string', maxLen: 50 },
      reference_number: { type: 'string', maxLen: 100 },
      notes: { type: 'string', maxLen: 1000, allowEmpty: true },
    },
  },
};

export function isSyncEntityType(value: unknown): value is SyncEntityType {
  return typeof value === 'string' && (SYNC_ENTITY_TYPES as readonly string[]).includes(value);
}

export function getSyncEntity(entityType: SyncEntityType): SyncEntityDefinition {
  return SYNC_ENTITIES[entityType];
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFieldValue(value: unknown): value is SyncFieldValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isFieldValue);
      return Object.values(value).every(isFieldValue);
    default:
      return false;
  }
}

/**
 * Client payload -> domain fields.
 * Drops envelope keys and `undefined` values; rejects values JSON cannot carry faithfully.
 */
export function sanitizeClientFields(raw: unknown, what: string): SyncFields {
  if (!isPlainObject(raw))
    throw makeSyncError('validation_failed', `${what} must be an object`);

  const fields: SyncFields = {};
  for (const [key, value] of Object.entries(raw)) {
    if (RESERVED_FIELD_KEYS.has(key) || value === undefined) continue;
    if (!isFieldValue(value))
      throw makeSyncError('validation_failed', `${what}.${key} has an unsupported value`);
    fields[key] = value;
  }
  return fields;
}

/**
 * Non-null client values win; null or absent keep what the server has.
 * Used both for plain sync updates and for the `merge` resolution strategy.
 */
export function mergeNonNullFields(serverFields: SyncFields, clientFields: SyncFields): SyncFields {
  const merged: SyncFields = { ...serverFields };
  for (const [key, value] of Object.entries(clientFields)) {
    if (value !== null) merged[key] = value;
  }
  return merged;
}

/** Every key the client sent replaces the server value, nulls included. */
export function overwriteFields(serverFields: SyncFields, clientFields: SyncFields): SyncFields {
  return { ...serverFields, ...clientFields };
}

function checkRule(key: string, rule: FieldRule, value: SyncFieldValue | undefined): string | null {
  if (value === undefined || value === null || value === '') {
    if (value === '' && rule.type === 'string' && rule.allowEmpty) return null;
    return rule.required ? `${key} is required` : null;
  }

  switch (rule.type) {
    case 'string':
      if (typeof value !== 'string') return `${key} must be a string`;
      if (value.length > rule.maxLen) return `${key} must be at most ${rule.maxLen} characters`;
      return null;

    case 'enum':
      if (typeof value !== 'string' || !rule.values.includes(value))
        return `${key} must be one of: ${rule.values.join(', ')}`;
      return null;

    case 'number':
      if (typeof value !== 'number') return `${key} must be a number`;
      if (rule.min !== undefined && value < rule.min) return `${key} must be at least ${rule.min}`;
      return null;

    case 'id':
      if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1)
        return `${key} must be a positive integer`;
      return null;

    case 'date':
      if (typeof value !== 'string' || !ISO_DATE_RE.test(value) || Number.isNaN(Date.parse(value)))
        return `${key} must be an ISO-8601 date`;
      return null;
  }
}

/**
 * Validate the full field set a write would persist.
 * Unknown keys pass through untouched.
 */
export function validateEntityFields(entityType: SyncEntityType, fields: SyncFields): void {
  const def = getSyncEntity(entityType);

  const problems: string[] = [];
  for (const [key, rule] of Object.entries(def.rules)) {
    const problem = checkRule(key, rule, fields[key]);
    if (problem) problems.push(problem);
  }

  if (problems.length)
    throw makeSyncError('validation_failed', `${def.label}: ${problems.join('; ')}`);
}
