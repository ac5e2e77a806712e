// src/server/sync/syncValidation.ts

import { isSyncError, makeHttpError, makeSyncError } from '~/server/http/error';
import { securityConfig } from '~/server/security/securityConfig';
import { isPlainObject, isSyncEntityType, sanitizeClientFields } from './syncEntities';
import type { SyncResolveInput } from './syncResolver';
import type { SyncBatchItem, SyncEntityType, SyncErrorEntry, SyncFields, SyncServerId } from './syncTypes';

const DEFAULT_ENTITY_TYPE: SyncEntityType = 'supplier';

// Date, or date-time with optional fraction and zone.
const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export interface ParsedSyncBatchRequest {
  items: SyncBatchItem[];

  /** Items whose envelope was malformed; reported per item, never sent to the engine. */
  rejected: SyncErrorEntry[];
}

function isServerId(value: unknown): value is SyncServerId {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 1;
}

function parseEntityType(value: unknown, fallback: SyncEntityType, onInvalid: () => Error): SyncEntityType {
  if (value === undefined || value === null) return fallback;
  if (isSyncEntityType(value)) return value;
  throw onInvalid();
}

/**
 * One wire item -> SyncBatchItem. Throws validation_failed.
 *
 * Accepts `{ local_id, id, version, fields }`, and also the flat shape where the
 * domain keys sit next to local_id/id/version (no `fields` key).
 */
export function parseSyncBatchItem(raw: unknown, defaultEntityType: SyncEntityType): SyncBatchItem {
  if (!isPlainObject(raw))
    throw makeSyncError('validation_failed', 'item must be an object');

  const entityType = parseEntityType(raw.entity_type, defaultEntityType,
    () => makeSyncError('validation_failed', `unknown entity_type: ${String(raw.entity_type)}`));

  const localIdRaw = raw.local_id;
  let localId: string | null = null;
  if (localIdRaw !== undefined && localIdRaw !== null) {
    if (typeof localIdRaw !== 'string')
      throw makeSyncError('validation_failed', 'local_id must be a string');
    if (localIdRaw.length > securityConfig.sync.localIdMaxLen)
      throw makeSyncError('validation_failed', 'local_id too long');
    localId = localIdRaw;
  }

  const idRaw = raw.id ?? raw.server_id;
  let serverId: SyncServerId | null = null;
  if (idRaw !== undefined && idRaw !== null) {
    if (!isServerId(idRaw))
      throw makeSyncError('validation_failed', 'id must be a positive integer or null');
    serverId = idRaw;
  }

  // Clients that never saw a server copy have nothing but the initial version.
  const versionRaw = raw.version ?? 1;
  if (typeof versionRaw !== 'number' || !Number.isSafeInteger(versionRaw) || versionRaw < 1)
    throw makeSyncError('validation_failed', 'version must be an integer >= 1');

  const fields = sanitizeClientFields(raw.fields !== undefined ? raw.fields : raw, 'fields');

  return { entityType, localId, serverId, clientVersion: versionRaw, fields };
}

function rejectedEntry(raw: unknown, entityType: SyncEntityType, detail: string): SyncErrorEntry {
  const entry: SyncErrorEntry = { entity_type: entityType, code: 'validation_failed', message: detail };
  if (isPlainObject(raw)) {
    if (typeof raw.local_id === 'string') entry.local_id = raw.local_id;
    if (isServerId(raw.id)) entry.server_id = raw.id;
  }
  return entry;
}

/**
 * POST /api/sync body. A broken envelope fails the request (400); a broken item
 * only fails that item.
 */
export function parseSyncBatchRequest(body: unknown): ParsedSyncBatchRequest {
  if (!isPlainObject(body))
    throw makeHttpError(400, 'invalid_body');

  const defaultEntityType = parseEntityType(body.entity_type, DEFAULT_ENTITY_TYPE,
    () => makeHttpError(400, 'invalid_entity_type'));

  const rawItems = body.items;
  if (!Array.isArray(rawItems))
    throw makeHttpError(400, 'missing_items');
  if (rawItems.length > securityConfig.sync.maxBatchItems)
    throw makeHttpError(400, 'too_many_items');

  const parsed: ParsedSyncBatchRequest = { items: [], rejected: [] };
  for (const raw of rawItems) {
    try {
      parsed.items.push(parseSyncBatchItem(raw, defaultEntityType));
    } catch (err) {
      if (!isSyncError(err)) throw err;
      parsed.rejected.push(rejectedEntry(raw, defaultEntityType, err.detail));
    }
  }
  return parsed;
}

/**
 * POST /api/sync/resolve-conflict body.
 * The strategy name is passed through; the resolver rejects unknown ones.
 */
export function parseResolveRequest(body: unknown): SyncResolveInput {
  if (!isPlainObject(body))
    throw makeHttpError(400, 'invalid_body');

  const entityType = parseEntityType(body.entity_type, DEFAULT_ENTITY_TYPE,
    () => makeHttpError(400, 'invalid_entity_type'));

  if (!isServerId(body.server_id))
    throw makeHttpError(400, 'invalid_server_id');

  if (typeof body.strategy !== 'string')
    throw makeHttpError(400, 'missing_strategy');

  let clientData: SyncFields;
  try {
    clientData = sanitizeClientFields(body.client_data, 'client_data');
  } catch (err) {
    if (!isSyncError(err)) throw err;
    throw makeHttpError(400, 'invalid_client_data');
  }

  return { entityType, serverId: body.server_id, clientData, strategy: body.strategy };
}

/**
 * Query parsing for GET /api/sync/changes.
 * A literal '+' in an unencoded offset arrives as a space; put it back.
 */
export function parseChangesQuery(params: URLSearchParams): { since: string | null; entityType: SyncEntityType | null } {
  const entityType = parseEntityType(params.get('entity_type'), DEFAULT_ENTITY_TYPE,
    () => makeHttpError(400, 'invalid_entity_type'));
  const filtered = params.has('entity_type') ? entityType : null;

  const raw = params.get('since') ?? params.get('last_synced_at');
  if (raw === null || raw.trim() === '')
    return { since: null, entityType: filtered };

  const since = raw.trim().replace(/ (\d{2}:?\d{2})$/, '+$1');
  if (!ISO_TIMESTAMP_RE.test(since) || Number.isNaN(Date.parse(since)))
    throw makeHttpError(400, 'invalid_since');

  return { since, entityType: filtered };
}
