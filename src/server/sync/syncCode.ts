// src/server/sync/syncCode.ts

import { customAlphabet } from 'nanoid';

// Crockford base32: no I, L, O, U.
const CODE_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const CODE_SUFFIX_LEN = 6;

const randomSuffix = customAlphabet(CODE_ALPHABET, CODE_SUFFIX_LEN);

/**
 * Human-facing record code, e.g. `SUP-M5Q2X8KZ-7H3QWD`.
 *
 * Time part + random suffix, so concurrent creators on different devices do not
 * need to coordinate. Never derive codes from "count existing + 1".
 */
export function generateRecordCode(prefix: string, now: number = Date.now()): string {
  return `${prefix}-${now.toString(36).toUpperCase()}-${randomSuffix()}`;
}
