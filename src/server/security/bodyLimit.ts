// src/server/security/bodyLimit.ts

import { makeHttpError } from '~/server/http/error';

type BodyRequest = Pick<Request, 'headers' | 'body'>;

async function readStreamWithLimit(body: ReadableStream<Uint8Array>, maxBytes: number): Promise<Uint8Array> {
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!value) continue;

    received += value.byteLength;
    if (received > maxBytes) {
      // Stop pulling from the client; the rest of the body is discarded.
      await reader.cancel();
      throw makeHttpError(413, 'payload_too_large');
    }
    chunks.push(value);
  }

  const merged = new Uint8Array(received);
  let offset = 0;
  for (const c of chunks) {
    merged.set(c, offset);
    offset += c.byteLength;
  }
  return merged;
}

export async function readTextWithLimit(req: BodyRequest, maxBytes: number): Promise<string> {
  // If Content-Length is present and already too large, fail early.
  const cl = req.headers.get('content-length');
  if (cl) {
    const n = Number(cl);
    if (Number.isFinite(n) && n > maxBytes)
      throw makeHttpError(413, 'payload_too_large');
  }

  if (!req.body) return '';

  const bytes = await readStreamWithLimit(req.body, maxBytes);
  if (!bytes.byteLength) return '';
  return new TextDecoder().decode(bytes);
}

/**
 * Sync write bodies are mandatory JSON; shape validation happens in syncValidation.
 */
export async function readJsonWithLimit(req: BodyRequest, maxBytes: number): Promise<unknown> {
  const text = await readTextWithLimit(req, maxBytes);
  if (!text.trim())
    throw makeHttpError(400, 'missing_json_body');

  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw makeHttpError(400, 'invalid_json');
  }
}
