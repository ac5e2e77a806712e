// app/api/sync/events/route.ts

import type { NextRequest } from 'next/server';

import { jsonErrorFromThrowable, noStoreHeaders } from '~/server/http/routeResponses';
import { requireSyncAuthOrThrow } from '~/server/sync/syncAuth';
import { subscribeSyncRealtime } from '~/server/sync/syncNotifier';
import type { SyncRealtimeEvent } from '~/server/sync/syncNotifier';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// Keepalive through proxies.
const PING_MS = 25_000;

// Periodic reconnect re-runs the auth check.
const TTL_MS = 60_000;

// EventSource reconnect hint.
const RETRY_MS = 3_000;

function formatSseEvent(eventName: string, data: unknown): string {
  return `event: ${eventName}\n` + `data: ${JSON.stringify(data)}\n\n`;
}

function toEventPayload(event: SyncRealtimeEvent) {
  return {
    entity_type: event.entityType,
    server_id: event.serverId,
    version: event.version,
    updated_at: event.updatedAt,
  };
}

/**
 * GET /api/sync/events
 *
 * Server-Sent Events channel telling devices to pull /api/sync/changes.
 * Events carry record metadata only, never field data.
 */
export async function GET(req: NextRequest) {
  try {
    await requireSyncAuthOrThrow(req);

    const encoder = new TextEncoder();

    let closed = false;
    let unsubscribe: null | (() => void) = null;
    let pingHandle: ReturnType<typeof setInterval> | null = null;
    let ttlHandle: ReturnType<typeof setTimeout> | null = null;
    let abortHandler: (() => void) | null = null;

    const cleanup = () => {
      closed = true;

      if (unsubscribe) unsubscribe();
      unsubscribe = null;

      if (pingHandle) clearInterval(pingHandle);
      pingHandle = null;

      if (ttlHandle) clearTimeout(ttlHandle);
      ttlHandle = null;

      if (abortHandler) {
        req.signal.removeEventListener('abort', abortHandler);
        abortHandler = null;
      }
    };

    const close = (controller: ReadableStreamDefaultController<Uint8Array>) => {
      if (closed) return;
      cleanup();
      try {
        controller.close();
      } catch (err) {
        // already closed by the consumer
        console.warn('[sync:events] close after cancel', err);
      }
    };

    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        const sendRaw = (text: string) => {
          if (closed) return;
          controller.enqueue(encoder.encode(text));
        };

        const sendEvent = (eventName: string, payload: unknown) => {
          sendRaw(formatSseEvent(eventName, payload));
        };

        sendRaw(`retry: ${RETRY_MS}\n\n`);
        sendEvent('ready', { t: Date.now() });

        unsubscribe = subscribeSyncRealtime(event => {
          sendEvent(event.type, toEventPayload(event));
        });

        pingHandle = setInterval(() => {
          sendEvent('ping', { t: Date.now() });
        }, PING_MS);

        ttlHandle = setTimeout(() => {
          sendEvent('close', { reason: 'ttl', t: Date.now() });
          close(controller);
        }, TTL_MS);

        abortHandler = () => close(controller);
        req.signal.addEventListener('abort', abortHandler);
      },

      cancel() {
        cleanup();
      },
    });

    const headers = noStoreHeaders({
      'Content-Type': 'text/event-stream; charset=utf-8',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    headers['Cache-Control'] = 'no-store, no-transform';

    return new Response(stream, { status: 200, headers });
  } catch (err: unknown) {
    return jsonErrorFromThrowable(err, { logLabel: 'sync:events', fallbackCode: 'server_error' });
  }
}
