import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import type { LedgerContext } from '../../services/context';
import { serializeEvent } from '../../persistence/eventStore';
import { logger } from '../../utils/logger';

// Server-sent events: one `snapshot` on connect, then every ledger event.
export function wsRoute(ctx: LedgerContext) {
  const route = new Hono();

  route.get('/', (c) => {
    return streamSSE(c, async (stream) => {
      const { ledger } = ctx;
      const vaults = ledger.getVaults().map((v) => ({ owner: v.owner, collateral: v.collateral.toString(), debt: v.debt.toString() }));
      await stream.writeSSE({ event: 'snapshot', data: JSON.stringify({ vaults }) });

      const unsub = ledger.events.subscribe((evt) => {
        stream.writeSSE({ event: evt.type, id: String(evt.seq), data: JSON.stringify(serializeEvent(evt)) }).catch((err: unknown) => {
          logger.warn(`SSE write failed: ${err instanceof Error ? err.message : String(err)}`);
        });
      });

      // Keep the stream open until the client disconnects
      await new Promise<void>((resolve) => {
        stream.onAbort(() => resolve());
        c.req.raw.signal.addEventListener('abort', () => resolve(), { once: true });
      });
      unsub();
    });
  });

  return route;
}
