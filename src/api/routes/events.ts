import { Hono } from 'hono';
import type { LedgerContext } from '../../services/context';
import { jsonRespond } from '../utils/respond';

// Append-only history of ledger events for this process.
export function eventsRoute(ctx: LedgerContext) {
  const route = new Hono();
  route.get('/', (c) => jsonRespond(c, ctx.journal.all()));
  return route;
}
