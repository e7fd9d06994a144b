import { Hono } from 'hono';
import { formatUnits, parseUnits } from 'viem';
import type { LedgerContext } from '../../services/context';
import { logger } from '../../utils/logger';
import { priceBody, readBody } from '../utils/body';
import { errorRespond, jsonRespond } from '../utils/respond';

// Reads and moves the in-process feed. The normalized price is reported as
// null while the feed holds an invalid reading.
export function priceRoute(ctx: LedgerContext) {
  const route = new Hono();
  const { feed, ledger } = ctx;

  const snapshot = () => {
    const raw = feed.latestAnswer();
    let price: string | null = null;
    try {
      price = formatUnits(ledger.getPrice(), 18);
    } catch (err) {
      logger.warn(`Price unavailable: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { answer: raw.answer, decimals: raw.decimals, price };
  };

  route.get('/', (c) => jsonRespond(c, snapshot()));

  route.post('/', async (c) => {
    try {
      const body = await readBody(c, priceBody);
      if ('price' in body) {
        const { decimals } = feed.latestAnswer();
        feed.setAnswer(parseUnits(body.price, decimals));
      } else {
        feed.setAnswer(BigInt(body.answer), body.decimals);
      }
      const next = snapshot();
      logger.info(`Feed set to answer=${next.answer} decimals=${next.decimals}`);
      return jsonRespond(c, next);
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  return route;
}
