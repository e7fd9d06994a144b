import { Hono } from 'hono';
import { runPriceShock } from '../../services/simulation';
import { logger } from '../../utils/logger';
import { readBody, simulateBody } from '../utils/body';
import { errorRespond, jsonRespond } from '../utils/respond';

// Runs a price-shock simulation on its own ledger; the live ledger is untouched.
export function simulateRoute() {
  const route = new Hono();

  route.post('/', async (c) => {
    logger.section('POST /simulate');
    try {
      const body = await readBody(c, simulateBody);
      const res = runPriceShock({ prices: body.prices, vaults: body.vaults });
      logger.info(`Simulation completed after ${res.steps.length - 1} steps; liquidations=${res.liquidations}`);
      return jsonRespond(c, res);
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  return route;
}
