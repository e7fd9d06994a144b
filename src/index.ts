import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './api/server';
import { loadEnv } from './config/env';
import { createLedgerContext } from './services/context';
import { logger } from './utils/logger';

const env = loadEnv();
const ctx = createLedgerContext({
  address: env.LEDGER_ADDRESS,
  initialPrice: env.INITIAL_PRICE,
  priceDecimals: env.PRICE_DECIMALS,
  eventsPath: env.EVENTS_PATH,
});
const app = createApp(ctx);

serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info(`VaultUSD engine (Node+Hono) listening on port ${info.port}`);
});
