import { z } from 'zod';
import { DEFAULT_LEDGER_ADDRESS } from './constants';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  EVENTS_PATH: z.string().min(1).default('data/ledger-events.json'),
  INITIAL_PRICE: z
    .string()
    .regex(/^[0-9]+(\.[0-9]+)?$/, 'INITIAL_PRICE must be a positive decimal')
    .default('2000'),
  PRICE_DECIMALS: z.coerce.number().int().min(0).max(36).default(8),
  LEDGER_ADDRESS: z.string().min(1).default(DEFAULT_LEDGER_ADDRESS),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
}
