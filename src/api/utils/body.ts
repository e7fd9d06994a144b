import type { Context } from 'hono';
import { parseUnits } from 'viem';
import { z } from 'zod';
import { COLLATERAL, LIABILITY } from '../../config/tokens';

// Decimal string in asset units, e.g. "10" or "0.25", with no more fractional
// digits than the asset carries.
function decimalString(decimals: number) {
  return z
    .string()
    .regex(
      new RegExp(`^[0-9]+(\\.[0-9]{1,${decimals}})?$`),
      `amount must be a non-negative decimal with at most ${decimals} fractional digits`,
    );
}

export const amountString = decimalString(Math.min(COLLATERAL.decimals, LIABILITY.decimals));

export const amountBody = z.object({ amount: amountString });
export const createVaultBody = z.object({ owner: z.string().min(1) });
export const liquidateBody = z.object({ liquidator: z.string().min(1) });
// Either a human price, or a raw signed feed answer with optional decimals.
export const priceBody = z.union([
  z.object({ price: amountString }),
  z.object({
    answer: z.string().regex(/^-?[0-9]+$/, 'answer must be an integer string'),
    decimals: z.number().int().min(0).max(36).optional(),
  }),
]);
export const simulateBody = z
  .object({
    prices: z.array(amountString).min(1).optional(),
    vaults: z
      .array(z.object({ owner: z.string().min(1), collateral: amountString, debt: amountString }))
      .optional(),
  })
  .default({});

// Malformed JSON is treated as an empty body and left to the schema to reject.
export async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  const raw: unknown = await c.req.json().catch(() => undefined);
  return schema.parse(raw ?? {});
}

export function toBaseUnits(amount: string, decimals: number): bigint {
  return parseUnits(amount, decimals);
}
