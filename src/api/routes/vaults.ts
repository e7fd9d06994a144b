import { Hono, type Context } from 'hono';
import { COLLATERAL, LIABILITY } from '../../config/tokens';
import type { Vault } from '../../domain/types';
import type { LedgerContext } from '../../services/context';
import { collateralRatio, collateralValue, classifyVault, maxDebt } from '../../utils/health';
import { logger } from '../../utils/logger';
import { toUsd } from '../../utils/math';
import { amountBody, createVaultBody, liquidateBody, readBody, toBaseUnits } from '../utils/body';
import { errorRespond, jsonRespond } from '../utils/respond';

// Vault snapshot plus valuations at the given price.
export function describeVault(v: Vault, price: bigint) {
  const ratio = collateralRatio(v.collateral, v.debt, price);
  return {
    ...v,
    valuations: {
      collateralUsd: toUsd(collateralValue(v.collateral, price)),
      debtUsd: toUsd(v.debt),
    },
    collateralRatio: ratio === null ? null : Number((Number(ratio) / 1e18).toFixed(4)),
    maxDebt: maxDebt(v.collateral, price),
    status: classifyVault(v.collateral, v.debt, price),
  };
}

// Routes stay thin; every rule lives in VaultLedger.
export function vaultsRoute(ctx: LedgerContext) {
  const route = new Hono();
  const { ledger, journal } = ctx;

  // The operation has already committed; a failed write stays queued in the
  // journal and must not turn the response into an error.
  const persist = () =>
    journal.flush().catch((err: unknown) => {
      logger.error(`Event journal flush failed: ${err instanceof Error ? err.message : String(err)}`);
    });

  route.get('/', (c) => {
    try {
      const price = ledger.getPrice();
      return jsonRespond(c, ledger.getVaults().map((v) => describeVault(v, price)));
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  route.get('/:owner', (c) => {
    try {
      const vault = ledger.getVault(c.req.param('owner'));
      return jsonRespond(c, describeVault(vault, ledger.getPrice()));
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  route.post('/', async (c) => {
    try {
      const { owner } = await readBody(c, createVaultBody);
      const vault = ledger.createVault(owner);
      await persist();
      return jsonRespond(c, vault, 201);
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  // Shared body for the four amount-taking operations.
  async function applyAmount(c: Context, owner: string, decimals: number, apply: (owner: string, amount: bigint) => Vault) {
    try {
      const { amount } = await readBody(c, amountBody);
      const vault = apply(owner, toBaseUnits(amount, decimals));
      await persist();
      return jsonRespond(c, vault);
    } catch (err) {
      return errorRespond(c, err);
    }
  }

  route.post('/:owner/deposit', (c) =>
    applyAmount(c, c.req.param('owner'), COLLATERAL.decimals, (o, a) => ledger.depositCollateral(o, a)),
  );
  route.post('/:owner/withdraw', (c) =>
    applyAmount(c, c.req.param('owner'), COLLATERAL.decimals, (o, a) => ledger.withdrawCollateral(o, a)),
  );
  route.post('/:owner/mint', (c) =>
    applyAmount(c, c.req.param('owner'), LIABILITY.decimals, (o, a) => ledger.mintDebt(o, a)),
  );
  route.post('/:owner/repay', (c) =>
    applyAmount(c, c.req.param('owner'), LIABILITY.decimals, (o, a) => ledger.repayDebt(o, a)),
  );

  route.post('/:owner/liquidate', async (c) => {
    try {
      const { liquidator } = await readBody(c, liquidateBody);
      const result = ledger.liquidate(c.req.param('owner'), liquidator);
      await persist();
      return jsonRespond(c, result);
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  return route;
}
