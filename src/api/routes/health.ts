import { Hono } from 'hono';
import { formatUnits } from 'viem';
import type { VaultStatus } from '../../domain/types';
import type { LedgerContext } from '../../services/context';
import { classifyVault } from '../../utils/health';
import { errorRespond, jsonRespond } from '../utils/respond';

// System-wide collateralization and a per-status breakdown of vaults.
export function healthRoute(ctx: LedgerContext) {
  const route = new Hono();

  route.get('/', (c) => {
    try {
      const { ledger } = ctx;
      const system = ledger.getSystemState();
      const details = ledger.getVaults().map((v) => ({
        owner: v.owner,
        collateral: formatUnits(v.collateral, 18),
        debt: formatUnits(v.debt, 18),
        status: classifyVault(v.collateral, v.debt, system.price),
      }));

      const count = (status: VaultStatus) => details.filter((d) => d.status === status).length;
      const summary = {
        total: details.length,
        healthy: count('healthy'),
        undercollateralized: count('undercollateralized'),
        liquidatable: count('liquidatable'),
      };

      return jsonRespond(c, {
        price: formatUnits(system.price, 18),
        system: {
          ...system,
          collateralizationRatio:
            system.collateralizationRatio === null ? null : Number(formatUnits(system.collateralizationRatio, 18)),
        },
        summary,
        vaults: details,
      });
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  return route;
}
