import { Hono } from 'hono';
import { COLLATERAL } from '../../config/tokens';
import type { LedgerContext } from '../../services/context';
import { amountBody, readBody, toBaseUnits } from '../utils/body';
import { errorRespond, jsonRespond } from '../utils/respond';

// Wallet balances outside the ledger, plus a faucet for the native asset.
export function accountsRoute(ctx: LedgerContext) {
  const route = new Hono();
  const { bank, token } = ctx;

  const balances = (address: string) => ({
    address,
    native: bank.balanceOf(address),
    liability: token.balanceOf(address),
  });

  route.get('/:address', (c) => jsonRespond(c, balances(c.req.param('address'))));

  route.post('/:address/fund', async (c) => {
    try {
      const address = c.req.param('address');
      const { amount } = await readBody(c, amountBody);
      bank.fund(address, toBaseUnits(amount, COLLATERAL.decimals));
      return jsonRespond(c, balances(address));
    } catch (err) {
      return errorRespond(c, err);
    }
  });

  return route;
}
