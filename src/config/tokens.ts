import type { TokenMeta } from '../domain/types';

// Asset registry used for parsing request amounts and for display.
export const COLLATERAL: TokenMeta = {
  symbol: 'ETH',
  name: 'Ether',
  decimals: 18,
};

export const LIABILITY: TokenMeta = {
  symbol: 'VUSD',
  name: 'Vault USD',
  decimals: 18,
};
