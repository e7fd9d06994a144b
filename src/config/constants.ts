// Ratio parameters, fixed for the lifetime of a deployment. All WAD-scaled.
export const SCALE = 10n ** 18n;
export const COLLATERALIZATION_RATIO = 1_500_000_000_000_000_000n; // 150%
export const LIQUIDATION_THRESHOLD = 1_100_000_000_000_000_000n; // 110%
export const PRICE_DECIMALS_TARGET = 18;

export const DEFAULT_LEDGER_ADDRESS = '0x000000000000000000000000000000000000beef';
