import { COLLATERALIZATION_RATIO, LIQUIDATION_THRESHOLD, SCALE } from '../config/constants';
import type { VaultStatus } from '../domain/types';
import { mulDiv } from './math';

// All predicates take the WAD unit price of the collateral in liability terms.
// Integer division truncates, so values are rounded down before comparison.

export function collateralValue(collateral: bigint, price: bigint): bigint {
  return mulDiv(collateral, price, SCALE);
}

function requiredValue(debt: bigint, ratio: bigint): bigint {
  return mulDiv(debt, ratio, SCALE);
}

// debt == 0 is vacuously healthy.
export function isHealthy(collateral: bigint, debt: bigint, price: bigint): boolean {
  if (debt === 0n) return true;
  return collateralValue(collateral, price) >= requiredValue(debt, COLLATERALIZATION_RATIO);
}

// Strict comparison: a vault sitting exactly on the threshold cannot be seized.
export function isLiquidatable(collateral: bigint, debt: bigint, price: bigint): boolean {
  if (debt === 0n) return false;
  return collateralValue(collateral, price) < requiredValue(debt, LIQUIDATION_THRESHOLD);
}

export function maxDebt(collateral: bigint, price: bigint): bigint {
  return mulDiv(collateral, price, COLLATERALIZATION_RATIO);
}

// Collateral value over debt, WAD-scaled; null when there is no debt.
export function collateralRatio(collateral: bigint, debt: bigint, price: bigint): bigint | null {
  if (debt === 0n) return null;
  return mulDiv(collateralValue(collateral, price), SCALE, debt);
}

// Healthy and liquidatable are not complements: between 110% and 150% a vault
// is neither, and may only be improved by deposit or repay.
export function classifyVault(collateral: bigint, debt: bigint, price: bigint): VaultStatus {
  if (isLiquidatable(collateral, debt, price)) return 'liquidatable';
  if (isHealthy(collateral, debt, price)) return 'healthy';
  return 'undercollateralized';
}
