import { formatUnits } from 'viem';

export const WAD: bigint = 10n ** 18n;

export function pow10(n: number): bigint { return 10n ** BigInt(n); }

// Truncates toward zero; every caller passes non-negative operands.
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return (a * b) / denominator;
}

export function toUsd(usdWad: bigint): number {
  // return as number with 2 decimals for display
  const s = formatUnits(usdWad, 18);
  const n = Number(s);
  return Math.round(n * 100) / 100;
}

export function displayAmount(amountBase: bigint, symbol: string, decimals: number): string {
  const dp = symbol === 'VUSD' ? 2 : 4;
  const s = Number(formatUnits(amountBase, decimals)).toFixed(dp);
  return `${s} ${symbol}`;
}

// Ratio as a percentage for logs, e.g. 1.5e18 -> "150.00%".
export function formatRatio(ratioWad: bigint | null): string {
  if (ratioWad === null) return '∞';
  return `${(Number(formatUnits(ratioWad, 18)) * 100).toFixed(2)}%`;
}
