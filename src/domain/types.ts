export type Address = string;

export interface TokenMeta {
  symbol: string;
  name: string;
  decimals: number;
}

// Raw reading as published by a feed, before normalization.
export interface PriceReading {
  answer: bigint; // signed
  decimals: number;
}

export interface Vault {
  owner: Address;
  exists: boolean;
  collateral: bigint; // native asset base units
  debt: bigint; // liability base units
}

export type VaultStatus = 'healthy' | 'undercollateralized' | 'liquidatable';

export interface SystemState {
  price: bigint; // WAD
  totalCollateral: bigint;
  totalDebt: bigint;
  collateralizationRatio: bigint | null; // WAD; null when nothing is owed
  vaultCount: number;
  activeVaults: number;
}

type EventBase = {
  seq: number;
  timestamp: string; // ISO
};

export type LedgerEvent =
  | (EventBase & { type: 'VaultCreated'; owner: Address })
  | (EventBase & { type: 'CollateralDeposited'; owner: Address; amount: bigint })
  | (EventBase & { type: 'CollateralWithdrawn'; owner: Address; amount: bigint })
  | (EventBase & { type: 'DebtMinted'; owner: Address; amount: bigint })
  | (EventBase & { type: 'DebtRepaid'; owner: Address; amount: bigint })
  | (EventBase & {
      type: 'VaultLiquidated';
      owner: Address;
      liquidator: Address;
      debtRepaid: bigint;
      collateralSeized: bigint;
    });

// Distributes over the union so each variant keeps its own fields.
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type LedgerEventInput = DistributiveOmit<LedgerEvent, 'seq' | 'timestamp'>;
