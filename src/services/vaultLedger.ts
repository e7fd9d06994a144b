import { COLLATERAL, LIABILITY } from '../config/tokens';
import {
  AlreadyExistsError,
  ExceedsDebtError,
  InsufficientCollateralError,
  isLedgerError,
  NoSuchVaultError,
  NotLiquidatableError,
  RatioViolationError,
  ReentrantCallError,
  TransferFailedError,
  ZeroAmountError,
} from '../domain/errors';
import type { Address, SystemState, Vault, VaultStatus } from '../domain/types';
import * as health from '../utils/health';
import { logger } from '../utils/logger';
import { displayAmount, formatRatio, mulDiv, WAD } from '../utils/math';
import { EventBus } from './eventBus';
import type { LiabilityToken } from './liabilityToken';
import type { NativeAsset } from './nativeAsset';
import type { PriceFeed } from './priceFeed';
import { PriceNormalizer } from './priceNormalizer';
import { VaultStore } from './vaultStore';

export interface VaultLedgerOptions {
  // Identity the ledger acts under: custody account for collateral and the
  // only caller the liability token accepts.
  address: Address;
  priceFeed: PriceFeed;
  token: LiabilityToken;
  asset: NativeAsset;
  store?: VaultStore;
  events?: EventBus;
}

export interface LiquidationResult {
  owner: Address;
  liquidator: Address;
  debtRepaid: bigint;
  collateralSeized: bigint;
}

/**
 * Collateralized-debt ledger. Every mutating call is synchronous and atomic:
 * it either commits in full or throws a {@link LedgerError} with state
 * untouched. State is committed before any outbound transfer, and a
 * non-reentrant guard rejects mutating calls made from transfer callbacks.
 */
export class VaultLedger {
  readonly address: Address;
  readonly events: EventBus;
  private readonly store: VaultStore;
  private readonly normalizer: PriceNormalizer;
  private readonly token: LiabilityToken;
  private readonly asset: NativeAsset;
  private active: string | null = null;

  constructor(opts: VaultLedgerOptions) {
    if (opts.token.minter !== opts.address) {
      throw new Error(`Liability token minter ${opts.token.minter} does not match ledger ${opts.address}`);
    }
    this.address = opts.address;
    this.normalizer = new PriceNormalizer(opts.priceFeed);
    this.token = opts.token;
    this.asset = opts.asset;
    this.store = opts.store ?? new VaultStore();
    this.events = opts.events ?? new EventBus();
  }

  createVault(owner: Address): Vault {
    return this.guarded('createVault', () => {
      if (this.store.has(owner)) throw new AlreadyExistsError(owner);
      const vault = this.store.insert(owner);
      this.events.emit({ type: 'VaultCreated', owner });
      logger.info(`Vault created for ${owner}`);
      return vault;
    });
  }

  depositCollateral(owner: Address, amount: bigint): Vault {
    return this.guarded('depositCollateral', () => {
      const vault = this.requireVault(owner);
      requirePositive(amount);

      // Credit only what actually arrived in custody.
      const before = this.asset.balanceOf(this.address);
      this.callOut('collateral deposit', () => this.asset.transfer(owner, this.address, amount));
      const received = this.asset.balanceOf(this.address) - before;
      if (received !== amount) {
        if (received > 0n) {
          try {
            this.callOut('deposit refund', () => this.asset.transfer(this.address, owner, received));
          } catch (err) {
            logger.error(`Refund of ${received} to ${owner} failed; it stays in custody uncredited: ${describeError(err)}`);
            throw new TransferFailedError(`Deposit of ${amount} delivered ${received}; refund failed`, { cause: err });
          }
        }
        throw new TransferFailedError(`Deposit of ${amount} delivered ${received}`);
      }

      this.store.write(owner, { collateral: vault.collateral + amount, debt: vault.debt });
      this.events.emit({ type: 'CollateralDeposited', owner, amount });
      logger.info(`Deposit ${displayAmount(amount, COLLATERAL.symbol, COLLATERAL.decimals)} into ${owner}`);
      return this.snapshot(owner);
    });
  }

  withdrawCollateral(owner: Address, amount: bigint): Vault {
    return this.guarded('withdrawCollateral', () => {
      const vault = this.requireVault(owner);
      requirePositive(amount);
      if (amount > vault.collateral) throw new InsufficientCollateralError(amount, vault.collateral);

      const newCollateral = vault.collateral - amount;
      const price = this.getPrice();
      if (!health.isHealthy(newCollateral, vault.debt, price)) {
        throw new RatioViolationError(newCollateral, vault.debt);
      }

      this.store.write(owner, { collateral: newCollateral, debt: vault.debt });
      try {
        this.callOut('collateral withdrawal', () => this.asset.transfer(this.address, owner, amount));
      } catch (err) {
        this.store.write(owner, vault);
        throw err;
      }

      this.events.emit({ type: 'CollateralWithdrawn', owner, amount });
      logger.info(`Withdraw ${displayAmount(amount, COLLATERAL.symbol, COLLATERAL.decimals)} from ${owner}`);
      return this.snapshot(owner);
    });
  }

  mintDebt(owner: Address, amount: bigint): Vault {
    return this.guarded('mintDebt', () => {
      const vault = this.requireVault(owner);
      requirePositive(amount);

      const newDebt = vault.debt + amount;
      const price = this.getPrice();
      if (!health.isHealthy(vault.collateral, newDebt, price)) {
        throw new RatioViolationError(vault.collateral, newDebt);
      }

      this.store.write(owner, { collateral: vault.collateral, debt: newDebt });
      try {
        this.callOut('liability mint', () => this.token.mint(this.address, owner, amount));
      } catch (err) {
        this.store.write(owner, vault);
        throw err;
      }

      this.events.emit({ type: 'DebtMinted', owner, amount });
      logger.info(`Mint ${displayAmount(amount, LIABILITY.symbol, LIABILITY.decimals)} to ${owner}`);
      return this.snapshot(owner);
    });
  }

  repayDebt(owner: Address, amount: bigint): Vault {
    return this.guarded('repayDebt', () => {
      const vault = this.requireVault(owner);
      requirePositive(amount);
      if (amount > vault.debt) throw new ExceedsDebtError(amount, vault.debt);

      this.store.write(owner, { collateral: vault.collateral, debt: vault.debt - amount });
      try {
        this.callOut('liability burn', () => this.token.burn(this.address, owner, amount));
      } catch (err) {
        this.store.write(owner, vault);
        throw err;
      }

      this.events.emit({ type: 'DebtRepaid', owner, amount });
      logger.info(`Repay ${displayAmount(amount, LIABILITY.symbol, LIABILITY.decimals)} for ${owner}`);
      return this.snapshot(owner);
    });
  }

  /**
   * Seize the whole vault: the liquidator burns the full debt and receives the
   * full collateral. There is no partial path.
   */
  liquidate(target: Address, liquidator: Address): LiquidationResult {
    return this.guarded('liquidate', () => {
      const vault = this.requireVault(target);
      const price = this.getPrice();
      if (!health.isLiquidatable(vault.collateral, vault.debt, price)) {
        throw new NotLiquidatableError(target);
      }
      const { collateral, debt } = vault;

      this.callOut('liquidator burn', () => this.token.burn(this.address, liquidator, debt));
      this.store.write(target, { collateral: 0n, debt: 0n });
      try {
        this.callOut('collateral seizure', () => this.asset.transfer(this.address, liquidator, collateral));
      } catch (err) {
        this.store.write(target, vault);
        try {
          this.callOut('liquidator refund', () => this.token.mint(this.address, liquidator, debt));
        } catch (refundErr) {
          logger.error(`Could not re-mint ${debt} to ${liquidator} after a failed seizure of ${target}: ${describeError(refundErr)}`);
          throw new TransferFailedError(`Liquidation of ${target} failed and the burned debt was not restored`, {
            cause: err,
          });
        }
        throw err;
      }

      this.events.emit({
        type: 'VaultLiquidated',
        owner: target,
        liquidator,
        debtRepaid: debt,
        collateralSeized: collateral,
      });
      logger.info(
        `Liquidated ${target} by ${liquidator}: burned ${displayAmount(debt, LIABILITY.symbol, LIABILITY.decimals)}, seized ${displayAmount(collateral, COLLATERAL.symbol, COLLATERAL.decimals)}`,
      );
      return { owner: target, liquidator, debtRepaid: debt, collateralSeized: collateral };
    });
  }

  // Current WAD unit price; read fresh from the feed on every call.
  getPrice(): bigint {
    return this.normalizer.getPrice();
  }

  isHealthy(collateral: bigint, debt: bigint): boolean {
    if (debt === 0n) return true;
    return health.isHealthy(collateral, debt, this.getPrice());
  }

  isLiquidatable(collateral: bigint, debt: bigint): boolean {
    if (debt === 0n) return false;
    return health.isLiquidatable(collateral, debt, this.getPrice());
  }

  getMaxDebt(collateral: bigint): bigint {
    return health.maxDebt(collateral, this.getPrice());
  }

  getVault(owner: Address): Vault {
    return this.requireVault(owner);
  }

  getVaults(): Vault[] {
    return this.store.list();
  }

  getOwners(): Address[] {
    return this.store.listOwners();
  }

  getVaultStatus(owner: Address): VaultStatus {
    const vault = this.requireVault(owner);
    if (vault.debt === 0n) return 'healthy';
    return health.classifyVault(vault.collateral, vault.debt, this.getPrice());
  }

  getSystemState(): SystemState {
    const price = this.getPrice();
    let totalCollateral = 0n;
    let totalDebt = 0n;
    let activeVaults = 0;
    const vaults = this.store.list();
    for (const v of vaults) {
      totalCollateral += v.collateral;
      totalDebt += v.debt;
      if (v.collateral > 0n || v.debt > 0n) activeVaults += 1;
    }
    const collateralizationRatio =
      totalDebt === 0n ? null : mulDiv(health.collateralValue(totalCollateral, price), WAD, totalDebt);
    return { price, totalCollateral, totalDebt, collateralizationRatio, vaultCount: vaults.length, activeVaults };
  }

  describeSystem(): string {
    const s = this.getSystemState();
    return `price=${displayAmount(s.price, LIABILITY.symbol, 18)} collateral=${displayAmount(s.totalCollateral, COLLATERAL.symbol, COLLATERAL.decimals)} debt=${displayAmount(s.totalDebt, LIABILITY.symbol, LIABILITY.decimals)} ratio=${formatRatio(s.collateralizationRatio)} active=${s.activeVaults}/${s.vaultCount}`;
  }

  private guarded<T>(operation: string, fn: () => T): T {
    if (this.active !== null) throw new ReentrantCallError(operation);
    this.active = operation;
    try {
      return fn();
    } catch (err) {
      if (isLedgerError(err)) logger.warn(`${operation} rejected: ${err.code} (${err.message})`);
      throw err;
    } finally {
      this.active = null;
    }
  }

  private requireVault(owner: Address): Vault {
    const vault = this.store.get(owner);
    if (!vault || !vault.exists) throw new NoSuchVaultError(owner);
    return vault;
  }

  private snapshot(owner: Address): Vault {
    return this.requireVault(owner);
  }

  // Collaborator failures surface as TransferFailed, original kept as cause.
  private callOut(what: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      throw new TransferFailedError(`${what} failed`, { cause: err });
    }
  }
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) throw new ZeroAmountError();
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
