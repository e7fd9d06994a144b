import { InsufficientBalanceError, TransferRejectedError } from '../domain/errors';
import type { Address } from '../domain/types';

// Rail for the native collateral asset. `transfer` either moves the full
// amount or throws and leaves balances untouched.
export interface NativeAsset {
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
}

// Runs after the recipient is credited. Throwing rejects the transfer.
export type ReceiveHook = (from: Address, amount: bigint) => void;

export class NativeAssetBank implements NativeAsset {
  private readonly balances = new Map<Address, bigint>();
  private readonly hooks = new Map<Address, ReceiveHook>();

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  // Faucet for seeding accounts; outside the ledger's accounting.
  fund(account: Address, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  onReceive(account: Address, hook: ReceiveHook | undefined): void {
    if (hook) this.hooks.set(account, hook);
    else this.hooks.delete(account);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) throw new InsufficientBalanceError(from, amount, fromBalance);
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.hooks.get(to);
    if (!hook) return;
    try {
      hook(from, amount);
    } catch (err) {
      this.balances.set(to, this.balanceOf(to) - amount);
      this.balances.set(from, this.balanceOf(from) + amount);
      throw new TransferRejectedError(to, { cause: err });
    }
  }
}
