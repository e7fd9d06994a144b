import { InsufficientBalanceError, UnauthorizedCallerError } from '../domain/errors';
import type { Address } from '../domain/types';

export interface LiabilityToken {
  readonly minter: Address;
  mint(caller: Address, to: Address, amount: bigint): void;
  burn(caller: Address, from: Address, amount: bigint): void;
  balanceOf(account: Address): bigint;
  totalSupply(): bigint;
}

// Fungible balance book for the pegged liability. Only `minter`, fixed at
// construction, may mint or burn.
export class InMemoryLiabilityToken implements LiabilityToken {
  private readonly balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(readonly minter: Address) {}

  mint(caller: Address, to: Address, amount: bigint): void {
    this.requireMinter(caller);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  burn(caller: Address, from: Address, amount: bigint): void {
    this.requireMinter(caller);
    const balance = this.balanceOf(from);
    if (balance < amount) throw new InsufficientBalanceError(from, amount, balance);
    this.balances.set(from, balance - amount);
    this.supply -= amount;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  private requireMinter(caller: Address): void {
    if (caller !== this.minter) throw new UnauthorizedCallerError(caller);
  }
}
