import type { Address, Vault } from '../domain/types';

// Owner-keyed vault records plus the append-only creation order. Vaults are
// never removed; liquidation zeroes them in place.
export class VaultStore {
  private readonly vaults = new Map<Address, Vault>();
  private readonly owners: Address[] = [];

  has(owner: Address): boolean {
    return this.vaults.get(owner)?.exists === true;
  }

  get(owner: Address): Vault | undefined {
    const v = this.vaults.get(owner);
    return v ? { ...v } : undefined;
  }

  insert(owner: Address): Vault {
    const vault: Vault = { owner, exists: true, collateral: 0n, debt: 0n };
    this.vaults.set(owner, vault);
    this.owners.push(owner);
    return { ...vault };
  }

  write(owner: Address, balances: { collateral: bigint; debt: bigint }): void {
    const v = this.vaults.get(owner);
    if (!v) throw new Error(`VaultStore.write on missing vault ${owner}`);
    v.collateral = balances.collateral;
    v.debt = balances.debt;
  }

  listOwners(): Address[] {
    return [...this.owners];
  }

  list(): Vault[] {
    return this.owners.flatMap((o) => {
      const v = this.vaults.get(o);
      return v ? [{ ...v }] : [];
    });
  }
}
