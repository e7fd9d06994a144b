import { DEFAULT_LEDGER_ADDRESS } from '../config/constants';
import type { Address } from '../domain/types';
import { EventJournal } from '../persistence/eventStore';
import { InMemoryLiabilityToken } from './liabilityToken';
import { NativeAssetBank } from './nativeAsset';
import { StaticPriceFeed } from './priceFeed';
import { VaultLedger } from './vaultLedger';

// Everything a running deployment needs, wired together once.
export type LedgerContext = {
  ledger: VaultLedger;
  feed: StaticPriceFeed;
  bank: NativeAssetBank;
  token: InMemoryLiabilityToken;
  journal: EventJournal;
};

export function createLedgerContext(opts: {
  address?: Address;
  initialPrice?: string;
  priceDecimals?: number;
  eventsPath?: string;
} = {}): LedgerContext {
  const address = opts.address ?? DEFAULT_LEDGER_ADDRESS;
  const feed = StaticPriceFeed.fromHuman(opts.initialPrice ?? '2000', opts.priceDecimals ?? 8);
  const bank = new NativeAssetBank();
  const token = new InMemoryLiabilityToken(address);
  const ledger = new VaultLedger({ address, priceFeed: feed, token, asset: bank });
  const journal = new EventJournal(ledger.events, opts.eventsPath);
  return { ledger, feed, bank, token, journal };
}
