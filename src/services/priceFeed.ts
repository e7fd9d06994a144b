import { parseUnits } from 'viem';
import type { PriceReading } from '../domain/types';

// Upstream oracle. Read synchronously and in full on every price-dependent call;
// round and staleness metadata are not consulted.
export interface PriceFeed {
  latestAnswer(): PriceReading;
}

// In-process feed whose reading is set explicitly. Backs the HTTP surface,
// the shock simulation and the tests.
export class StaticPriceFeed implements PriceFeed {
  private answer: bigint;
  private decimals: number;

  constructor(answer: bigint, decimals: number) {
    this.answer = answer;
    this.decimals = decimals;
  }

  // e.g. fromHuman('2000', 8) -> answer 200000000000
  static fromHuman(price: string, decimals: number): StaticPriceFeed {
    return new StaticPriceFeed(parseUnits(price, decimals), decimals);
  }

  latestAnswer(): PriceReading {
    return { answer: this.answer, decimals: this.decimals };
  }

  setAnswer(answer: bigint, decimals: number = this.decimals): void {
    this.answer = answer;
    this.decimals = decimals;
  }

  setHuman(price: string): void {
    this.answer = parseUnits(price, this.decimals);
  }
}
