import { PRICE_DECIMALS_TARGET } from '../config/constants';
import { InvalidPriceError } from '../domain/errors';
import { pow10 } from '../utils/math';
import type { PriceFeed } from './priceFeed';

/**
 * Scale a raw feed answer to an 18-decimal unit price.
 *
 * Scaling down truncates, so the result never exceeds the literal feed value and
 * vaults can only look marginally less healthy than the feed implies.
 *
 * @throws InvalidPriceError when the answer is not positive, the decimals are
 * not a non-negative integer, or the scaled price truncates to zero.
 */
export function normalizePrice(answer: bigint, decimals: number): bigint {
  if (answer <= 0n) {
    throw new InvalidPriceError(`Price feed answer must be positive, got ${answer}`);
  }
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new InvalidPriceError(`Price feed decimals must be a non-negative integer, got ${decimals}`);
  }
  let price: bigint;
  if (decimals === PRICE_DECIMALS_TARGET) {
    price = answer;
  } else if (decimals < PRICE_DECIMALS_TARGET) {
    price = answer * pow10(PRICE_DECIMALS_TARGET - decimals);
  } else {
    price = answer / pow10(decimals - PRICE_DECIMALS_TARGET);
  }
  if (price === 0n) {
    throw new InvalidPriceError(`Price feed answer ${answer} at ${decimals} decimals rounds to zero`);
  }
  return price;
}

export class PriceNormalizer {
  constructor(private readonly feed: PriceFeed) {}

  getPrice(): bigint {
    const { answer, decimals } = this.feed.latestAnswer();
    return normalizePrice(answer, decimals);
  }
}
