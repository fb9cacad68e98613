import { z } from 'zod';
import type { CatalogItem, RarityTier } from '../lib/types.js';
import type { CatalogService } from './CatalogService.js';
import { PRICE_CONFIG } from '../constants.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

/**
 * Source of the reference price that drives item prices
 */
export interface PriceFeed {
  fetchReference(): Promise<number>;
}

// Coinbase spot format: { "data": { "base": "BTC", "currency": "USD", "amount": "64123.45" } }
const spotPriceSchema = z.object({
  data: z.object({
    amount: z.coerce.number().positive(),
  }),
});

/**
 * Reads a spot price from an HTTPS JSON endpoint
 */
export class HttpPriceFeed implements PriceFeed {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10_000
  ) {}

  async fetchReference(): Promise<number> {
    const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      throw new Error(`Price feed responded with ${response.status} ${response.statusText}`);
    }
    const body: unknown = await response.json();
    return spotPriceSchema.parse(body).data.amount;
  }
}

interface PriceSample {
  at: number;
  value: number;
}

/**
 * price = max(1, round(basePrice × (1 + volatility × clamp(change, ±MAX_DEVIATION))))
 *
 * @param tier - Rarity tier of the item
 * @param change - Relative deviation of the reference price from its average
 */
export function computePrice(tier: Pick<RarityTier, 'basePrice' | 'volatility'>, change: number): number {
  const clamped = Math.min(PRICE_CONFIG.MAX_DEVIATION, Math.max(-PRICE_CONFIG.MAX_DEVIATION, change));
  return Math.max(1, Math.round(tier.basePrice * (1 + tier.volatility * clamped)));
}

/**
 * Item prices driven by an external reference price
 *
 * Samples of the last HISTORY_WINDOW_HOURS are kept in memory; `change` is the
 * latest sample's deviation from their average. A failed fetch keeps the
 * previous quote.
 */
export class PriceService {
  private samples: PriceSample[] = [];
  private change = 0;

  constructor(
    private readonly catalog: CatalogService,
    private readonly feed: PriceFeed,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Fetch a new sample and recompute the deviation
   * @returns false when the feed failed (previous prices stay in effect)
   */
  async recompute(): Promise<boolean> {
    let value: number;
    try {
      value = await this.feed.fetchReference();
    } catch (error) {
      logger.warn('Price feed unavailable, keeping previous prices:', error);
      return false;
    }

    const now = this.now();
    const cutoff = now - PRICE_CONFIG.HISTORY_WINDOW_HOURS * 60 * 60 * 1000;
    this.samples = [...this.samples.filter((sample) => sample.at >= cutoff), { at: now, value }];

    const average = this.samples.reduce((sum, sample) => sum + sample.value, 0) / this.samples.length;
    this.change = average > 0 ? (value - average) / average : 0;

    logger.debug(`Prices recomputed: reference ${value}, average ${average.toFixed(2)}, change ${(this.change * 100).toFixed(2)}%`);
    return true;
  }

  /** Deviation currently applied to prices */
  getChange(): number {
    return this.change;
  }

  latestReference(): number | null {
    return this.samples.at(-1)?.value ?? null;
  }

  priceOf(item: CatalogItem): number {
    const tier = this.catalog.getRarity(item.rarity) ?? { basePrice: PRICE_CONFIG.DEFAULT_BASE_PRICE, volatility: 0 };
    return computePrice(tier, this.change);
  }

  /**
   * Current price of every rarity tier, in table order
   */
  tierPrices(): { tier: RarityTier; price: number }[] {
    return this.catalog.rarities.map((tier) => ({ tier, price: computePrice(tier, this.change) }));
  }
}
