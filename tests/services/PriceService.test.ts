import { describe, expect, it } from 'vitest';
import { PriceService, computePrice, type PriceFeed } from '../../src/services/PriceService.js';
import { testCatalog } from '../helpers/fixtures.js';

const HOUR = 60 * 60 * 1000;

class ScriptedFeed implements PriceFeed {
  readonly values: (number | Error)[] = [];

  async fetchReference(): Promise<number> {
    const next = this.values.shift();
    if (next === undefined || next instanceof Error) {
      throw next ?? new Error('no value scripted');
    }
    return next;
  }
}

describe('computePrice', () => {
  const tier = { basePrice: 100, volatility: 0.5 };

  it('scales the base price by volatility times the deviation', () => {
    expect(computePrice(tier, 0)).toBe(100);
    expect(computePrice(tier, 0.2)).toBe(110);
    expect(computePrice(tier, -0.2)).toBe(90);
  });

  it('clamps the deviation to ±50%', () => {
    expect(computePrice(tier, 0.9)).toBe(125);
    expect(computePrice(tier, -3)).toBe(75);
  });

  it('never prices below 1', () => {
    expect(computePrice({ basePrice: 0.4, volatility: 0 }, 0)).toBe(1);
  });
});

describe('PriceService', () => {
  function setup() {
    let now = 0;
    const feed = new ScriptedFeed();
    const catalog = testCatalog();
    const prices = new PriceService(catalog, feed, () => now);
    return {
      feed,
      catalog,
      prices,
      advance: (ms: number) => {
        now += ms;
      },
    };
  }

  it('uses base prices until the first sample arrives', () => {
    const { prices, catalog } = setup();

    expect(prices.latestReference()).toBeNull();
    expect(prices.priceOf(catalog.requireItem('drill'))).toBe(40);
  });

  it('follows the deviation of the latest sample from the rolling average', async () => {
    const { prices, feed, catalog, advance } = setup();
    feed.values.push(100, 120);

    expect(await prices.recompute()).toBe(true);
    expect(prices.getChange()).toBe(0);

    advance(HOUR);
    await prices.recompute();

    // average 110, change 10/110
    expect(prices.getChange()).toBeCloseTo(1 / 11, 10);
    expect(prices.latestReference()).toBe(120);
    // Rare: 40 * (1 + 0.2 * 0.0909) = 40.73
    expect(prices.priceOf(catalog.requireItem('drill'))).toBe(41);
  });

  it('forgets samples older than the window', async () => {
    const { prices, feed, advance } = setup();
    feed.values.push(100, 50);

    await prices.recompute();
    advance(25 * HOUR);
    await prices.recompute();

    expect(prices.getChange()).toBe(0);
  });

  it('keeps the previous prices when the feed fails', async () => {
    const { prices, feed, advance } = setup();
    feed.values.push(100, 200, new Error('timeout'));

    await prices.recompute();
    advance(HOUR);
    await prices.recompute();
    const before = prices.getChange();

    advance(HOUR);
    expect(await prices.recompute()).toBe(false);
    expect(prices.getChange()).toBe(before);
    expect(prices.latestReference()).toBe(200);
  });

  it('prices items of an unknown rarity at the default base price', () => {
    const { prices } = setup();
    expect(
      prices.priceOf({ id: 'odd', name: 'Odd', description: '', rarity: 'Mythic', collection: 'misc' })
    ).toBe(10);
  });

  it('lists the price of every tier in table order', () => {
    const { prices } = setup();
    expect(prices.tierPrices().map(({ tier, price }) => [tier.tag, price])).toEqual([
      ['Common', 10],
      ['Rare', 40],
      ['Legendary', 200],
    ]);
  });
});
