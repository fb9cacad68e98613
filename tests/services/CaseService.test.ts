import { describe, expect, it } from 'vitest';
import { CaseService } from '../../src/services/CaseService.js';
import { InventoryService, addCount } from '../../src/services/InventoryService.js';
import { LedgerReason } from '../../src/constants.js';
import { DailyLimitError, InsufficientFundsError, TransientStoreError, ValidationError } from '../../src/lib/errors.js';
import { testCatalog, walletFixture } from '../helpers/fixtures.js';
import { sequence } from '../helpers/memory-store.js';

const NOW = new Date('2026-05-01T12:00:00Z');
const HOUR = 60 * 60 * 1000;

async function setup(credits = 500, now: () => Date = () => NOW) {
  const fixture = walletFixture();
  const inventory = new InventoryService(fixture.store);
  const catalog = testCatalog();
  // Every draw lands Common, first item of the tier
  const cases = new CaseService(fixture.store, fixture.wallet, inventory, catalog, { random: sequence(0.1), now });
  if (credits > 0) {
    await fixture.wallet.credit('u1', credits, LedgerReason.ADMIN_GRANT);
  }
  return { ...fixture, inventory, catalog, cases };
}

function seedBank(store: { seed(key: string, value: string): void }, stock: Record<string, number>, lastRefilled: Date) {
  store.seed('case_bank', JSON.stringify({ stock, lastRefilled: lastRefilled.toISOString() }));
}

describe('CaseService', () => {
  describe('openCase', () => {
    it('requires a held case', async () => {
      const { cases } = await setup();
      await expect(cases.openCase('u1', 'tool-case')).rejects.toThrow(
        "You don't have a Tool Case. Buy one with /case buy."
      );
    });

    it('consumes one case and draws three items', async () => {
      const { cases, inventory } = await setup();
      await inventory.update('u1', (inv) => addCount(inv.cases, 'tool-case', 2));

      const result = await cases.openCase('u1', 'Tool Case');

      expect(result.drops.map((drop) => drop.item.id)).toEqual(['bolt', 'bolt', 'bolt']);
      expect(result.drops.map((drop) => drop.isNew)).toEqual([true, false, false]);
      expect(result.drops[0]?.rarity?.tag).toBe('Common');
      expect(result.casesLeft).toBe(1);
      expect(result.opensLeft).toBe(4);
      expect(await inventory.get('u1')).toEqual({ items: { bolt: 3 }, cases: { 'tool-case': 1 } });
    });

    it("reports no open count when today's counter cannot be written", async () => {
      const { cases, inventory, store } = await setup();
      await inventory.update('u1', (inv) => addCount(inv.cases, 'tool-case', 1));
      store.failNext('increment');

      const result = await cases.openCase('u1', 'tool-case');

      expect(result.opensLeft).toBeNull();
      expect(result.drops).toHaveLength(3);
      expect(await inventory.get('u1')).toEqual({ items: { bolt: 3 }, cases: {} });
    });

    it('stops at the daily open limit without consuming the case', async () => {
      const { cases, inventory } = await setup();
      await inventory.update('u1', (inv) => addCount(inv.cases, 'fruit-case', 6));

      for (let i = 0; i < 5; i++) {
        await cases.openCase('u1', 'fruit-case');
      }

      await expect(cases.openCase('u1', 'fruit-case')).rejects.toBeInstanceOf(DailyLimitError);
      expect((await inventory.get('u1')).cases).toEqual({ 'fruit-case': 1 });
      expect(await cases.opensLeft('u1')).toBe(0);
    });

    it('opens a single held case only once under concurrent requests', async () => {
      const { cases, inventory } = await setup();
      await inventory.update('u1', (inv) => addCount(inv.cases, 'tool-case', 1));

      const outcomes = await Promise.allSettled([cases.openCase('u1', 'tool-case'), cases.openCase('u1', 'tool-case')]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'rejected']);
      expect((await inventory.get('u1')).items).toEqual({ bolt: 3 });
    });
  });

  describe('bank', () => {
    it('starts full', async () => {
      const { cases } = await setup();
      expect(await cases.getBank()).toEqual({
        stock: { 'fruit-case': 10, 'tool-case': 10 },
        lastRefilled: NOW.toISOString(),
      });
    });

    it('restocks once the refill interval has passed', async () => {
      const { cases, store } = await setup();
      seedBank(store, { 'fruit-case': 3, 'tool-case': 0 }, new Date(NOW.getTime() - 12 * HOUR));

      const bank = await cases.getBank();

      expect(bank.stock).toEqual({ 'fruit-case': 10, 'tool-case': 10 });
      expect(JSON.parse(store.peek('case_bank') ?? '{}')).toEqual(bank);
    });

    it('keeps the stock before the refill interval', async () => {
      const { cases, store } = await setup();
      const lastRefilled = new Date(NOW.getTime() - 11 * HOUR);
      seedBank(store, { 'fruit-case': 3, 'tool-case': 0 }, lastRefilled);

      expect(await cases.getBank()).toEqual({
        stock: { 'fruit-case': 3, 'tool-case': 0 },
        lastRefilled: lastRefilled.toISOString(),
      });
    });
  });

  describe('buyCase', () => {
    it('charges the price, takes stock and delivers the cases', async () => {
      const { cases, inventory } = await setup();

      const result = await cases.buyCase('u1', 'tool-case', 2);

      expect(result).toMatchObject({ quantity: 2, cost: 160, balance: 340, stockLeft: 8 });
      expect(result.caseDef.id).toBe('tool-case');
      expect((await inventory.get('u1')).cases).toEqual({ 'tool-case': 2 });
    });

    it('rejects purchases above the bank stock', async () => {
      const { cases, store, wallet } = await setup();
      seedBank(store, { 'tool-case': 1, 'fruit-case': 10 }, NOW);

      await expect(cases.buyCase('u1', 'tool-case', 2)).rejects.toThrow('Only 1× Tool Case left in the bank.');
      expect(await wallet.getBalance('u1')).toBe(500);
    });

    it('sells the last case in stock', async () => {
      const { cases, store } = await setup();
      seedBank(store, { 'tool-case': 1, 'fruit-case': 10 }, NOW);

      const result = await cases.buyCase('u1', 'tool-case', 1);

      expect(result.stockLeft).toBe(0);
      expect((await cases.getBank()).stock['tool-case']).toBe(0);
    });

    it('rejects purchases the user cannot pay for and keeps the stock', async () => {
      const { cases } = await setup(50);

      await expect(cases.buyCase('u1', 'tool-case', 1)).rejects.toBeInstanceOf(InsufficientFundsError);
      expect((await cases.getBank()).stock['tool-case']).toBe(10);
    });

    it('caps purchases per day', async () => {
      const { cases, wallet } = await setup();
      await cases.buyCase('u1', 'tool-case', 5);

      await expect(cases.buyCase('u1', 'fruit-case', 1)).rejects.toThrow(
        'Daily limit reached: you can buy cases at most 5 times per day.'
      );
      expect(await wallet.getBalance('u1')).toBe(100);
    });

    it('rejects a non-positive quantity', async () => {
      const { cases } = await setup();
      await expect(cases.buyCase('u1', 'tool-case', 0)).rejects.toBeInstanceOf(ValidationError);
    });

    it('returns the credits and the stock when delivery fails', async () => {
      const { cases, store, wallet, notices } = await setup();
      store.failWhen = (operation, key) => operation === 'set' && key === 'inventory:u1';

      await expect(cases.buyCase('u1', 'tool-case', 1)).rejects.toBeInstanceOf(TransientStoreError);

      expect(await wallet.getBalance('u1')).toBe(500);
      expect(notices).toContain('⚠️ Case delivery to u1 failed midway; 80 credits returned to <@u1>.');
      expect(JSON.parse(store.peek('case_bank') ?? '{}').stock['tool-case']).toBe(10);
    });
  });
});
