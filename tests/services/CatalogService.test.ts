import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { CatalogService } from '../../src/services/CatalogService.js';
import { totalWeight } from '../../src/lib/loot.js';
import { testCatalog } from '../helpers/fixtures.js';

describe('CatalogService', () => {
  it('finds items and cases by ID or by name regardless of case', () => {
    const catalog = testCatalog();

    expect(catalog.requireItem('hammer').name).toBe('Golden Hammer');
    expect(catalog.requireItem('  golden HAMMER ').id).toBe('hammer');
    expect(catalog.requireCase('fruit case').id).toBe('fruit-case');
    expect(() => catalog.requireCase('gift-box')).toThrow('No case called "gift-box" exists.');
    expect(catalog.getItem('spoon')).toBeUndefined();
  });

  it('builds a case pool from its collections', () => {
    const catalog = testCatalog();
    expect(catalog.poolFor(catalog.requireCase('tool-case')).map((item) => item.id)).toEqual(['bolt', 'drill', 'hammer']);
  });

  describe('bundled data', () => {
    const catalog = CatalogService.fromFiles(
      fileURLToPath(new URL('../../data/catalog.json', import.meta.url)),
      fileURLToPath(new URL('../../data/rarities.json', import.meta.url))
    );

    it('loads the rarity table in order', () => {
      expect(catalog.rarities.map((tier) => tier.tag)).toEqual([
        'Common',
        'Rare',
        'Super-rare',
        'Epic',
        'Nephrite',
        'Exotic',
        'Legendary',
      ]);
      expect(totalWeight(catalog.rarities)).toBe(925);
    });

    it('gives every item a known rarity and every case a non-empty pool', () => {
      expect(catalog.listItems()).toHaveLength(27);
      for (const item of catalog.listItems()) {
        expect(catalog.getRarity(item.rarity)).toBeDefined();
      }
      for (const caseDef of catalog.listCases()) {
        expect(catalog.poolFor(caseDef).length).toBeGreaterThan(0);
      }
    });

    it('merges collections for mixed cases', () => {
      const pool = catalog.poolFor(catalog.requireCase('mixed-case'));
      expect(pool).toHaveLength(17);
      expect(pool.some((item) => item.name === 'Moon Rock')).toBe(true);
      expect(pool.some((item) => item.name === 'Leviathan Scale')).toBe(true);
    });
  });
});
