import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CaseDefinition, CatalogItem, RarityTier } from '../lib/types.js';
import { NotFoundError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

const rarityTableSchema = z
  .array(
    z.object({
      tag: z.string().min(1),
      weight: z.number().int().positive(),
      basePrice: z.number().positive(),
      volatility: z.number().min(0),
      color: z.number().int().min(0).max(0xffffff),
      emoji: z.string(),
    })
  )
  .min(1);

const catalogSchema = z.object({
  items: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      description: z.string().default(''),
      rarity: z.string().min(1),
      collection: z.string().min(1),
    })
  ),
  cases: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      collections: z.array(z.string().min(1)).min(1),
      price: z.number().int().positive(),
    })
  ),
});

export interface CatalogData {
  rarities: RarityTier[];
  items: CatalogItem[];
  cases: CaseDefinition[];
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf8'));
}

/**
 * Read-only catalog of rarity tiers, collectible items and cases
 */
export class CatalogService {
  private readonly items = new Map<string, CatalogItem>();
  private readonly cases = new Map<string, CaseDefinition>();
  readonly rarities: readonly RarityTier[];

  constructor(data: CatalogData) {
    this.rarities = data.rarities;
    for (const item of data.items) {
      this.items.set(item.id, item);
    }
    for (const caseDef of data.cases) {
      this.cases.set(caseDef.id, caseDef);
    }
  }

  /**
   * Load and validate the catalog and rarity table from JSON files
   *
   * @param catalogPath - `{ items, cases }` file
   * @param raritiesPath - ordered rarity table
   */
  static fromFiles(catalogPath: string, raritiesPath: string): CatalogService {
    const rarities = rarityTableSchema.parse(readJson(raritiesPath));
    const { items, cases } = catalogSchema.parse(readJson(catalogPath));

    const known = new Set(rarities.map((tier) => tier.tag));
    for (const item of items) {
      if (!known.has(item.rarity)) {
        logger.warn(`Item ${item.id} has unknown rarity '${item.rarity}'`);
      }
    }

    logger.info(`Catalog loaded: ${items.length} items, ${cases.length} cases, ${rarities.length} rarities`);
    return new CatalogService({ rarities, items, cases });
  }

  getRarity(tag: string): RarityTier | undefined {
    return this.rarities.find((tier) => tier.tag === tag);
  }

  getItem(itemId: string): CatalogItem | undefined {
    return this.items.get(itemId);
  }

  /**
   * Look up an item by ID or (case-insensitive) name
   * @throws NotFoundError
   */
  requireItem(query: string): CatalogItem {
    const item = this.items.get(query) ?? this.findByName(this.items.values(), query);
    if (!item) {
      throw new NotFoundError(`No item called "${query}" exists.`);
    }
    return item;
  }

  getCase(caseId: string): CaseDefinition | undefined {
    return this.cases.get(caseId);
  }

  /**
   * Look up a case by ID or (case-insensitive) name
   * @throws NotFoundError
   */
  requireCase(query: string): CaseDefinition {
    const caseDef = this.cases.get(query) ?? this.findByName(this.cases.values(), query);
    if (!caseDef) {
      throw new NotFoundError(`No case called "${query}" exists.`);
    }
    return caseDef;
  }

  listItems(): CatalogItem[] {
    return [...this.items.values()];
  }

  listCases(): CaseDefinition[] {
    return [...this.cases.values()];
  }

  /**
   * Items a case can drop
   */
  poolFor(caseDef: CaseDefinition): CatalogItem[] {
    const collections = new Set(caseDef.collections);
    return this.listItems().filter((item) => collections.has(item.collection));
  }

  private findByName<T extends { name: string }>(entries: Iterable<T>, query: string): T | undefined {
    const needle = query.trim().toLowerCase();
    for (const entry of entries) {
      if (entry.name.toLowerCase() === needle) {
        return entry;
      }
    }
    return undefined;
  }
}
