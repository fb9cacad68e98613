import { z } from 'zod';
import type { KeyValueStore } from '../lib/store.js';
import type { Inventory } from '../lib/types.js';
import { STORE_KEYS } from '../constants.js';
import { KeyedMutex } from '../lib/lock.js';
import { TransientStoreError, ValidationError } from '../lib/errors.js';

const countsSchema = z.record(z.string(), z.number().int().nonnegative());

const inventorySchema = z.object({
  items: countsSchema.default({}),
  cases: countsSchema.default({}),
});

export function emptyInventory(): Inventory {
  return { items: {}, cases: {} };
}

export function parseInventory(raw: string): Inventory {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new TransientStoreError('parse inventory', error);
  }
  const parsed = inventorySchema.safeParse(json);
  if (!parsed.success) {
    throw new TransientStoreError('parse inventory', parsed.error);
  }
  return parsed.data;
}

export function addCount(counts: Record<string, number>, id: string, amount: number): number {
  counts[id] = (counts[id] ?? 0) + amount;
  return counts[id];
}

/**
 * Take `amount` of `id`; zero counts are removed
 * @throws ValidationError when fewer are held
 */
export function removeCount(counts: Record<string, number>, id: string, amount: number, label = id): number {
  const held = counts[id] ?? 0;
  if (held < amount) {
    throw new ValidationError(`You only have ${held}× ${label}, but ${amount} are needed.`);
  }
  const left = held - amount;
  if (left === 0) {
    delete counts[id];
  } else {
    counts[id] = left;
  }
  return left;
}

/**
 * Per-user item and case holdings (`inventory:<userId>`)
 */
export class InventoryService {
  private readonly locks = new KeyedMutex();

  constructor(private readonly store: KeyValueStore) {}

  private key(userId: string): string {
    return `${STORE_KEYS.INVENTORY}${userId}`;
  }

  async get(userId: string): Promise<Inventory> {
    const raw = await this.store.get(this.key(userId));
    return raw === null ? emptyInventory() : parseInventory(raw);
  }

  /**
   * Read-modify-write under the user's inventory lock
   * If `apply` throws, nothing is written.
   *
   * @param userId - Discord user ID
   * @param apply - Mutates the inventory in place and returns a result
   */
  async update<T>(userId: string, apply: (inventory: Inventory) => T | Promise<T>): Promise<T> {
    return this.locks.runExclusive(userId, async () => {
      const inventory = await this.get(userId);
      const result = await apply(inventory);
      await this.store.set(this.key(userId), JSON.stringify(inventory));
      return result;
    });
  }
}
