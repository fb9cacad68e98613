import { z } from 'zod';
import type { KeyValueStore } from '../lib/store.js';
import type { CaseBank, CaseDefinition, CatalogItem, RarityTier } from '../lib/types.js';
import type { WalletService } from './WalletService.js';
import type { CatalogService } from './CatalogService.js';
import { addCount, removeCount, type InventoryService } from './InventoryService.js';
import { CASE_CONFIG, LedgerReason, STORE_KEYS } from '../constants.js';
import { DailyLimiter } from '../lib/daily-limit.js';
import { drawItem, type UniformSource } from '../lib/loot.js';
import { KeyedMutex, Mutex } from '../lib/lock.js';
import { TransientStoreError, ValidationError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

const caseBankSchema = z.object({
  stock: z.record(z.string(), z.number().int().nonnegative()),
  lastRefilled: z.string().datetime(),
});

export interface DrawnItem {
  item: CatalogItem;
  rarity: RarityTier | undefined;
  isNew: boolean;
}

export interface OpenCaseResult {
  caseDef: CaseDefinition;
  drops: DrawnItem[];
  casesLeft: number;
  /** Null when today's open could not be counted */
  opensLeft: number | null;
}

export interface BuyCaseResult {
  caseDef: CaseDefinition;
  quantity: number;
  cost: number;
  balance: number;
  stockLeft: number;
}

export interface CaseServiceOptions {
  random?: UniformSource;
  now?: () => Date;
}

/**
 * Case opening and the shared case bank
 *
 * - Opening consumes one held case and draws CASE_CONFIG.DRAW_COUNT items
 * - The bank restocks every case to BANK_STOCK_PER_CASE once BANK_REFILL_HOURS
 *   have passed, checked lazily whenever the bank is read
 * - Opens and purchases are capped per user per UTC day
 */
export class CaseService {
  private readonly bankLock = new Mutex();
  // Spans the inventory write and the daily counter of one user's open
  private readonly openLocks = new KeyedMutex();
  private readonly opens: DailyLimiter;
  private readonly purchases: DailyLimiter;
  private readonly random: UniformSource;
  private readonly now: () => Date;

  constructor(
    private readonly store: KeyValueStore,
    private readonly wallet: WalletService,
    private readonly inventory: InventoryService,
    private readonly catalog: CatalogService,
    options: CaseServiceOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.opens = new DailyLimiter(store, 'case_open', CASE_CONFIG.DAILY_OPEN_LIMIT, 'open cases', this.now);
    this.purchases = new DailyLimiter(store, 'case_buy', CASE_CONFIG.DAILY_PURCHASE_LIMIT, 'buy cases', this.now);
  }

  /**
   * Open one held case
   *
   * @param userId - Discord user ID
   * @param caseQuery - Case ID or name
   * @throws ValidationError if the user holds none of that case
   * @throws DailyLimitError if the user already opened the daily maximum
   */
  async openCase(userId: string, caseQuery: string): Promise<OpenCaseResult> {
    const caseDef = this.catalog.requireCase(caseQuery);
    const pool = this.catalog.poolFor(caseDef);

    return this.openLocks.runExclusive(userId, async () => {
      const result = await this.inventory.update(userId, async (inventory) => {
        if ((inventory.cases[caseDef.id] ?? 0) < 1) {
          throw new ValidationError(`You don't have a ${caseDef.name}. Buy one with /case buy.`);
        }
        await this.opens.assertAvailable(userId);

        const casesLeft = removeCount(inventory.cases, caseDef.id, 1, caseDef.name);
        const drops: DrawnItem[] = [];
        for (let i = 0; i < CASE_CONFIG.DRAW_COUNT; i++) {
          const item = drawItem(pool, this.catalog.rarities, this.random);
          const isNew = (inventory.items[item.id] ?? 0) === 0;
          addCount(inventory.items, item.id, 1);
          drops.push({ item, rarity: this.catalog.getRarity(item.rarity), isNew });
        }
        return { caseDef, drops, casesLeft };
      });

      const opened = await this.recordUsage(this.opens, userId, 1);
      logger.info(`Case opened: ${userId} opened ${caseDef.id} -> ${result.drops.map((d) => d.item.id).join(', ')}`);
      return {
        ...result,
        opensLeft: opened === null ? null : Math.max(0, CASE_CONFIG.DAILY_OPEN_LIMIT - opened),
      };
    });
  }

  /**
   * Current bank stock (restocked first if due)
   */
  async getBank(): Promise<CaseBank> {
    return this.bankLock.runExclusive(() => this.loadBank());
  }

  /**
   * Buy cases from the bank
   *
   * @param userId - Discord user ID
   * @param caseQuery - Case ID or name
   * @param quantity - Number of cases
   * @throws ValidationError if the bank has fewer in stock
   * @throws DailyLimitError if the purchase would exceed the daily cap
   * @throws InsufficientFundsError if the user cannot pay
   */
  async buyCase(userId: string, caseQuery: string, quantity: number): Promise<BuyCaseResult> {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw new ValidationError('Quantity must be a positive whole number.');
    }
    const caseDef = this.catalog.requireCase(caseQuery);
    const cost = caseDef.price * quantity;

    return this.bankLock.runExclusive(async () => {
      const bank = await this.loadBank();
      const stock = bank.stock[caseDef.id] ?? 0;
      if (stock < quantity) {
        throw new ValidationError(`Only ${stock}× ${caseDef.name} left in the bank.`);
      }
      await this.purchases.assertAvailable(userId, quantity);

      const balance = await this.wallet.debit(userId, cost, LedgerReason.CASE_PURCHASE);

      bank.stock[caseDef.id] = stock - quantity;
      try {
        await this.saveBank(bank);
      } catch (error) {
        await this.wallet.compensate(userId, cost, `Case purchase by ${userId}`);
        throw error;
      }

      try {
        await this.inventory.update(userId, (inventory) => addCount(inventory.cases, caseDef.id, quantity));
      } catch (error) {
        await this.wallet.compensate(userId, cost, `Case delivery to ${userId}`);
        bank.stock[caseDef.id] = stock;
        await this.saveBank(bank).catch((restoreError: unknown) => {
          logger.error('Failed to restore case bank stock:', restoreError);
        });
        throw error;
      }

      await this.recordUsage(this.purchases, userId, quantity);
      logger.info(`Case purchase: ${userId} bought ${quantity}× ${caseDef.id} for ${cost}`);
      return { caseDef, quantity, cost, balance, stockLeft: bank.stock[caseDef.id] };
    });
  }

  /**
   * Remaining opens for today
   */
  async opensLeft(userId: string): Promise<number> {
    return this.opens.remaining(userId);
  }

  /**
   * Count actions that already happened
   * @returns Today's count, or null when the counter could not be written
   */
  private async recordUsage(limiter: DailyLimiter, userId: string, amount: number): Promise<number | null> {
    try {
      return await limiter.record(userId, amount);
    } catch (error) {
      logger.warn(`Failed to record daily usage for ${userId}:`, error);
      return null;
    }
  }

  /**
   * Read the bank, restocking (and persisting) when the refill interval passed
   * Call with bankLock held.
   */
  private async loadBank(): Promise<CaseBank> {
    const raw = await this.store.get(STORE_KEYS.CASE_BANK);
    const now = this.now();

    if (raw === null) {
      const bank = this.fullBank(now);
      await this.saveBank(bank);
      return bank;
    }

    const bank = this.parseBank(raw);
    const elapsedMs = now.getTime() - new Date(bank.lastRefilled).getTime();
    if (elapsedMs >= CASE_CONFIG.BANK_REFILL_HOURS * 60 * 60 * 1000) {
      const refilled = this.fullBank(now);
      await this.saveBank(refilled);
      logger.info('Case bank restocked');
      return refilled;
    }
    return bank;
  }

  private fullBank(now: Date): CaseBank {
    const stock: Record<string, number> = {};
    for (const caseDef of this.catalog.listCases()) {
      stock[caseDef.id] = CASE_CONFIG.BANK_STOCK_PER_CASE;
    }
    return { stock, lastRefilled: now.toISOString() };
  }

  private parseBank(raw: string): CaseBank {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new TransientStoreError('parse case bank', error);
    }
    const parsed = caseBankSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransientStoreError('parse case bank', parsed.error);
    }
    return parsed.data;
  }

  private async saveBank(bank: CaseBank): Promise<void> {
    await this.store.set(STORE_KEYS.CASE_BANK, JSON.stringify(bank));
  }
}
