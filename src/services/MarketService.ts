import type { CatalogItem, OperatorNotifier } from '../lib/types.js';
import type { WalletService } from './WalletService.js';
import type { ExpireHandler, GameStateService, SessionOf } from './GameStateService.js';
import type { CatalogService } from './CatalogService.js';
import type { PriceService } from './PriceService.js';
import { addCount, removeCount, type InventoryService } from './InventoryService.js';
import { LedgerReason, SESSION_TTL_MINUTES, SessionKind } from '../constants.js';
import { ForbiddenActionError, ValidationError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

export type SaleSession = SessionOf<SessionKind.SALE>;
export type TradeSession = SessionOf<SessionKind.TRADE>;

export interface SaleResult {
  item: CatalogItem;
  quantity: number;
  payout: number;
  balance: number;
}

export interface TradeResult {
  item: CatalogItem;
  quantity: number;
  price: number;
  sellerId: string;
  buyerId: string;
}

export interface MarketServiceOptions {
  notifier?: OperatorNotifier;
}

function assertPositive(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${what} must be a positive whole number.`);
  }
}

/**
 * Selling items back for credits and player-to-player trades
 *
 * Both run as confirmation prompts in the session registry: nothing moves until
 * the owner confirms a sale, or the buyer accepts a trade.
 */
export class MarketService {
  private readonly notifier: OperatorNotifier;

  constructor(
    private readonly wallet: WalletService,
    private readonly inventory: InventoryService,
    private readonly registry: GameStateService,
    private readonly catalog: CatalogService,
    private readonly prices: PriceService,
    options: MarketServiceOptions = {}
  ) {
    this.notifier = options.notifier ?? { notify: (message) => logger.error(message) };
  }

  /**
   * Quote a sale at half the current price per item
   * The quote is fixed for the lifetime of the prompt.
   *
   * @param userId - Discord user ID
   * @param itemQuery - Item ID or name
   * @param quantity - Number of copies
   */
  async requestSale(
    userId: string,
    itemQuery: string,
    quantity: number,
    onExpire?: ExpireHandler<SessionKind.SALE>
  ): Promise<{ session: SaleSession; item: CatalogItem }> {
    assertPositive(quantity, 'Quantity');
    const item = this.catalog.requireItem(itemQuery);
    await this.assertHolds(userId, item, quantity);

    const payout = Math.floor(this.prices.priceOf(item) / 2) * quantity;
    const session = await this.registry.runExclusive(async () =>
      this.registry.create(
        userId,
        SessionKind.SALE,
        SESSION_TTL_MINUTES[SessionKind.SALE] * 60 * 1000,
        { itemId: item.id, quantity, payout },
        { onExpire }
      )
    );
    return { session, item };
  }

  /**
   * Complete a sale: the items are removed and the quote is credited
   *
   * @param saleId - Session ID of the sale prompt
   * @param actorId - User who pressed confirm
   */
  async confirmSale(saleId: string, actorId: string): Promise<SaleResult> {
    return this.registry.runExclusive(async () => {
      const sale = this.registry.claim(saleId, SessionKind.SALE, actorId, ['pending'], { ownerOnly: true });
      this.registry.resolve(sale.sessionId);

      const { itemId, quantity, payout } = sale.data;
      const item = this.catalog.requireItem(itemId);

      await this.inventory.update(sale.ownerId, (inventory) => {
        removeCount(inventory.items, itemId, quantity, item.name);
      });

      let balance: number;
      try {
        balance =
          payout > 0
            ? await this.wallet.credit(sale.ownerId, payout, LedgerReason.ITEM_SALE)
            : await this.wallet.getBalance(sale.ownerId);
      } catch (error) {
        await this.returnItems(sale.ownerId, itemId, quantity);
        throw error;
      }

      logger.info(`Sale: ${sale.ownerId} sold ${quantity}× ${itemId} for ${payout}`);
      return { item, quantity, payout, balance };
    });
  }

  async cancelSale(saleId: string, actorId: string): Promise<void> {
    await this.registry.runExclusive(async () => {
      const sale = this.registry.claim(saleId, SessionKind.SALE, actorId, ['pending'], { ownerOnly: true });
      this.registry.resolve(sale.sessionId);
    });
  }

  /**
   * Offer items to another user for a price
   *
   * @param sellerId - Discord user ID of the holder
   * @param buyerId - Discord user ID of the only user who may accept
   * @param itemQuery - Item ID or name
   * @param quantity - Number of copies
   * @param price - Total credits asked
   */
  async offerTrade(
    sellerId: string,
    buyerId: string,
    itemQuery: string,
    quantity: number,
    price: number,
    onExpire?: ExpireHandler<SessionKind.TRADE>
  ): Promise<{ session: TradeSession; item: CatalogItem }> {
    if (sellerId === buyerId) {
      throw new ForbiddenActionError('You cannot trade with yourself.');
    }
    assertPositive(quantity, 'Quantity');
    assertPositive(price, 'Price');
    const item = this.catalog.requireItem(itemQuery);
    await this.assertHolds(sellerId, item, quantity);

    const session = await this.registry.runExclusive(async () =>
      this.registry.create(
        sellerId,
        SessionKind.TRADE,
        SESSION_TTL_MINUTES[SessionKind.TRADE] * 60 * 1000,
        { buyerId, itemId: item.id, quantity, price },
        { onExpire }
      )
    );
    return { session, item };
  }

  /**
   * Buyer accepts: pays the seller and receives the items
   * If the seller no longer holds the items, or the delivery fails, the buyer is
   * refunded and the seller keeps the items.
   *
   * @throws ForbiddenActionError if anyone but the buyer accepts
   * @throws InsufficientFundsError if the buyer cannot pay (the offer stays open)
   */
  async acceptTrade(tradeId: string, actorId: string): Promise<TradeResult> {
    return this.registry.runExclusive(async () => {
      const trade = this.registry.claim(tradeId, SessionKind.TRADE, actorId, ['pending']);
      const { buyerId, itemId, quantity, price } = trade.data;
      if (actorId !== buyerId) {
        throw new ForbiddenActionError('This offer was made to someone else.');
      }
      const item = this.catalog.requireItem(itemId);

      await this.wallet.debit(buyerId, price, LedgerReason.TRADE_PAYMENT);
      this.registry.addEscrow(trade, buyerId, price);
      this.registry.resolve(trade.sessionId);

      try {
        await this.inventory.update(trade.ownerId, (inventory) => {
          removeCount(inventory.items, itemId, quantity, item.name);
        });
      } catch (error) {
        await this.wallet.compensate(buyerId, price, `Trade ${trade.sessionId}`);
        trade.escrow.clear();
        if (error instanceof ValidationError) {
          throw new ValidationError('The seller no longer has these items. Your payment was returned.');
        }
        throw error;
      }

      try {
        await this.inventory.update(buyerId, (inventory) => {
          addCount(inventory.items, itemId, quantity);
        });
      } catch (error) {
        // Undo both halves: the items go back to the seller, the price to the buyer
        await this.returnItems(trade.ownerId, itemId, quantity);
        await this.wallet.compensate(buyerId, price, `Trade ${trade.sessionId}`);
        trade.escrow.clear();
        throw error;
      }

      // The buyer holds the items now; the seller's proceeds get a second attempt
      try {
        await this.wallet.credit(trade.ownerId, price, LedgerReason.TRADE_PROCEEDS);
      } catch (error) {
        logger.error(`Trade ${trade.sessionId}: crediting the seller failed:`, error);
        await this.wallet.compensate(trade.ownerId, price, `Trade ${trade.sessionId} proceeds`);
      }
      trade.escrow.clear();

      logger.info(`Trade: ${trade.ownerId} -> ${buyerId} ${quantity}× ${itemId} for ${price}`);
      return { item, quantity, price, sellerId: trade.ownerId, buyerId };
    });
  }

  /**
   * Either party calls the offer off
   */
  async declineTrade(tradeId: string, actorId: string): Promise<void> {
    await this.registry.runExclusive(async () => {
      const trade = this.registry.claim(tradeId, SessionKind.TRADE, actorId, ['pending']);
      if (actorId !== trade.ownerId && actorId !== trade.data.buyerId) {
        throw new ForbiddenActionError('This offer is not yours to decline.');
      }
      this.registry.resolve(trade.sessionId);
    });
  }

  private async assertHolds(userId: string, item: CatalogItem, quantity: number): Promise<void> {
    const inventory = await this.inventory.get(userId);
    const held = inventory.items[item.id] ?? 0;
    if (held < quantity) {
      throw new ValidationError(`You only have ${held}× ${item.name}.`);
    }
  }

  private async returnItems(userId: string, itemId: string, quantity: number): Promise<void> {
    try {
      await this.inventory.update(userId, (inventory) => {
        addCount(inventory.items, itemId, quantity);
      });
    } catch (error) {
      logger.error(`Failed to return ${quantity}× ${itemId} to ${userId}:`, error);
      this.notifier.notify(`🚨 ${quantity}× ${itemId} could not be returned to <@${userId}>.`);
    }
  }
}
