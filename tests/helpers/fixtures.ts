import { WalletService } from '../../src/services/WalletService.js';
import { CatalogService } from '../../src/services/CatalogService.js';
import type { AuditEntry, RarityTier } from '../../src/lib/types.js';
import { MemoryStore } from './memory-store.js';

export const RARITIES: RarityTier[] = [
  { tag: 'Common', weight: 60, basePrice: 10, volatility: 0.1, color: 0xffffff, emoji: '⚪' },
  { tag: 'Rare', weight: 30, basePrice: 40, volatility: 0.2, color: 0x1e90ff, emoji: '🔵' },
  { tag: 'Legendary', weight: 10, basePrice: 200, volatility: 0.5, color: 0xff0000, emoji: '🔴' },
];

/**
 * Two collections, one case each plus a mixed case
 * `fruit` has no Legendary item
 */
export function testCatalog(): CatalogService {
  return new CatalogService({
    rarities: RARITIES,
    items: [
      { id: 'apple', name: 'Apple', description: 'Crunchy', rarity: 'Common', collection: 'fruit' },
      { id: 'pear', name: 'Pear', description: 'Soft', rarity: 'Common', collection: 'fruit' },
      { id: 'mango', name: 'Mango', description: 'Sweet', rarity: 'Rare', collection: 'fruit' },
      { id: 'bolt', name: 'Bolt', description: 'Steel', rarity: 'Common', collection: 'tools' },
      { id: 'drill', name: 'Drill', description: 'Loud', rarity: 'Rare', collection: 'tools' },
      { id: 'hammer', name: 'Golden Hammer', description: 'Shiny', rarity: 'Legendary', collection: 'tools' },
    ],
    cases: [
      { id: 'fruit-case', name: 'Fruit Case', collections: ['fruit'], price: 50 },
      { id: 'tool-case', name: 'Tool Case', collections: ['tools'], price: 80 },
    ],
  });
}

export interface WalletFixture {
  store: MemoryStore;
  wallet: WalletService;
  audit: AuditEntry[];
  notices: string[];
}

export function walletFixture(store = new MemoryStore()): WalletFixture {
  const audit: AuditEntry[] = [];
  const notices: string[] = [];
  const wallet = new WalletService(store, {
    audit: { record: (entry) => audit.push(entry) },
    notifier: { notify: (message) => notices.push(message) },
  });
  return { store, wallet, audit, notices };
}

/** Sum of every stored balance */
export async function totalCredits(wallet: WalletService, userIds: string[]): Promise<number> {
  let total = 0;
  for (const userId of userIds) {
    total += (await wallet.getAccount(userId)).balance;
  }
  return total;
}
