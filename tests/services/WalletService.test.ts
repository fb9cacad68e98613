import { describe, expect, it } from 'vitest';
import { emptyAccount, parseAccount, serializeAccount } from '../../src/services/WalletService.js';
import { GameKind, LedgerReason } from '../../src/constants.js';
import { InsufficientFundsError, TransientStoreError, ValidationError } from '../../src/lib/errors.js';
import { totalCredits, walletFixture } from '../helpers/fixtures.js';

describe('WalletService', () => {
  describe('reads', () => {
    it('treats a missing account as an empty one', async () => {
      const { wallet, store } = walletFixture();

      expect(await wallet.getAccount('u1')).toEqual(emptyAccount('u1'));
      expect(await wallet.getBalance('u1')).toBe(0);
      expect(store.data.size).toBe(0);
    });

    it('reports 0 when the store is unavailable', async () => {
      const { wallet, store } = walletFixture();
      await wallet.credit('u1', 100, LedgerReason.ADMIN_GRANT);
      store.failNext('get');

      expect(await wallet.getBalance('u1')).toBe(0);
      expect(await wallet.getBalance('u1')).toBe(100);
    });

    it('surfaces store failures on strict reads', async () => {
      const { wallet, store } = walletFixture();
      store.failNext('get');

      await expect(wallet.getAccount('u1')).rejects.toBeInstanceOf(TransientStoreError);
    });

    it('treats an unreadable record as a store failure rather than a zero balance', async () => {
      const { wallet, store } = walletFixture();
      store.seed('user:u1', '{"id":"u1","balance":-5}');

      await expect(wallet.getAccount('u1')).rejects.toBeInstanceOf(TransientStoreError);
      await expect(wallet.credit('u1', 10, LedgerReason.ADMIN_GRANT)).rejects.toBeInstanceOf(TransientStoreError);
      expect(store.peek('user:u1')).toBe('{"id":"u1","balance":-5}');
    });
  });

  describe('adjust', () => {
    it('floors the balance at zero', async () => {
      const { wallet, audit } = walletFixture();
      await wallet.adjust('u1', 30, LedgerReason.ADMIN_GRANT);

      expect(await wallet.adjust('u1', -50, LedgerReason.ADMIN_GRANT)).toBe(0);
      expect(audit.map((entry) => [entry.oldBalance, entry.newBalance, entry.delta])).toEqual([
        [0, 30, 30],
        [30, 0, -30],
      ]);
    });

    it('clamps after every step of a series rather than once on the sum', async () => {
      const { wallet, audit } = walletFixture();

      for (const delta of [10, -30, 5, -2]) {
        await wallet.adjust('u1', delta, LedgerReason.ADMIN_GRANT);
      }

      expect(await wallet.getBalance('u1')).toBe(3);
      expect(audit.map((entry) => entry.delta)).toEqual([10, -10, 5, -2]);
    });

    it('writes no audit entry for a change that leaves the balance unchanged', async () => {
      const { wallet, audit } = walletFixture();

      expect(await wallet.adjust('u1', -10, LedgerReason.ADMIN_GRANT)).toBe(0);
      expect(audit).toEqual([]);
    });

    it('rejects fractional amounts', async () => {
      const { wallet } = walletFixture();
      await expect(wallet.adjust('u1', 1.5, LedgerReason.ADMIN_GRANT)).rejects.toThrow('Amount must be a whole number.');
    });

    it('serializes concurrent adjustments of one account', async () => {
      const { wallet } = walletFixture();
      await Promise.all(Array.from({ length: 20 }, () => wallet.credit('u1', 5, LedgerReason.VOICE_REWARD)));

      expect(await wallet.getBalance('u1')).toBe(100);
    });

    it('reports a lost write to the operator and leaves the balance as it was', async () => {
      const { wallet, store, notices, audit } = walletFixture();
      await wallet.credit('u1', 40, LedgerReason.ADMIN_GRANT);
      store.failNext('set');

      await expect(wallet.credit('u1', 10, LedgerReason.DUEL_WON)).rejects.toBeInstanceOf(TransientStoreError);
      expect(notices).toEqual(['🚨 Ledger write lost for <@u1> (duel_won, 40 -> 50). The change was not applied.']);
      expect(audit).toHaveLength(1);
      expect(await wallet.getBalance('u1')).toBe(40);
    });
  });

  describe('setBalance', () => {
    it('sets an absolute balance and audits the difference', async () => {
      const { wallet, audit } = walletFixture();
      await wallet.credit('u1', 70, LedgerReason.ADMIN_GRANT);

      expect(await wallet.setBalance('u1', 25, LedgerReason.ADMIN_SET)).toBe(25);
      expect(audit.at(-1)).toMatchObject({ oldBalance: 70, newBalance: 25, delta: -45, reason: LedgerReason.ADMIN_SET });
    });

    it('rejects a negative or fractional target', async () => {
      const { wallet } = walletFixture();

      await expect(wallet.setBalance('u1', -1, LedgerReason.ADMIN_SET)).rejects.toThrow(
        'Balance must be a non-negative whole number.'
      );
      await expect(wallet.setBalance('u1', 2.5, LedgerReason.ADMIN_SET)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('debit', () => {
    it('takes credits the balance covers', async () => {
      const { wallet } = walletFixture();
      await wallet.credit('u1', 100, LedgerReason.ADMIN_GRANT);

      expect(await wallet.debit('u1', 100, LedgerReason.DUEL_ESCROW)).toBe(0);
    });

    it('rejects an overdraft without touching the account', async () => {
      const { wallet, audit } = walletFixture();
      await wallet.credit('u1', 20, LedgerReason.ADMIN_GRANT);

      const error = await wallet.debit('u1', 21, LedgerReason.DUEL_ESCROW).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InsufficientFundsError);
      expect(error).toMatchObject({ balance: 20, required: 21 });
      expect(await wallet.getBalance('u1')).toBe(20);
      expect(audit).toHaveLength(1);
    });

    it('rejects non-positive amounts', async () => {
      const { wallet } = walletFixture();
      await expect(wallet.debit('u1', 0, LedgerReason.DUEL_ESCROW)).rejects.toBeInstanceOf(ValidationError);
      await expect(wallet.credit('u1', -3, LedgerReason.DUEL_WON)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('transfer', () => {
    it('moves credits between users and conserves the total', async () => {
      const { wallet, audit } = walletFixture();
      await wallet.credit('alice', 100, LedgerReason.ADMIN_GRANT);

      const result = await wallet.transfer('alice', 'bob', 35);

      expect(result).toEqual({ senderBalance: 65, receiverBalance: 35 });
      expect(await totalCredits(wallet, ['alice', 'bob'])).toBe(100);
      expect(audit.slice(1).map((entry) => entry.reason)).toEqual([
        LedgerReason.TRANSFER_SENT,
        LedgerReason.TRANSFER_RECEIVED,
      ]);
    });

    it('rejects transfers to oneself', async () => {
      const { wallet } = walletFixture();
      await wallet.credit('alice', 100, LedgerReason.ADMIN_GRANT);

      await expect(wallet.transfer('alice', 'alice', 10)).rejects.toThrow('You cannot transfer credits to yourself.');
      expect(await wallet.getBalance('alice')).toBe(100);
    });

    it('rejects a transfer the sender cannot cover', async () => {
      const { wallet } = walletFixture();
      await wallet.credit('alice', 5, LedgerReason.ADMIN_GRANT);

      await expect(wallet.transfer('alice', 'bob', 10)).rejects.toBeInstanceOf(InsufficientFundsError);
      expect(await wallet.getBalance('bob')).toBe(0);
    });

    it('returns the debit when crediting the receiver fails', async () => {
      const { wallet, store, notices } = walletFixture();
      await wallet.credit('alice', 100, LedgerReason.ADMIN_GRANT);
      store.failWhen = (operation, key) => operation === 'set' && key === 'user:bob';

      await expect(wallet.transfer('alice', 'bob', 30)).rejects.toBeInstanceOf(TransientStoreError);

      expect(await wallet.getBalance('alice')).toBe(100);
      expect(notices).toContain('⚠️ transfer alice -> bob failed midway; 30 credits returned to <@alice>.');
    });
  });

  describe('compensate', () => {
    it('raises an operator notice when the credits cannot be returned', async () => {
      const { wallet, store, notices } = walletFixture();
      store.failWhen = (operation) => operation === 'set';

      expect(await wallet.compensate('u1', 25, 'Case purchase by u1')).toBe(false);
      expect(notices.at(-1)).toBe(
        '🚨 Case purchase by u1 failed midway and 25 credits owed to <@u1> could not be returned.'
      );
    });
  });

  describe('recordGame', () => {
    it('counts games and wins without touching the balance or the audit trail', async () => {
      const { wallet, audit } = walletFixture();
      await wallet.credit('u1', 10, LedgerReason.ADMIN_GRANT);

      await wallet.recordGame('u1', GameKind.DUEL, true);
      await wallet.recordGame('u1', GameKind.DUEL, false);
      await wallet.recordGame('u1', GameKind.REDBLACK, false);

      expect(await wallet.getAccount('u1')).toEqual({
        id: 'u1',
        balance: 10,
        stats: { duel: { played: 2, won: 1 }, redblack: { played: 1, won: 0 } },
      });
      expect(audit).toHaveLength(1);
    });
  });

  describe('record format', () => {
    it('reads records written before stats existed', () => {
      expect(parseAccount('{"id":"u1","balance":7}')).toEqual({ id: 'u1', balance: 7, stats: {} });
    });

    it('writes id, balance and stats', () => {
      expect(serializeAccount({ id: 'u1', balance: 3, stats: { duel: { played: 1, won: 1 } } })).toBe(
        '{"id":"u1","balance":3,"stats":{"duel":{"played":1,"won":1}}}'
      );
    });

    it('rejects malformed JSON as a store failure', () => {
      expect(() => parseAccount('not json')).toThrow(TransientStoreError);
    });
  });
});
