import { describe, expect, it } from 'vitest';
import { RedBlackService, isRedBlackSide } from '../../src/services/RedBlackService.js';
import { GameStateService } from '../../src/services/GameStateService.js';
import { LedgerReason, SessionKind } from '../../src/constants.js';
import {
  ConcurrencyConflictError,
  ForbiddenActionError,
  InsufficientFundsError,
  NotFoundError,
  TransientStoreError,
} from '../../src/lib/errors.js';
import { walletFixture } from '../helpers/fixtures.js';
import { sequence } from '../helpers/memory-store.js';

async function setup(draw: number) {
  const fixture = walletFixture();
  const registry = new GameStateService(fixture.wallet);
  const rounds = new RedBlackService(fixture.wallet, registry, sequence(draw));
  await fixture.wallet.credit('u1', 100, LedgerReason.ADMIN_GRANT);
  return { ...fixture, registry, rounds };
}

describe('RedBlackService', () => {
  it('recognizes the two sides only', () => {
    expect(isRedBlackSide('red')).toBe(true);
    expect(isRedBlackSide('black')).toBe(true);
    expect(isRedBlackSide('green')).toBe(false);
  });

  it('starts a round waiting for a bet and reports the balance', async () => {
    const { rounds, registry } = await setup(0.1);

    const { session, balance } = await rounds.start('u1');

    expect(session.state).toBe('awaiting_bet');
    expect(session.data).toEqual({ side: null, amount: 0 });
    expect(balance).toBe(100);
    registry.resolve(session.sessionId);
  });

  it('replaces a round still waiting for a bet', async () => {
    const { rounds, registry } = await setup(0.1);
    const first = await rounds.start('u1');
    const second = await rounds.start('u1');

    expect(registry.get(first.session.sessionId, SessionKind.REDBLACK)).toBeNull();
    expect(registry.size).toBe(1);
    registry.resolve(second.session.sessionId);
  });

  it('escrows the bet and moves the round in progress', async () => {
    const { rounds, wallet, registry } = await setup(0.1);
    const { session } = await rounds.start('u1');

    const placed = await rounds.placeBet(session.sessionId, 'u1', 'black', 30);

    expect(placed).toBe(session);
    expect(placed.state).toBe('in_progress');
    expect(placed.data).toEqual({ side: 'black', amount: 30 });
    expect(placed.escrow.get('u1')).toBe(30);
    expect(await wallet.getBalance('u1')).toBe(70);
    registry.resolve(session.sessionId);
  });

  it('validates the bet before touching the ledger', async () => {
    const { rounds, registry } = await setup(0.1);
    const { session } = await rounds.start('u1');

    await expect(rounds.placeBet(session.sessionId, 'u1', 'green', 10)).rejects.toThrow('Pick either red or black.');
    await expect(rounds.placeBet(session.sessionId, 'u1', 'red', -1)).rejects.toThrow(
      'The bet must be a positive whole number.'
    );
    await expect(rounds.placeBet(session.sessionId, 'u1', 'red', 101)).rejects.toBeInstanceOf(InsufficientFundsError);
    expect(session.state).toBe('awaiting_bet');
    registry.resolve(session.sessionId);
  });

  it('needs a waiting round to bet on', async () => {
    const { rounds } = await setup(0.1);
    await expect(rounds.placeBet('missing', 'u1', 'red', 10)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('bets only on the round the button belongs to', async () => {
    const { rounds, registry, wallet } = await setup(0.1);
    const first = await rounds.start('u1');
    const second = await rounds.start('u1');

    await expect(rounds.placeBet(first.session.sessionId, 'u1', 'red', 10)).rejects.toBeInstanceOf(NotFoundError);

    expect(second.session.state).toBe('awaiting_bet');
    expect(second.session.data).toEqual({ side: null, amount: 0 });
    expect(await wallet.getBalance('u1')).toBe(100);
    registry.resolve(second.session.sessionId);
  });

  it("rejects a bet on someone else's round", async () => {
    const { rounds, registry } = await setup(0.1);
    const { session } = await rounds.start('u1');

    await expect(rounds.placeBet(session.sessionId, 'u2', 'red', 10)).rejects.toBeInstanceOf(ForbiddenActionError);
    registry.resolve(session.sessionId);
  });

  it('pays double when the draw matches the side', async () => {
    // 0.1 < 0.5 lands red
    const { rounds, wallet } = await setup(0.1);
    const { session } = await rounds.start('u1');
    await rounds.placeBet(session.sessionId, 'u1', 'red', 30);

    const result = await rounds.settle(session.sessionId);

    expect(result).toEqual({ side: 'red', amount: 30, outcome: 'red', won: true, payout: 60, balance: 130 });
    expect(await wallet.getAccount('u1')).toMatchObject({ stats: { redblack: { played: 1, won: 1 } } });
  });

  it('keeps the bet when the draw misses', async () => {
    // 0.7 lands black
    const { rounds, wallet } = await setup(0.7);
    const { session } = await rounds.start('u1');
    await rounds.placeBet(session.sessionId, 'u1', 'red', 30);

    const result = await rounds.settle(session.sessionId);

    expect(result).toEqual({ side: 'red', amount: 30, outcome: 'black', won: false, payout: 0, balance: 70 });
    expect(session.escrow.size).toBe(0);
    expect(await wallet.getAccount('u1')).toMatchObject({ stats: { redblack: { played: 1, won: 0 } } });
  });

  it('settles a round only once', async () => {
    const { rounds, wallet } = await setup(0.1);
    const { session } = await rounds.start('u1');
    await rounds.placeBet(session.sessionId, 'u1', 'red', 30);

    await rounds.settle(session.sessionId);
    await expect(rounds.settle(session.sessionId)).rejects.toThrow('This round has already finished.');
    expect(await wallet.getBalance('u1')).toBe(130);
  });

  it('refuses to settle a round with no bet', async () => {
    const { rounds, registry } = await setup(0.1);
    const { session } = await rounds.start('u1');

    await expect(rounds.settle(session.sessionId)).rejects.toBeInstanceOf(ConcurrencyConflictError);
    registry.resolve(session.sessionId);
  });

  it('returns the bet when the winnings cannot be written', async () => {
    const { rounds, wallet, store, registry } = await setup(0.1);
    const { session } = await rounds.start('u1');
    await rounds.placeBet(session.sessionId, 'u1', 'red', 30);
    store.failNext('set');

    await expect(rounds.settle(session.sessionId)).rejects.toBeInstanceOf(TransientStoreError);

    expect(await wallet.getBalance('u1')).toBe(100);
    expect(session.escrow.size).toBe(0);
    expect(registry.pendingRefunds).toEqual([]);
  });

  it('refunds a placed bet when the round expires unsettled', async () => {
    const { rounds, wallet, registry } = await setup(0.1);
    const { session } = await rounds.start('u1');
    await rounds.placeBet(session.sessionId, 'u1', 'black', 45);

    await registry.expire(session.sessionId);

    expect(await wallet.getBalance('u1')).toBe(100);
    await expect(rounds.settle(session.sessionId)).rejects.toBeInstanceOf(ConcurrencyConflictError);
  });

  it('lets only the player replay', async () => {
    const { rounds, registry } = await setup(0.1);

    await expect(rounds.replay('u1', 'u2')).rejects.toThrow('Only the player of this round can play again.');
    const { session } = await rounds.replay('u1', 'u1');
    expect(session.ownerId).toBe('u1');
    registry.resolve(session.sessionId);
  });

  it('builds alternating reveal frames', async () => {
    const { rounds } = await setup(0.1);
    expect(rounds.revealFrames(3)).toEqual(['red', 'black', 'red']);
    expect(rounds.revealFrames(0)).toEqual([]);
  });
});
