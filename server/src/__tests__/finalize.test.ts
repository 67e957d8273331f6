import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { StoreFinalizer, type FinishedGame } from '../finalize';
import { silentLogger } from '../logger';
import { SqliteStore } from '../store';

const game = (over: Partial<FinishedGame> = {}): FinishedGame => ({
  roomId: 'R1',
  result: 'white',
  reason: 'checkmate',
  moves: ['e2e4', 'f7f6', 'd2d4', 'g7g5', 'd1h5'],
  createdAt: new Date('2026-01-01T00:00:00.000Z'),
  finishedAt: new Date('2026-01-01T00:05:00.000Z'),
  ...over,
});

describe('StoreFinalizer', () => {
  let store: SqliteStore;
  let finalizer: StoreFinalizer;
  let alice: number;
  let bob: number;

  beforeEach(() => {
    store = new SqliteStore(':memory:');
    finalizer = new StoreFinalizer(store, silentLogger);
    alice = store.createUser('alice', 'h');
    bob = store.createUser('bob', 'h');
  });

  afterEach(() => {
    store.close();
  });

  test('records the game and rates both players', () => {
    const outcome = finalizer.finalize(game({ whiteUserId: alice, blackUserId: bob }));

    expect(outcome.persisted).toBe(true);
    expect(store.getUser(alice)).toEqual({ rating: 1216, wins: 1, losses: 0, draws: 0 });
    expect(store.getUser(bob)).toEqual({ rating: 1184, wins: 0, losses: 1, draws: 0 });
    expect(store.gamesForRoom('R1')).toEqual([
      expect.objectContaining({
        whiteUserId: alice,
        blackUserId: bob,
        result: 'white',
        reason: 'checkmate',
        moves: 'e2e4 f7f6 d2d4 g7g5 d1h5',
        createdAt: '2026-01-01T00:00:00.000Z',
        finishedAt: '2026-01-01T00:05:00.000Z',
      }),
    ]);
  });

  test('records a draw for both players', () => {
    finalizer.finalize(game({ whiteUserId: alice, blackUserId: bob, result: 'draw', reason: 'stalemate' }));

    expect(store.getUser(alice)).toEqual({ rating: 1200, wins: 0, losses: 0, draws: 1 });
    expect(store.getUser(bob)).toEqual({ rating: 1200, wins: 0, losses: 0, draws: 1 });
  });

  test('records but does not rate a game with an anonymous seat', () => {
    const outcome = finalizer.finalize(game({ whiteUserId: alice }));

    expect(outcome).toEqual({ persisted: true, gameId: 1, ratings: undefined });
    expect(store.getUser(alice)).toEqual({ rating: 1200, wins: 0, losses: 0, draws: 0 });
    expect(store.gamesForRoom('R1')[0]).toMatchObject({ whiteUserId: alice, blackUserId: null });
  });

  test('does not rate an account playing itself or an unknown account', () => {
    finalizer.finalize(game({ whiteUserId: alice, blackUserId: alice }));
    finalizer.finalize(game({ whiteUserId: alice, blackUserId: 999 }));

    expect(store.getUser(alice)).toEqual({ rating: 1200, wins: 0, losses: 0, draws: 0 });
    expect(store.gamesForRoom('R1')).toHaveLength(2);
  });

  test('records a seat with no account behind it as anonymous', () => {
    const outcome = finalizer.finalize(game({ whiteUserId: 424242, blackUserId: bob, result: 'black' }));

    expect(outcome).toEqual({ persisted: true, gameId: 1, ratings: undefined });
    expect(store.gamesForRoom('R1')).toEqual([
      expect.objectContaining({ whiteUserId: null, blackUserId: bob, result: 'black' }),
    ]);
    expect(store.getUser(bob)).toEqual({ rating: 1200, wins: 0, losses: 0, draws: 0 });
  });

  test('reports a storage failure instead of throwing', () => {
    store.close();

    const outcome = finalizer.finalize(game({ whiteUserId: alice, blackUserId: bob }));

    expect(outcome.persisted).toBe(false);
    if (!outcome.persisted) expect(outcome.error).toBeInstanceOf(Error);
    store = new SqliteStore(':memory:');
  });
});
