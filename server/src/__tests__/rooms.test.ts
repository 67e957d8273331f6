import { describe, expect, test } from '@jest/globals';
import { RoomRegistry } from '../rooms';
import { chessRules } from '../rules';

describe('RoomRegistry', () => {
  test('returns the same room for the same id', () => {
    const registry = new RoomRegistry(chessRules);
    const first = registry.getOrCreate('R1');

    expect(registry.getOrCreate('R1')).toBe(first);
    expect(registry.get('R1')).toBe(first);
    expect(registry.size).toBe(1);
  });

  test('keeps rooms with different ids apart', () => {
    const registry = new RoomRegistry(chessRules);
    const a = registry.getOrCreate('A');
    const b = registry.getOrCreate('B');
    a.join({ connectionId: 'x', preferred: 'w' });
    a.applyMove('x', 'e2e4');

    expect(a).not.toBe(b);
    expect(b.moves).toEqual([]);
    expect(registry.get('C')).toBeUndefined();
  });

  test('lists room summaries', () => {
    const registry = new RoomRegistry(chessRules, () => new Date('2026-03-01T00:00:00.000Z'));
    const room = registry.getOrCreate('R1');
    room.join({ connectionId: 'x', preferred: 'b' });
    room.join({ connectionId: 'y', preferred: 'any' });
    room.join({ connectionId: 'z', preferred: 'any' });

    expect(registry.list()).toEqual([
      {
        id: 'R1',
        phase: 'active',
        white: true,
        black: true,
        connections: 3,
        moves: 0,
        createdAt: '2026-03-01T00:00:00.000Z',
      },
    ]);
  });
});
