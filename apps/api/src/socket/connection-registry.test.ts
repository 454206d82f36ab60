import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConnectionRegistry, MatchPresenceListener } from './connection-registry';
import { FakeConnection } from '../../test/helpers/fakes';

describe('ConnectionRegistry', () => {
  let registry: ConnectionRegistry;
  let listener: {
    [K in keyof MatchPresenceListener]: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    registry = new ConnectionRegistry({ reconnectWindowMs: 30_000, sendTimeoutMs: 2_000 });
    listener = {
      playerDisconnected: vi.fn(),
      playerReconnected: vi.fn(),
      reconnectWindowExpired: vi.fn(),
    };
    registry.setPresenceListener(listener);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('replaces an older connection for the same player', () => {
    const first = new FakeConnection('c1');
    const second = new FakeConnection('c2');

    registry.bind('alice', first);
    registry.bind('alice', second);

    expect(first.closedWith).toBe('Replaced by a newer connection');
    expect(registry.connectionOf('alice')).toBe(second);
    expect(registry.playerOf('c1')).toBeNull();
    // The stale close event must not unbind the new connection
    expect(registry.unbind('c1')).toBeNull();
    expect(registry.isConnected('alice')).toBe(true);
  });

  it('holds the seat when a player in a match reconnects inside the window', () => {
    registry.bind('alice', new FakeConnection('c1'));
    registry.bind('bob', new FakeConnection('c2'));
    registry.attachMatch(['alice', 'bob'], 'm1');

    expect(registry.unbind('c1')).toBe('alice');
    expect(listener.playerDisconnected).toHaveBeenCalledWith('alice', 'm1');
    expect(registry.isAwaitingReconnect('alice')).toBe(true);

    vi.advanceTimersByTime(20_000);
    registry.bind('alice', new FakeConnection('c3'));

    expect(listener.playerReconnected).toHaveBeenCalledWith('alice', 'm1');
    vi.advanceTimersByTime(20_000);
    expect(listener.reconnectWindowExpired).not.toHaveBeenCalled();
  });

  it('reports an expired window', () => {
    registry.bind('alice', new FakeConnection('c1'));
    registry.attachMatch(['alice'], 'm1');
    registry.unbind('c1');

    vi.advanceTimersByTime(29_999);
    expect(listener.reconnectWindowExpired).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(listener.reconnectWindowExpired).toHaveBeenCalledWith('alice', 'm1');
    expect(registry.isAwaitingReconnect('alice')).toBe(false);
  });

  it('starts the window at match start for a player with no connection', () => {
    registry.bind('alice', new FakeConnection('c1'));
    registry.attachMatch(['alice', 'bob'], 'm1');

    expect(listener.playerDisconnected).toHaveBeenCalledTimes(1);
    expect(listener.playerDisconnected).toHaveBeenCalledWith('bob', 'm1');
    vi.advanceTimersByTime(30_000);
    expect(listener.reconnectWindowExpired).toHaveBeenCalledWith('bob', 'm1');
  });

  it('cancels pending windows when the match is detached', () => {
    registry.attachMatch(['alice', 'bob'], 'm1');
    registry.detachMatch('m1');

    vi.advanceTimersByTime(60_000);
    expect(listener.reconnectWindowExpired).not.toHaveBeenCalled();
    expect(registry.matchOf('alice')).toBeNull();
  });

  it('does not open a window for a player outside any match', () => {
    registry.bind('alice', new FakeConnection('c1'));
    expect(registry.unbind('c1')).toBe('alice');
    expect(listener.playerDisconnected).not.toHaveBeenCalled();
    expect(registry.size()).toBe(0);
  });

  it('sends to online players and reports offline ones', async () => {
    const alice = new FakeConnection('c1');
    registry.bind('alice', alice);

    expect(await registry.sendToPlayer('alice', { type: 'OPPONENT_RECONNECTED', data: { matchId: 'm1' } })).toBe(true);
    expect(await registry.sendToPlayer('bob', { type: 'OPPONENT_RECONNECTED', data: { matchId: 'm1' } })).toBe(false);
    expect(alice.sent).toEqual([{ type: 'OPPONENT_RECONNECTED', data: { matchId: 'm1' } }]);

    const report = await registry.broadcast(['alice', 'bob'], (playerId) => ({
      type: 'OPPONENT_RECONNECTED',
      data: { matchId: `for-${playerId}` },
    }));
    expect(report).toEqual({ delivered: ['alice'], failed: [], offline: ['bob'] });
    expect(alice.sent[1]).toEqual({ type: 'OPPONENT_RECONNECTED', data: { matchId: 'for-alice' } });
  });

  it('closes every connection on shutdown', () => {
    const alice = new FakeConnection('c1');
    registry.bind('alice', alice);
    registry.closeAll('Server shutting down');
    expect(alice.closedWith).toBe('Server shutting down');
    expect(registry.size()).toBe(0);
  });
});
