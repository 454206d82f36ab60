import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ServerMessage } from '@triviaduel/shared-types';
import { deliverAll, sendWithTimeout, SendTimeoutError } from './broadcaster';
import { FakeConnection } from '../../test/helpers/fakes';

const message: ServerMessage = { type: 'OPPONENT_RECONNECTED', data: { matchId: 'm1' } };

describe('broadcaster', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects a send that outlives the timeout', async () => {
    const slow = new FakeConnection('slow', { delayMs: 5_000 });
    const pending = sendWithTimeout(slow, message, 2_000);
    const assertion = expect(pending).rejects.toBeInstanceOf(SendTimeoutError);

    await vi.advanceTimersByTimeAsync(2_000);
    await assertion;
  });

  it('delivers to fast connections without waiting on a slow one', async () => {
    const fast = new FakeConnection('fast');
    const slow = new FakeConnection('slow', { delayMs: 10_000 });

    const pending = deliverAll(
      [
        { playerId: 'alice', connection: slow },
        { playerId: 'bob', connection: fast },
      ],
      message,
      2_000
    );

    // bob's send resolves immediately
    await vi.advanceTimersByTimeAsync(0);
    expect(fast.sent).toEqual([message]);

    await vi.advanceTimersByTimeAsync(2_000);
    const report = await pending;
    expect(report).toEqual({ delivered: ['bob'], failed: ['alice'], offline: [] });
    expect(slow.sent).toEqual([]);
  });

  it('separates offline players from failed sends', async () => {
    const broken = new FakeConnection('broken', { fail: true });

    const report = await deliverAll(
      [
        { playerId: 'alice', connection: broken },
        { playerId: 'bob', connection: null },
      ],
      message,
      2_000
    );

    expect(report).toEqual({ delivered: [], failed: ['alice'], offline: ['bob'] });
  });

  it('builds a per-player payload', async () => {
    const alice = new FakeConnection('a');
    const bob = new FakeConnection('b');

    await deliverAll(
      [
        { playerId: 'alice', connection: alice },
        { playerId: 'bob', connection: bob },
      ],
      (playerId) => ({ type: 'OPPONENT_RECONNECTED', data: { matchId: `m-${playerId}` } }),
      2_000
    );

    expect(alice.sent[0]).toEqual({ type: 'OPPONENT_RECONNECTED', data: { matchId: 'm-alice' } });
    expect(bob.sent[0]).toEqual({ type: 'OPPONENT_RECONNECTED', data: { matchId: 'm-bob' } });
  });
});
