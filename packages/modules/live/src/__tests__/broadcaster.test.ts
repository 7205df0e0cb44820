import { describe, it, expect, beforeEach } from 'vitest';
import { ConnectionRegistry, barKey, userKey } from '../connection-registry';
import { Broadcaster } from '../broadcaster';
import { FakeChannel, change } from './fakes';

describe('Broadcaster', () => {
  let registry: ConnectionRegistry;
  let broadcaster: Broadcaster;

  beforeEach(() => {
    registry = new ConnectionRegistry();
    broadcaster = new Broadcaster(registry, { sendTimeoutMs: 50 });
  });

  it('sends one message to each bar channel and each customer channel', async () => {
    const bar1 = new FakeChannel('bar-1');
    const bar2 = new FakeChannel('bar-2');
    const phone = new FakeChannel('phone');
    registry.register(barKey(1), bar1);
    registry.register(barKey(1), bar2);
    registry.register(userKey(42), phone);

    const result = await broadcaster.broadcastOrderUpdate(change(100, 2, 'ACCEPTED'));

    expect(result).toEqual({ delivered: 3, failed: 0 });
    const expected = JSON.stringify({
      type: 'order',
      order: { id: 100, status: 'ACCEPTED', bar_id: 1, customer_id: 42 },
    });
    expect(bar1.messages).toEqual([expected]);
    expect(bar2.messages).toEqual([expected]);
    expect(phone.messages).toEqual([expected]);
  });

  it('does not reach other bars or other customers', async () => {
    const otherBar = new FakeChannel('other-bar');
    const otherUser = new FakeChannel('other-user');
    registry.register(barKey(2), otherBar);
    registry.register(userKey(43), otherUser);

    const result = await broadcaster.broadcastOrderUpdate(change(100, 1, 'PLACED'));

    expect(result).toEqual({ delivered: 0, failed: 0 });
    expect(otherBar.messages).toEqual([]);
    expect(otherUser.messages).toEqual([]);
  });

  it('only targets the bar when the order has no customer', async () => {
    const bar = new FakeChannel('bar');
    registry.register(barKey(1), bar);

    const result = await broadcaster.broadcastOrderUpdate(change(100, 1, 'PLACED', { customerId: null }));

    expect(result).toEqual({ delivered: 1, failed: 0 });
  });

  it('drops a failing channel and still delivers to the others', async () => {
    const healthy = new FakeChannel('healthy');
    const broken = new FakeChannel('broken');
    broken.failWith = new Error('socket is not open');
    registry.register(barKey(1), healthy);
    registry.register(barKey(1), broken);

    const first = await broadcaster.broadcastOrderUpdate(change(100, 2, 'ACCEPTED'));
    const second = await broadcaster.broadcastOrderUpdate(change(100, 3, 'READY'));

    expect(first).toEqual({ delivered: 1, failed: 1 });
    expect(second).toEqual({ delivered: 1, failed: 0 });
    expect(broken.closedWith).toEqual({ code: 1011, reason: 'delivery failed' });
    expect(broken.messages).toEqual([]);
    expect(healthy.messages).toHaveLength(2);
    expect(registry.channelsFor(barKey(1))).toEqual([healthy]);
  });

  it('treats a send that never completes as failed', async () => {
    const slow = new FakeChannel('slow');
    slow.hang = true;
    registry.register(barKey(1), slow);

    const result = await broadcaster.broadcastOrderUpdate(change(100, 2, 'ACCEPTED'));

    expect(result).toEqual({ delivered: 0, failed: 1 });
    expect(registry.size()).toBe(0);
  });

  it('skips updates older than one already broadcast', async () => {
    const bar = new FakeChannel('bar');
    registry.register(barKey(1), bar);

    await broadcaster.broadcastOrderUpdate(change(100, 3, 'READY'));
    const stale = await broadcaster.broadcastOrderUpdate(change(100, 2, 'ACCEPTED'));
    const duplicate = await broadcaster.broadcastOrderUpdate(change(100, 3, 'READY'));

    expect(stale).toEqual({ delivered: 0, failed: 0 });
    expect(duplicate).toEqual({ delivered: 0, failed: 0 });
    expect(bar.messages).toHaveLength(1);
  });

  it('stops tracking orders that reached a terminal state', async () => {
    await broadcaster.broadcastOrderUpdate(change(100, 2, 'ACCEPTED'));
    await broadcaster.broadcastOrderUpdate(change(101, 1, 'PLACED'));
    expect(broadcaster.trackedOrders()).toBe(2);

    await broadcaster.broadcastOrderUpdate(change(100, 4, 'COMPLETED'));
    expect(broadcaster.trackedOrders()).toBe(1);
  });

  it('drops a late update for an order that already reached a terminal state', async () => {
    const bar = new FakeChannel('bar');
    registry.register(barKey(1), bar);

    const canceled = await broadcaster.broadcastOrderUpdate(change(100, 3, 'CANCELED'));
    const late = await broadcaster.broadcastOrderUpdate(change(100, 2, 'ACCEPTED'));

    expect(canceled).toEqual({ delivered: 1, failed: 0 });
    expect(late).toEqual({ delivered: 0, failed: 0 });
    expect(bar.messages).toEqual([
      JSON.stringify({
        type: 'order',
        order: { id: 100, status: 'CANCELED', bar_id: 1, customer_id: 42 },
      }),
    ]);
  });

  it('forgets the oldest terminal orders past its limit', async () => {
    const bounded = new Broadcaster(registry, { sendTimeoutMs: 50, maxFinishedOrders: 2 });
    const bar = new FakeChannel('bar');
    registry.register(barKey(1), bar);

    await bounded.broadcastOrderUpdate(change(100, 3, 'COMPLETED'));
    await bounded.broadcastOrderUpdate(change(101, 3, 'COMPLETED'));
    await bounded.broadcastOrderUpdate(change(102, 3, 'COMPLETED'));
    expect(bounded.finishedOrders()).toBe(2);

    const forgotten = await bounded.broadcastOrderUpdate(change(100, 2, 'READY'));
    const remembered = await bounded.broadcastOrderUpdate(change(102, 2, 'READY'));

    expect(forgotten).toEqual({ delivered: 1, failed: 0 });
    expect(remembered).toEqual({ delivered: 0, failed: 0 });
  });
});
