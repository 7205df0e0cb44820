import { describe, it, expect } from 'vitest';
import { ConnectionRegistry, barKey, userKey } from '../connection-registry';
import { FakeChannel } from './fakes';

describe('ConnectionRegistry', () => {
  it('builds bar and user keys', () => {
    expect(barKey(3)).toBe('bar:3');
    expect(userKey(42)).toBe('user:42');
  });

  it('keeps several channels per key', () => {
    const registry = new ConnectionRegistry();
    const a = new FakeChannel('a');
    const b = new FakeChannel('b');
    registry.register(barKey(1), a);
    registry.register(barKey(1), b);
    registry.register(userKey(42), a);

    expect(registry.channelsFor(barKey(1))).toEqual([a, b]);
    expect(registry.size()).toBe(3);
  });

  it('registering the same channel twice is idempotent', () => {
    const registry = new ConnectionRegistry();
    const a = new FakeChannel('a');
    registry.register(barKey(1), a);
    registry.register(barKey(1), a);
    expect(registry.size()).toBe(1);
  });

  it('returns a snapshot that later changes do not affect', () => {
    const registry = new ConnectionRegistry();
    const a = new FakeChannel('a');
    registry.register(barKey(1), a);

    const snapshot = registry.channelsFor(barKey(1));
    registry.unregister(barKey(1), a);

    expect(snapshot).toEqual([a]);
    expect(registry.channelsFor(barKey(1))).toEqual([]);
  });

  it('treats unregistering an unknown channel as a no-op', () => {
    const registry = new ConnectionRegistry();
    const a = new FakeChannel('a');
    registry.register(barKey(1), a);

    expect(registry.unregister(barKey(1), new FakeChannel('stranger'))).toBe(false);
    expect(registry.unregister(barKey(2), a)).toBe(false);
    expect(registry.channelsFor(barKey(1))).toEqual([a]);
  });

  it('forgets a key once its last channel leaves', () => {
    const registry = new ConnectionRegistry();
    const a = new FakeChannel('a');
    registry.register(userKey(42), a);

    expect(registry.unregister(userKey(42), a)).toBe(true);
    expect(registry.keys()).toEqual([]);
    expect(registry.size()).toBe(0);
  });

  it('closes every channel on shutdown', () => {
    const registry = new ConnectionRegistry();
    const a = new FakeChannel('a');
    const b = new FakeChannel('b');
    registry.register(barKey(1), a);
    registry.register(userKey(42), b);

    registry.closeAll();

    expect(a.closedWith).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(b.closedWith).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(registry.size()).toBe(0);
  });
});
