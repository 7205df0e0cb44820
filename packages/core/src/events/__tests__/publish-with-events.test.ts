import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AppError, PersistenceFailureError } from '@barflow/shared';
import type { EventEnvelope } from '@barflow/shared';

const { mockTx, mockTransaction, mockGuardedQuery, mockGuardedTransaction } = vi.hoisted(() => {
  const mockTx = { execute: vi.fn() };
  const mockTransaction = vi.fn();
  const mockGuardedQuery = vi.fn();
  const mockGuardedTransaction = vi.fn((_op: string, fn: () => Promise<unknown>) => fn());
  return { mockTx, mockTransaction, mockGuardedQuery, mockGuardedTransaction };
});

function sqlText(strings: TemplateStringsArray, ...values: unknown[]): string {
  return strings.reduce((text, part, i) => text + part + (i < values.length ? String(values[i]) : ''), '');
}
sqlText.raw = (value: string) => value;

vi.mock('@barflow/db', () => ({
  db: { transaction: mockTransaction },
  sql: sqlText,
  guardedQuery: mockGuardedQuery,
  guardedTransaction: mockGuardedTransaction,
  getPoolGuardSettings: () => ({ concurrency: 10, queryTimeoutMs: 15000, queueTimeoutMs: 5000 }),
}));

import { publishWithEvents } from '../publish-with-events';
import { InMemoryEventBus } from '../in-memory-bus';
import { setEventBus } from '../index';
import { buildEvent } from '../build-event';

function placedEvent(orderId: number): EventEnvelope {
  return buildEvent({ eventType: 'orders.order.placed.v1', barId: 1, data: { orderId } });
}

describe('publishWithEvents', () => {
  let bus: InMemoryEventBus;
  const delivered: unknown[] = [];

  beforeEach(async () => {
    vi.clearAllMocks();
    delivered.length = 0;
    mockTransaction.mockImplementation(async (fn: (tx: unknown) => Promise<unknown>) => fn(mockTx));
    mockTx.execute.mockResolvedValue([]);
    bus = new InMemoryEventBus();
    bus.subscribe('orders.order.placed.v1', async (event) => {
      delivered.push(event.data.orderId);
    });
    await bus.start();
    setEventBus(bus);
  });

  it('returns the result and publishes events after the transaction resolves', async () => {
    const order: string[] = [];
    mockTransaction.mockImplementation(async (fn: (tx: unknown) => Promise<unknown>) => {
      const out = await fn(mockTx);
      order.push('commit');
      return out;
    });
    bus.subscribe('orders.order.placed.v1', async () => {
      order.push('publish');
    });

    const result = await publishWithEvents('checkout', async () => ({
      result: 'ok',
      events: [placedEvent(1), placedEvent(2)],
    }));

    expect(result).toBe('ok');
    expect(delivered).toEqual([1, 2]);
    expect(order).toEqual(['commit', 'publish', 'publish']);
  });

  it('bounds the transaction inside Postgres', async () => {
    await publishWithEvents('checkout', async () => ({ result: null, events: [] }));
    expect(mockTx.execute.mock.calls.map(([query]) => query)).toEqual([
      'SET LOCAL statement_timeout = 15000',
      'SET LOCAL idle_in_transaction_session_timeout = 15000',
    ]);
  });

  it('takes a pool slot without a client-side timeout race', async () => {
    await publishWithEvents('checkout', async () => ({ result: 'ok', events: [] }));
    expect(mockGuardedTransaction).toHaveBeenCalledOnce();
    expect(mockGuardedTransaction.mock.calls[0]?.[0]).toBe('checkout');
    expect(mockGuardedQuery).not.toHaveBeenCalled();
  });

  it('reports a slow commit as committed and publishes its events', async () => {
    mockTransaction.mockImplementation(async (fn: (tx: unknown) => Promise<unknown>) => {
      const out = await fn(mockTx);
      await new Promise((resolve) => setTimeout(resolve, 30));
      return out;
    });

    const result = await publishWithEvents('checkout', async () => ({
      result: 'committed',
      events: [placedEvent(7)],
    }));

    expect(result).toBe('committed');
    expect(delivered).toEqual([7]);
  });

  it('passes domain errors through and publishes nothing', async () => {
    class EmptyThing extends AppError {
      constructor() {
        super('EMPTY_THING', 'nothing here', 400);
      }
    }
    await expect(
      publishWithEvents('checkout', async () => {
        throw new EmptyThing();
      }),
    ).rejects.toBeInstanceOf(EmptyThing);
    expect(delivered).toEqual([]);
  });

  it('wraps driver failures in PersistenceFailureError', async () => {
    const driverError = new Error('connection terminated');
    mockTransaction.mockRejectedValueOnce(driverError);

    const err = await publishWithEvents('checkout', async () => ({
      result: null,
      events: [placedEvent(1)],
    })).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PersistenceFailureError);
    expect(err).toMatchObject({ code: 'PERSISTENCE_FAILURE', statusCode: 503, cause: driverError });
    expect(delivered).toEqual([]);
  });
});
