import { fetchBarOrders, fetchCustomerCurrentOrders } from '@barflow/module-orders';
import type { OrderView } from '@barflow/module-orders';
import type { SnapshotLoader, SnapshotEntry } from '@barflow/module-live';
import type { ChannelTarget } from './channel-target';

function toEntry(view: OrderView): SnapshotEntry {
  return { orderId: view.order.id, version: view.version, order: view.order };
}

/** Loads the current (non-terminal, unarchived) orders a new channel starts from. */
export function snapshotLoaderFor(target: ChannelTarget): SnapshotLoader {
  return async () => {
    const views =
      target.kind === 'bar'
        ? await fetchBarOrders(target.barId, 'current')
        : await fetchCustomerCurrentOrders(target.userId);
    return views.map(toEntry);
  };
}
