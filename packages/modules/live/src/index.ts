export { ConnectionRegistry, barKey, userKey } from './connection-registry';
export type { ChannelKey, LiveChannel, OrderUpdate } from './connection-registry';
export { Broadcaster, SendTimeoutError, orderMessage } from './broadcaster';
export type { OrderChange, BroadcastResult, BroadcasterOptions } from './broadcaster';
export { LiveSession } from './channel-handler';
export type { Transport, SnapshotEntry, SnapshotLoader, LiveSessionOptions } from './channel-handler';
export { WsTransport, ChannelNotWritableError } from './ws-transport';
export { registerLiveConsumers, handleOrderEvent, LIVE_ORDER_EVENT_TYPES } from './consumers';
