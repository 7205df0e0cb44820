export { requestContext, getRequestContext } from './auth/context';
export type { RequestContext } from './auth/context';
export type { Actor } from './auth/actor';
export { isSuperAdmin, isStaffOf, isBarAdminOf } from './auth/actor';
export { verifyAccessToken, signAccessToken, extractBearerToken } from './auth/token';
export type { EventHandler, EventBus, DeadLetter } from './events';
export {
  InMemoryEventBus,
  buildEvent,
  buildEventFromContext,
  publishWithEvents,
  getEventBus,
  setEventBus,
  initializeEventSystem,
  shutdownEventSystem,
} from './events';
export type { FinanceApi } from './helpers/finance-api';
export { getFinanceApi, setFinanceApi } from './helpers/finance-api';
export type { WalletApi } from './helpers/wallet-api';
export { getWalletApi, setWalletApi } from './helpers/wallet-api';
export type { ServerConfig } from './config';
export { loadServerConfig, getServerConfig, ConfigError } from './config';
export { logger, log, setLogLevel, errorFields } from './observability/logger';
export type { Logger, LogLevel, LogEntry } from './observability/logger';
