export { EventEnvelopeSchema } from './events';
export type { EventEnvelope } from './events';
export type { ApiResponse, ApiError, ApiResult } from './api';
