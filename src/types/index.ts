/**
 * Main type exports for the broker.
 * All public types are re-exported from this file.
 */

// Error types
export {
  ErrorCode,
  BrokerError,
  ChannelNotFoundError,
  AlreadyExistsError,
  UnknownOperationError,
  InvalidArgumentError,
  InternalError
} from './errors';

// Message types
export type {
  JsonValue,
  Payload,
  DeliveredMessage,
  ConsumeResult,
  IdGenerator
} from './message';

// Channel types
export type { ChannelStats, ChannelStatsMap } from './channel';

// Broker types
export type {
  MissingChannelPolicy,
  RegistryOptions,
  BrokerOptions,
  OperationName,
  RegisterRequest,
  SendRequest,
  ReadRequest,
  ConfirmRequest,
  PurgeRequest,
  StatsRequest,
  OperationRequests,
  WireChannelStats,
  BrokerResponse
} from './broker';
export { DEFAULT_REGISTRY_OPTIONS } from './broker';
