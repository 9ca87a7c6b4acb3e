/**
 * Error types for the broker, coded after gRPC status codes.
 */

/**
 * Status codes carried by every broker error.
 * https://grpc.io/docs/guides/status-codes/
 */
export enum ErrorCode {
  INVALID_ARGUMENT = 3,
  NOT_FOUND = 5,
  ALREADY_EXISTS = 6,
  UNIMPLEMENTED = 12,
  INTERNAL = 13
}

/**
 * Base error class for all broker errors.
 */
export class BrokerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'BrokerError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Channel not registered. Code: 5
 */
export class ChannelNotFoundError extends BrokerError {
  constructor(readonly channel: string) {
    super(`Channel ${channel} does not exist`, ErrorCode.NOT_FOUND);
    this.name = 'ChannelNotFoundError';
  }
}

/**
 * Channel name already registered. Code: 6
 */
export class AlreadyExistsError extends BrokerError {
  constructor(readonly channel: string) {
    super(`Channel ${channel} already exists`, ErrorCode.ALREADY_EXISTS);
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Router received an operation it does not know. Code: 12
 */
export class UnknownOperationError extends BrokerError {
  constructor(readonly operation: string) {
    super(`Unknown operation: ${operation}`, ErrorCode.UNIMPLEMENTED);
    this.name = 'UnknownOperationError';
  }
}

/**
 * Invalid argument error. Code: 3
 */
export class InvalidArgumentError extends BrokerError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.INVALID_ARGUMENT, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Internal error. Code: 13
 */
export class InternalError extends BrokerError {
  constructor(message: string) {
    super(message, ErrorCode.INTERNAL);
    this.name = 'InternalError';
  }
}
