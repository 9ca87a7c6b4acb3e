/**
 * Message types for publishing and consuming.
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Message payload. A JSON object the broker stores and returns untouched.
 */
export type Payload = { [key: string]: JsonValue };

/**
 * A message handed to a consumer.
 * The payload is a copy; mutating it does not affect the broker.
 */
export interface DeliveredMessage {
  /** Broker-assigned message ID. */
  readonly id: string;
  /** Message payload. */
  readonly payload: Payload;
}

/**
 * Result of a consume call. `null` means the ready queue was empty.
 */
export type ConsumeResult = DeliveredMessage | null;

/**
 * Strategy producing message IDs. Must not repeat while a message is alive.
 */
export type IdGenerator = () => string;
