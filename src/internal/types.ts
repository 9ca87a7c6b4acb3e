/**
 * Internal types for the channel registry.
 * These types are not exposed in the public API.
 */

import type { Payload } from '../types/message';

/**
 * Message as held by a channel.
 */
export interface StoredMessage {
  /** Unique message ID. */
  id: string;

  /** Message payload (owned copy). */
  payload: Payload;
}

/**
 * Per-channel queue state.
 * A live message ID is in exactly one of `ready` or `unacked`.
 */
export interface ChannelQueue {
  /** Channel name. */
  name: string;

  /** Ready messages; Map iteration order is publish order. */
  ready: Map<string, StoredMessage>;

  /** Delivered, unacknowledged messages. */
  unacked: Map<string, StoredMessage>;
}
