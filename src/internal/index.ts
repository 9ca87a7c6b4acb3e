/**
 * Internal module exports.
 * These are not part of the public API.
 */

export { ChannelRegistry } from './channel-registry';
export type { StoredMessage, ChannelQueue } from './types';
