/**
 * Broker configuration and request/response types.
 */

import type { IdGenerator, Payload } from './message';
import type { Logger } from '../utils/logger';
import type { ChannelRegistry } from '../internal/channel-registry';

/**
 * What to do when a consume or stats call names an unregistered channel.
 * - 'error': fail with ChannelNotFoundError
 * - 'empty': behave as an empty channel
 */
export type MissingChannelPolicy = 'error' | 'empty';

/**
 * Options for the channel registry.
 */
export interface RegistryOptions {
  /**
   * Message ID strategy.
   * @default randomUUID
   */
  idGenerator?: IdGenerator;

  /**
   * Register unknown channels on first publish.
   * @default false
   */
  autoCreateChannels?: boolean;

  /**
   * Consume/stats behaviour for unregistered channels.
   * @default 'error'
   */
  missingChannel?: MissingChannelPolicy;

  /** Logger override. Defaults to the shared console logger. */
  logger?: Logger;
}

/**
 * Broker options. Registry options are used when no registry is supplied.
 */
export interface BrokerOptions extends RegistryOptions {
  /** Existing registry to route into. */
  registry?: ChannelRegistry;
}

/**
 * Default registry options.
 */
export const DEFAULT_REGISTRY_OPTIONS: Required<Pick<RegistryOptions, 'autoCreateChannels' | 'missingChannel'>> = {
  autoCreateChannels: false,
  missingChannel: 'error'
};

/**
 * Canonical operation names understood by the broker.
 */
export type OperationName = 'register' | 'send' | 'read' | 'confirm' | 'purge' | 'stats';

/**
 * Request bodies, keyed by canonical operation.
 */
export interface RegisterRequest {
  channel: string;
}

export interface SendRequest {
  channel: string;
  data: Payload;
}

export interface ReadRequest {
  channel: string;
}

export interface ConfirmRequest {
  channel: string;
  message_id: string;
}

export interface PurgeRequest {
  channel: string;
}

export interface StatsRequest {
  /** Omitted or null means every channel. */
  channel?: string | null;
}

export interface OperationRequests {
  register: RegisterRequest;
  send: SendRequest;
  read: ReadRequest;
  confirm: ConfirmRequest;
  purge: PurgeRequest;
  stats: StatsRequest;
}

/**
 * Per-channel stats as they appear in a response.
 */
export interface WireChannelStats {
  ready_messages: number;
  unacked_messages: number;
  total: number;
}

/**
 * Response returned for every request. Unset fields keep their empty defaults.
 */
export interface BrokerResponse {
  data: Record<string, unknown>;
  message: string;
  error: string;
  message_id: string;
}
