/**
 * ChannelRegistry: the broker's queue engine.
 * Owns every channel and moves messages between ready, unacked and destroyed.
 *
 * All methods are synchronous and never yield, so each call runs to completion
 * before any other caller on the event loop can observe channel state.
 */

import type { ChannelQueue, StoredMessage } from './types';
import type { ConsumeResult, IdGenerator } from '../types/message';
import type { ChannelStats, ChannelStatsMap } from '../types/channel';
import type { MissingChannelPolicy, RegistryOptions } from '../types/broker';
import { DEFAULT_REGISTRY_OPTIONS } from '../types/broker';
import {
  AlreadyExistsError,
  ChannelNotFoundError,
  InternalError,
  InvalidArgumentError
} from '../types/errors';
import { uuidIdGenerator } from '../utils/id-generator';
import { toPayload } from '../utils/json';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { Channel } from '../channel';

export class ChannelRegistry {
  readonly autoCreateChannels: boolean;
  readonly missingChannel: MissingChannelPolicy;

  private readonly channels: Map<string, ChannelQueue>;
  private readonly generateId: IdGenerator;
  private readonly logger: Logger;

  constructor(options?: RegistryOptions) {
    this.channels = new Map();
    this.generateId = options?.idGenerator ?? uuidIdGenerator;
    this.autoCreateChannels = options?.autoCreateChannels ?? DEFAULT_REGISTRY_OPTIONS.autoCreateChannels;
    this.missingChannel = options?.missingChannel ?? DEFAULT_REGISTRY_OPTIONS.missingChannel;
    this.logger = options?.logger ?? defaultLogger;
  }

  /**
   * Get a handle bound to a channel name. Does not register the channel.
   */
  channel(name: string): Channel {
    return new Channel(this, name);
  }

  /**
   * Register a new, empty channel.
   * @throws {InvalidArgumentError} If name is empty
   * @throws {AlreadyExistsError} If the name is taken
   */
  registerChannel(name: string): void {
    this.validateName(name);

    if (this.channels.has(name)) {
      throw new AlreadyExistsError(name);
    }

    this.channels.set(name, {
      name,
      ready: new Map(),
      unacked: new Map()
    });
    this.logger.debug(`Channel registered: ${name}`);
  }

  /**
   * Check if channel exists.
   */
  hasChannel(name: string): boolean {
    return this.channels.has(name);
  }

  /**
   * Names of all channels, in registration order.
   */
  listChannels(): string[] {
    return Array.from(this.channels.keys());
  }

  /**
   * Append a message to the tail of a channel's ready queue.
   * @returns The generated message ID
   * @throws {ChannelNotFoundError} If channel does not exist and auto-create is off
   * @throws {InvalidArgumentError} If payload is not a JSON object
   * @throws {InternalError} If the ID strategy returns an ID still in use
   */
  publish(channelName: string, payload: unknown): string {
    this.validateName(channelName);
    const stored = toPayload(payload);

    let queue = this.channels.get(channelName);
    if (!queue) {
      if (!this.autoCreateChannels) {
        throw new ChannelNotFoundError(channelName);
      }
      this.registerChannel(channelName);
      queue = this.requireQueue(channelName);
    }

    const id = this.generateId();
    if (queue.ready.has(id) || queue.unacked.has(id)) {
      throw new InternalError(`Generated message ID already in use: ${id}`);
    }

    const message: StoredMessage = {
      id,
      payload: stored
    };
    queue.ready.set(id, message);

    return id;
  }

  /**
   * Move the head of the ready queue to the unacked set and return a copy.
   * @returns The message, or null when the ready queue is empty
   * @throws {ChannelNotFoundError} If channel does not exist and the policy is 'error'
   */
  consume(channelName: string): ConsumeResult {
    const queue = this.lookup(channelName);
    if (!queue) {
      return null;
    }

    const head = queue.ready.values().next();
    if (head.done) {
      return null;
    }

    const message = head.value;
    queue.ready.delete(message.id);
    queue.unacked.set(message.id, message);

    return {
      id: message.id,
      payload: toPayload(message.payload)
    };
  }

  /**
   * Destroy a delivered message.
   * @returns true if the message was unacked and is now gone, false otherwise
   * @throws {ChannelNotFoundError} If channel does not exist
   */
  acknowledge(channelName: string, messageId: string): boolean {
    const queue = this.requireQueue(channelName);
    return queue.unacked.delete(messageId);
  }

  /**
   * Discard every ready and unacked message in a channel.
   * @returns Number of messages discarded
   * @throws {ChannelNotFoundError} If channel does not exist
   */
  purge(channelName: string): number {
    const queue = this.requireQueue(channelName);
    const discarded = queue.ready.size + queue.unacked.size;

    queue.ready.clear();
    queue.unacked.clear();

    if (discarded > 0) {
      this.logger.info(`Channel ${channelName} purged, ${discarded} messages discarded`);
    }
    return discarded;
  }

  /**
   * Stats for one channel.
   * @throws {ChannelNotFoundError} If channel does not exist and the policy is 'error'
   */
  channelStats(channelName: string): ChannelStats | undefined {
    const queue = this.lookup(channelName);
    return queue ? this.statsOf(queue) : undefined;
  }

  /**
   * Stats keyed by channel name. Without a name, covers every channel.
   * With a name that is missing under the 'empty' policy, returns {}.
   * @throws {ChannelNotFoundError} If a named channel does not exist and the policy is 'error'
   */
  stats(channelName?: string): ChannelStatsMap {
    const result: ChannelStatsMap = {};

    if (channelName === undefined) {
      for (const queue of this.channels.values()) {
        result[queue.name] = this.statsOf(queue);
      }
      return result;
    }

    const stats = this.channelStats(channelName);
    if (stats) {
      result[channelName] = stats;
    }
    return result;
  }

  private statsOf(queue: ChannelQueue): ChannelStats {
    const ready = queue.ready.size;
    const unacked = queue.unacked.size;
    return { ready, unacked, total: ready + unacked };
  }

  /**
   * Resolve a channel for read-style operations, honouring the missing-channel policy.
   */
  private lookup(channelName: string): ChannelQueue | undefined {
    const queue = this.channels.get(channelName);
    if (!queue && this.missingChannel === 'error') {
      throw new ChannelNotFoundError(channelName);
    }
    return queue;
  }

  private requireQueue(channelName: string): ChannelQueue {
    const queue = this.channels.get(channelName);
    if (!queue) {
      throw new ChannelNotFoundError(channelName);
    }
    return queue;
  }

  private validateName(name: string): void {
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidArgumentError('Channel name must be a non-empty string');
    }
  }
}
