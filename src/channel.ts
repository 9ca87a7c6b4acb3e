/**
 * Channel - Handle bound to one channel name in a registry.
 * Holds no queue state of its own; every call goes to the registry.
 */

import type { ChannelRegistry } from './internal/channel-registry';
import type { ConsumeResult } from './types/message';
import type { ChannelStats } from './types/channel';

export class Channel {
	readonly name: string;
	private readonly registry: ChannelRegistry;

	constructor(registry: ChannelRegistry, name: string) {
		this.registry = registry;
		this.name = name;
	}

	exists(): boolean {
		return this.registry.hasChannel(this.name);
	}

	/**
	 * Register this channel.
	 * @throws {AlreadyExistsError} Code 6 - Channel already registered
	 */
	create(): this {
		this.registry.registerChannel(this.name);
		return this;
	}

	/**
	 * Publish a payload to this channel.
	 *
	 * @returns The message ID assigned by the broker
	 * @throws {ChannelNotFoundError} Code 5 - Channel not registered
	 * @throws {InvalidArgumentError} Code 3 - Payload is not a JSON object
	 *
	 * @example
	 * ```typescript
	 * const orders = registry.channel('orders').create();
	 * const id = orders.publish({ sku: 'A-100', qty: 2 });
	 * ```
	 */
	publish(payload: unknown): string {
		return this.registry.publish(this.name, payload);
	}

	consume(): ConsumeResult {
		return this.registry.consume(this.name);
	}

	acknowledge(messageId: string): boolean {
		return this.registry.acknowledge(this.name, messageId);
	}

	purge(): number {
		return this.registry.purge(this.name);
	}

	stats(): ChannelStats | undefined {
		return this.registry.channelStats(this.name);
	}
}
