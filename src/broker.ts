/**
 * Broker - Routes named operations to the channel registry and shapes responses.
 * Holds no queue state; everything lives in the registry it wraps.
 */

import type {
	BrokerOptions,
	BrokerResponse,
	OperationName,
	RegisterRequest,
	SendRequest,
	ReadRequest,
	ConfirmRequest,
	PurgeRequest,
	StatsRequest,
	WireChannelStats
} from './types/broker';
import type { ChannelStatsMap } from './types/channel';
import { ChannelRegistry } from './internal/channel-registry';
import { validateRequest } from './request-schema';
import { BrokerError, InvalidArgumentError, UnknownOperationError } from './types/errors';
import { logger as defaultLogger, type Logger } from './utils/logger';

const OPERATIONS: ReadonlyMap<string, OperationName> = new Map<string, OperationName>([
	['register', 'register'],
	['send', 'send'],
	['publish', 'send'],
	['read', 'read'],
	['consume', 'read'],
	['confirm', 'confirm'],
	['acknowledge', 'confirm'],
	['ack', 'confirm'],
	['purge', 'purge'],
	['stats', 'stats']
]);

/**
 * Map an operation name or path (`send`, `/send`, `publish`) to its canonical name.
 */
export function resolveOperation(operation: string): OperationName | undefined {
	const key = operation.startsWith('/') ? operation.slice(1) : operation;
	return OPERATIONS.get(key);
}

export function createResponse(fields?: Partial<BrokerResponse>): BrokerResponse {
	return {
		data: {},
		message: '',
		error: '',
		message_id: '',
		...fields
	};
}

function toWireStats(stats: ChannelStatsMap): Record<string, WireChannelStats> {
	const result: Record<string, WireChannelStats> = {};
	for (const [name, { ready, unacked, total }] of Object.entries(stats)) {
		result[name] = {
			ready_messages: ready,
			unacked_messages: unacked,
			total
		};
	}
	return result;
}

export class Broker {
	readonly registry: ChannelRegistry;
	private readonly logger: Logger;

	constructor(options?: BrokerOptions) {
		this.registry = options?.registry ?? new ChannelRegistry(options);
		this.logger = options?.logger ?? defaultLogger;
	}

	/**
	 * Handle one request. Never rejects: failures are reported in `error`.
	 *
	 * @param operation - Operation name or path, e.g. 'send' or '/send'
	 * @param body - Request body, already decoded
	 *
	 * @example
	 * ```typescript
	 * const broker = new Broker();
	 * await broker.handle('register', { channel: 'orders' });
	 * const { message_id } = await broker.handle('send', { channel: 'orders', data: { id: 1 } });
	 * ```
	 */
	async handle(operation: string, body: unknown): Promise<BrokerResponse> {
		try {
			const resolved = resolveOperation(operation);
			if (!resolved) {
				throw new UnknownOperationError(operation);
			}

			const response = this.route(resolved, body);
			this.logger.debug(`${resolved} handled`, { operation, message_id: response.message_id });
			return response;
		} catch (error) {
			return this.errorResponse(operation, error);
		}
	}

	/**
	 * Handle a request with a raw JSON body and return the JSON-encoded response.
	 * An empty body is treated as `{}`.
	 */
	async dispatch(path: string, rawBody?: string | Buffer): Promise<string> {
		let body: unknown = {};

		if (resolveOperation(path)) {
			try {
				body = decodeBody(rawBody);
			} catch (error) {
				return JSON.stringify(this.errorResponse(path, error));
			}
		}

		const response = await this.handle(path, body);
		return JSON.stringify(response);
	}

	private route(operation: OperationName, body: unknown): BrokerResponse {
		switch (operation) {
			case 'register':
				return this.register(validateRequest('register', body));
			case 'send':
				return this.send(validateRequest('send', body));
			case 'read':
				return this.read(validateRequest('read', body));
			case 'confirm':
				return this.confirm(validateRequest('confirm', body));
			case 'purge':
				return this.purge(validateRequest('purge', body));
			case 'stats':
				return this.stats(validateRequest('stats', body));
		}
	}

	private register({ channel }: RegisterRequest): BrokerResponse {
		this.registry.registerChannel(channel);
		return createResponse({ message: `Channel ${channel} registered` });
	}

	private send({ channel, data }: SendRequest): BrokerResponse {
		const messageId = this.registry.publish(channel, data);
		return createResponse({ data, message_id: messageId });
	}

	private read({ channel }: ReadRequest): BrokerResponse {
		const message = this.registry.consume(channel);
		if (!message) {
			return createResponse({ message: `No messages in channel ${channel}` });
		}
		return createResponse({ data: message.payload, message_id: message.id });
	}

	private confirm({ channel, message_id }: ConfirmRequest): BrokerResponse {
		if (this.registry.acknowledge(channel, message_id)) {
			return createResponse({ message: 'Message confirmed', message_id });
		}
		return createResponse({ message: `No such message: ${message_id}`, message_id });
	}

	private purge({ channel }: PurgeRequest): BrokerResponse {
		const discarded = this.registry.purge(channel);
		return createResponse({ message: `Channel ${channel} purged (${discarded} messages discarded)` });
	}

	private stats({ channel }: StatsRequest): BrokerResponse {
		const stats = this.registry.stats(channel ?? undefined);
		return createResponse({ data: toWireStats(stats) });
	}

	private errorResponse(operation: string, error: unknown): BrokerResponse {
		if (error instanceof BrokerError) {
			this.logger.warn(`${operation} failed: ${error.message}`);
			return createResponse({ error: error.message });
		}

		const message = error instanceof Error ? error.message : String(error);
		this.logger.error(`${operation} failed unexpectedly`, error);
		return createResponse({ error: message });
	}
}

function decodeBody(rawBody: string | Buffer | undefined): unknown {
	const text = Buffer.isBuffer(rawBody) ? rawBody.toString('utf8') : rawBody ?? '';
	if (text.trim().length === 0) {
		return {};
	}

	try {
		return JSON.parse(text);
	} catch (error) {
		throw new InvalidArgumentError(`Invalid JSON body: ${error instanceof Error ? error.message : 'Unknown error'}`);
	}
}
