/**
 * Broker router unit tests.
 */

import { describe, test, expect, beforeEach, vi } from 'vitest';
import { Broker, createResponse, resolveOperation } from '../../src/broker';
import { ChannelRegistry } from '../../src/internal/channel-registry';
import { sequentialIdGenerator } from '../../src/utils/id-generator';
import { ConsoleLogger, LogLevel, type Logger } from '../../src/utils/logger';

const silent = new ConsoleLogger(LogLevel.NONE);

describe('Broker', () => {
	let broker: Broker;

	beforeEach(() => {
		broker = new Broker({ idGenerator: sequentialIdGenerator(), logger: silent });
	});

	describe('resolveOperation', () => {
		test('maps aliases to canonical names', () => {
			expect(resolveOperation('send')).toBe('send');
			expect(resolveOperation('publish')).toBe('send');
			expect(resolveOperation('consume')).toBe('read');
			expect(resolveOperation('acknowledge')).toBe('confirm');
			expect(resolveOperation('ack')).toBe('confirm');
		});

		test('accepts path-style names', () => {
			expect(resolveOperation('/register')).toBe('register');
			expect(resolveOperation('/stats')).toBe('stats');
		});

		test('returns undefined for unknown names', () => {
			expect(resolveOperation('delete')).toBeUndefined();
			expect(resolveOperation('constructor')).toBeUndefined();
			expect(resolveOperation('')).toBeUndefined();
		});
	});

	describe('createResponse', () => {
		test('fills empty defaults', () => {
			expect(createResponse()).toEqual({ data: {}, message: '', error: '', message_id: '' });
			expect(createResponse({ message: 'ok' })).toEqual({ data: {}, message: 'ok', error: '', message_id: '' });
		});
	});

	describe('register', () => {
		test('registers a channel', async () => {
			const response = await broker.handle('register', { channel: 'orders' });

			expect(response).toEqual({
				data: {},
				message: 'Channel orders registered',
				error: '',
				message_id: ''
			});
			expect(broker.registry.hasChannel('orders')).toBe(true);
		});

		test('reports a duplicate registration as an error', async () => {
			await broker.handle('register', { channel: 'orders' });
			const response = await broker.handle('register', { channel: 'orders' });

			expect(response.error).toBe('Channel orders already exists');
			expect(response.message).toBe('');
		});
	});

	describe('send', () => {
		beforeEach(async () => {
			await broker.handle('register', { channel: 'orders' });
		});

		test('returns the message id and echoes the payload', async () => {
			const response = await broker.handle('send', { channel: 'orders', data: { id: 1 } });

			expect(response).toEqual({
				data: { id: 1 },
				message: '',
				error: '',
				message_id: 'm1'
			});
		});

		test('accepts the publish alias', async () => {
			const response = await broker.handle('publish', { channel: 'orders', data: { id: 1 } });

			expect(response.message_id).toBe('m1');
			expect(broker.registry.channelStats('orders')).toEqual({ ready: 1, unacked: 0, total: 1 });
		});

		test('reports an unknown channel', async () => {
			const response = await broker.handle('send', { channel: 'missing', data: { id: 1 } });

			expect(response).toEqual({
				data: {},
				message: '',
				error: 'Channel missing does not exist',
				message_id: ''
			});
		});

		test('rejects a body without data', async () => {
			const response = await broker.handle('send', { channel: 'orders' });

			expect(response.error).toBe("Invalid request: / must have required property 'data'");
		});

		test('rejects array data', async () => {
			const response = await broker.handle('send', { channel: 'orders', data: [1, 2] });

			expect(response.error).toBe('Invalid request: /data must be object');
		});
	});

	describe('read', () => {
		beforeEach(async () => {
			await broker.handle('register', { channel: 'orders' });
		});

		test('returns the head message', async () => {
			await broker.handle('send', { channel: 'orders', data: { id: 1 } });
			await broker.handle('send', { channel: 'orders', data: { id: 2 } });

			const response = await broker.handle('read', { channel: 'orders' });

			expect(response).toEqual({
				data: { id: 1 },
				message: '',
				error: '',
				message_id: 'm1'
			});
		});

		test('reports an empty channel as a message, not an error', async () => {
			const response = await broker.handle('consume', { channel: 'orders' });

			expect(response).toEqual({
				data: {},
				message: 'No messages in channel orders',
				error: '',
				message_id: ''
			});
		});

		test('reports an unknown channel as an error', async () => {
			const response = await broker.handle('read', { channel: 'missing' });

			expect(response.error).toBe('Channel missing does not exist');
		});

		test("reports an unknown channel as empty under the 'empty' policy", async () => {
			const lenient = new Broker({ missingChannel: 'empty', logger: silent });

			const response = await lenient.handle('read', { channel: 'missing' });

			expect(response).toEqual({
				data: {},
				message: 'No messages in channel missing',
				error: '',
				message_id: ''
			});
		});
	});

	describe('confirm', () => {
		beforeEach(async () => {
			await broker.handle('register', { channel: 'orders' });
			await broker.handle('send', { channel: 'orders', data: { id: 1 } });
			await broker.handle('read', { channel: 'orders' });
		});

		test('confirms a delivered message once', async () => {
			const first = await broker.handle('confirm', { channel: 'orders', message_id: 'm1' });
			const second = await broker.handle('ack', { channel: 'orders', message_id: 'm1' });

			expect(first).toEqual({
				data: {},
				message: 'Message confirmed',
				error: '',
				message_id: 'm1'
			});
			expect(second).toEqual({
				data: {},
				message: 'No such message: m1',
				error: '',
				message_id: 'm1'
			});
		});

		test('reports an unknown channel as an error', async () => {
			const response = await broker.handle('acknowledge', { channel: 'missing', message_id: 'm1' });

			expect(response.error).toBe('Channel missing does not exist');
		});

		test('rejects a body without message_id', async () => {
			const response = await broker.handle('confirm', { channel: 'orders' });

			expect(response.error).toBe("Invalid request: / must have required property 'message_id'");
		});
	});

	describe('purge', () => {
		test('reports the number of discarded messages', async () => {
			await broker.handle('register', { channel: 'orders' });
			await broker.handle('send', { channel: 'orders', data: { id: 1 } });
			await broker.handle('send', { channel: 'orders', data: { id: 2 } });
			await broker.handle('read', { channel: 'orders' });

			const response = await broker.handle('purge', { channel: 'orders' });

			expect(response.message).toBe('Channel orders purged (2 messages discarded)');
			expect(broker.registry.channelStats('orders')).toEqual({ ready: 0, unacked: 0, total: 0 });
		});

		test('reports an unknown channel as an error', async () => {
			const response = await broker.handle('purge', { channel: 'missing' });

			expect(response.error).toBe('Channel missing does not exist');
		});
	});

	describe('stats', () => {
		beforeEach(async () => {
			await broker.handle('register', { channel: 'orders' });
			await broker.handle('register', { channel: 'billing' });
			await broker.handle('send', { channel: 'orders', data: { id: 1 } });
			await broker.handle('send', { channel: 'orders', data: { id: 2 } });
			await broker.handle('read', { channel: 'orders' });
		});

		test('covers every channel without a name', async () => {
			const response = await broker.handle('stats', {});

			expect(response.data).toEqual({
				orders: { ready_messages: 1, unacked_messages: 1, total: 2 },
				billing: { ready_messages: 0, unacked_messages: 0, total: 0 }
			});
		});

		test('treats a null channel as every channel', async () => {
			const response = await broker.handle('stats', { channel: null });

			expect(Object.keys(response.data)).toEqual(['orders', 'billing']);
		});

		test('covers one channel with a name', async () => {
			const response = await broker.handle('stats', { channel: 'orders' });

			expect(response.data).toEqual({
				orders: { ready_messages: 1, unacked_messages: 1, total: 2 }
			});
		});

		test('reports an unknown channel as an error', async () => {
			const response = await broker.handle('stats', { channel: 'missing' });

			expect(response).toEqual({
				data: {},
				message: '',
				error: 'Channel missing does not exist',
				message_id: ''
			});
		});

		test('rejects an empty channel name', async () => {
			const response = await broker.handle('stats', { channel: '' });

			expect(response.error).toBe('Invalid request: /channel must NOT have fewer than 1 characters');
		});
	});

	describe('unknown operations', () => {
		test('sets only error', async () => {
			const response = await broker.handle('explode', { channel: 'orders' });

			expect(response).toEqual({
				data: {},
				message: '',
				error: 'Unknown operation: explode',
				message_id: ''
			});
		});
	});

	describe('error handling', () => {
		test('rejects a non-object body', async () => {
			const response = await broker.handle('register', 'orders');

			expect(response.error).toBe('Invalid request: / must be object');
		});

		test('converts unexpected errors and logs them', async () => {
			const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
			const registry = new ChannelRegistry({ logger: silent });
			const faulty = new Broker({ registry, logger: log });
			vi.spyOn(registry, 'consume').mockImplementation(() => {
				throw new Error('boom');
			});

			const response = await faulty.handle('read', { channel: 'orders' });

			expect(response.error).toBe('boom');
			expect(log.error).toHaveBeenCalledTimes(1);
			expect(log.warn).not.toHaveBeenCalled();
		});

		test('logs broker errors at warn level', async () => {
			const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
			const quiet = new Broker({ logger: log });

			await quiet.handle('purge', { channel: 'missing' });

			expect(log.warn).toHaveBeenCalledWith('purge failed: Channel missing does not exist');
			expect(log.error).not.toHaveBeenCalled();
		});

		test('uses a supplied registry', async () => {
			const registry = new ChannelRegistry({ logger: silent });
			registry.registerChannel('shared');
			const routed = new Broker({ registry, logger: silent });

			const response = await routed.handle('stats', { channel: 'shared' });

			expect(routed.registry).toBe(registry);
			expect(response.data).toEqual({ shared: { ready_messages: 0, unacked_messages: 0, total: 0 } });
		});
	});

	describe('dispatch', () => {
		test('decodes the body and encodes the response', async () => {
			const raw = await broker.dispatch('/register', '{"channel":"orders"}');

			expect(JSON.parse(raw)).toEqual({
				data: {},
				message: 'Channel orders registered',
				error: '',
				message_id: ''
			});
		});

		test('accepts a Buffer body', async () => {
			await broker.dispatch('/register', Buffer.from('{"channel":"orders"}'));
			const raw = await broker.dispatch('/send', Buffer.from('{"channel":"orders","data":{"id":1}}'));

			expect(JSON.parse(raw)).toEqual({
				data: { id: 1 },
				message: '',
				error: '',
				message_id: 'm1'
			});
		});

		test('treats an empty body as {}', async () => {
			await broker.dispatch('/register', '{"channel":"orders"}');
			const raw = await broker.dispatch('/stats');

			expect(JSON.parse(raw)).toEqual({
				data: { orders: { ready_messages: 0, unacked_messages: 0, total: 0 } },
				message: '',
				error: '',
				message_id: ''
			});
		});

		test('echoes and delivers a "__proto__" payload key intact', async () => {
			await broker.dispatch('/register', '{"channel":"c"}');
			const body = '{"channel":"c","data":{"__proto__":{"x":1},"y":2}}';

			const sent = await broker.dispatch('/send', body);
			const read = await broker.dispatch('/read', '{"channel":"c"}');

			expect(sent).toBe('{"data":{"__proto__":{"x":1},"y":2},"message":"","error":"","message_id":"m1"}');
			expect(read).toBe('{"data":{"__proto__":{"x":1},"y":2},"message":"","error":"","message_id":"m1"}');
		});

		test('reports malformed JSON', async () => {
			const raw = await broker.dispatch('/read', '{not json');
			const response = JSON.parse(raw);

			expect(response.error).toMatch(/^Invalid JSON body: /);
			expect(response.message).toBe('');
		});

		test('reports an unknown path without decoding the body', async () => {
			const raw = await broker.dispatch('/nope', '{not json');

			expect(JSON.parse(raw)).toEqual({
				data: {},
				message: '',
				error: 'Unknown operation: /nope',
				message_id: ''
			});
		});
	});
});
