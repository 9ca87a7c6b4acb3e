/**
 * Microbenchmark: Registry hot paths
 *
 * Publish, consume and acknowledge on a single channel, plus router overhead.
 */

import { bench, run, group } from 'mitata';
import { ChannelRegistry } from '../../src/internal/channel-registry';
import { Broker } from '../../src/broker';
import { toPayload } from '../../src/utils/json';

const payload = { orderId: 42, lines: [{ sku: 'A-100', qty: 2 }], note: 'x'.repeat(256) };

group('Publish', () => {
  const registry = new ChannelRegistry();
  registry.registerChannel('bench');

  bench('publish, purge every 10k', () => {
    registry.publish('bench', payload);
    if (registry.channelStats('bench')?.ready === 10_000) {
      registry.purge('bench');
    }
  });

  bench('toPayload copy', () => {
    toPayload(payload);
  });
});

group('Consume and acknowledge', () => {
  const registry = new ChannelRegistry();
  registry.registerChannel('bench');
  registry.registerChannel('empty');
  for (let i = 0; i < 1000; i++) {
    registry.publish('bench', payload);
  }

  bench('consume, ack, republish', () => {
    const message = registry.consume('bench');
    if (message) {
      registry.acknowledge('bench', message.id);
    }
    registry.publish('bench', payload);
  });

  bench('consume on empty channel', () => {
    registry.consume('empty');
  });
});

const broker = new Broker();
await broker.handle('register', { channel: 'bench' });

group('Router', () => {
  bench('handle send, read, confirm', async () => {
    await broker.handle('send', { channel: 'bench', data: payload });
    const { message_id } = await broker.handle('read', { channel: 'bench' });
    await broker.handle('confirm', { channel: 'bench', message_id });
  });

  bench('dispatch JSON send', async () => {
    await broker.dispatch('/send', '{"channel":"bench","data":{"orderId":42}}');
    await broker.handle('purge', { channel: 'bench' });
  });
});

await run();
