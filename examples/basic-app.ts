import { Broker, sequentialIdGenerator } from '../src';

const broker = new Broker({ idGenerator: sequentialIdGenerator() });

await broker.handle('register', { channel: 'orders' });

const sent = await broker.handle('send', { channel: 'orders', data: { id: 1, sku: 'A-100' } });
console.log('Published:', sent.message_id);

const read = await broker.handle('read', { channel: 'orders' });
console.log('Received:', read.data, read.message_id);

console.log('Stats:', (await broker.handle('stats', { channel: 'orders' })).data);

const confirmed = await broker.handle('confirm', { channel: 'orders', message_id: read.message_id });
console.log(confirmed.message);

console.log(await broker.dispatch('/stats'));
console.log(await broker.dispatch('/delete', '{}'));
