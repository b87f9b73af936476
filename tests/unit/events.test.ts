// Broker events

import * as assert from 'assert';
import { describe, it, beforeEach } from 'node:test';
import { TestBroker } from '../../src/broker';
import { NoTransactionError } from '../../src/errors';
import type { BindingDefinition } from '../../src/protocol/types';

describe('Broker events', () => {
  let broker: TestBroker;

  beforeEach(() => {
    broker = new TestBroker();
    broker.connect();
    broker.channelOpen(1);
    broker.exchangeDeclare(1, 'order');
    broker.queueDeclare(1, 'new-orders');
  });

  it('should report connection changes', () => {
    const fresh = new TestBroker();
    const seen: string[] = [];
    fresh.events.onTyped('connection:open', () => seen.push('open'));
    fresh.events.onTyped('connection:close', () => seen.push('close'));

    fresh.connect();
    fresh.connect();
    fresh.disconnect();

    assert.deepStrictEqual(seen, ['open', 'close']);
  });

  it('should report a channel open only once', () => {
    const opened: number[] = [];
    broker.events.onTyped('channel:open', channel => opened.push(channel.channelNumber));

    broker.channelOpen(2);
    broker.channelOpen(2);

    assert.deepStrictEqual(opened, [2]);
  });

  it('should report closed channels with their final state', () => {
    const closed: string[] = [];
    broker.events.onTyped('channel:close', channel => closed.push(`${channel.channelNumber}:${channel.state}`));

    broker.channelClose(1);
    assert.deepStrictEqual(closed, ['1:closed']);
  });

  it('should report a rebind as a removed and a created binding', () => {
    const changes: Array<[string, BindingDefinition]> = [];
    broker.events.onTyped('binding:created', b => changes.push(['created', b]));
    broker.events.onTyped('binding:deleted', b => changes.push(['deleted', b]));
    broker.queueDeclare(1, 'archive');

    broker.queueBind(1, 'new-orders', 'order', 'order.new');
    broker.queueBind(1, 'archive', 'order', 'order.new');

    assert.deepStrictEqual(changes, [
      ['created', { source: 'order', destination: 'new-orders', pattern: 'order.new' }],
      ['deleted', { source: 'order', destination: 'new-orders', pattern: 'order.new' }],
      ['created', { source: 'order', destination: 'archive', pattern: 'order.new' }],
    ]);
  });

  it('should report where a message was routed', () => {
    const routed: string[][] = [];
    broker.events.onTyped('message:routed', (_message, queues) => routed.push(queues));
    broker.queueBind(1, 'new-orders', 'order', 'order.*');
    broker.queueBind(1, 'new-orders', 'order', 'order.#');

    broker.publish(1, 'order.new', 'hello!', { exchange: 'order' });
    broker.publish(1, 'stock.new', 'ignored', { exchange: 'order' });

    assert.deepStrictEqual(routed, [['new-orders', 'new-orders'], []]);
  });

  it('should hand listeners copies of messages', () => {
    broker.queueBind(1, 'new-orders', 'order', 'order.new');
    broker.events.onTyped('message:published', message => {
      message.props.tampered = true;
    });
    broker.events.onTyped('message:delivered', message => {
      message.props.tampered = true;
    });

    broker.publish(1, 'order.new', 'hello!', { exchange: 'order' });
    const delivered = broker.get(1, 'new-orders');

    assert.deepStrictEqual(delivered?.props, {});
  });

  it('should report deliveries with their queue', () => {
    const delivered: Array<[number, string]> = [];
    broker.events.onTyped('message:delivered', (message, queue) => delivered.push([message.deliveryTag, queue]));
    broker.queueBind(1, 'new-orders', 'order', 'order.new');
    broker.publish(1, 'order.new', 'one', { exchange: 'order' });
    broker.publish(1, 'order.new', 'two', { exchange: 'order' });

    broker.get(1, 'new-orders');
    broker.consume(1, 'new-orders');
    broker.recv();
    broker.recv();

    assert.deepStrictEqual(delivered, [[1, 'new-orders'], [2, 'new-orders']]);
  });

  it('should close the transaction before a throwing routed listener runs', () => {
    broker.queueBind(1, 'new-orders', 'order', 'order.new');
    broker.events.onceTyped('message:routed', () => {
      throw new Error('listener failed');
    });

    broker.txSelect(1);
    broker.publish(1, 'order.new', 'one', { exchange: 'order' });
    assert.throws(() => broker.txCommit(1), /listener failed/);

    assert.deepStrictEqual(broker.getInfo().transactions, []);
    assert.throws(() => broker.txCommit(1), NoTransactionError);
    assert.strictEqual(broker.get(1, 'new-orders')?.body, 'one');
    assert.strictEqual(broker.get(1, 'new-orders'), undefined);
  });

  it('should keep a message in its queue when a delivered listener throws', () => {
    broker.queueBind(1, 'new-orders', 'order', 'order.new');
    broker.publish(1, 'order.new', 'one', { exchange: 'order' });
    broker.events.onceTyped('message:delivered', () => {
      throw new Error('listener failed');
    });

    assert.throws(() => broker.get(1, 'new-orders'), /listener failed/);
    assert.strictEqual(broker.getInfo().deliveryTag, 0);

    const retried = broker.get(1, 'new-orders');
    assert.deepStrictEqual([retried?.body, retried?.deliveryTag], ['one', 1]);
  });

  it('should keep a message for recv when a delivered listener throws', () => {
    broker.queueBind(1, 'new-orders', 'order', 'order.new');
    broker.publish(1, 'order.new', 'one', { exchange: 'order' });
    broker.consume(1, 'new-orders');
    broker.events.onceTyped('message:delivered', () => {
      throw new Error('listener failed');
    });

    assert.throws(() => broker.recv(), /listener failed/);
    const retried = broker.recv();
    assert.deepStrictEqual([retried?.body, retried?.deliveryTag], ['one', 1]);
  });

  it('should report transaction outcomes', () => {
    const outcomes: string[] = [];
    broker.events.onTyped('tx:select', channel => outcomes.push(`select:${channel}`));
    broker.events.onTyped('tx:commit', (channel, count) => outcomes.push(`commit:${channel}:${count}`));
    broker.events.onTyped('tx:rollback', (channel, count) => outcomes.push(`rollback:${channel}:${count}`));
    broker.queueBind(1, 'new-orders', 'order', 'order.new');

    broker.txSelect(1);
    broker.publish(1, 'order.new', 'one', { exchange: 'order' });
    broker.publish(1, 'order.new', 'two', { exchange: 'order' });
    broker.txCommit(1);
    broker.txSelect(1);
    broker.publish(1, 'order.new', 'three', { exchange: 'order' });
    broker.txRollback(1);

    assert.deepStrictEqual(outcomes, ['select:1', 'commit:1:2', 'select:1', 'rollback:1:1']);
  });

  it('should report queue lifecycle', () => {
    const seen: string[] = [];
    broker.events.onTyped('queue:created', queue => seen.push(`created:${queue.name}`));
    broker.events.onTyped('queue:purged', (queue, count) => seen.push(`purged:${queue}:${count}`));
    broker.events.onTyped('queue:deleted', queue => seen.push(`deleted:${queue.name}:${queue.messageCount}`));

    broker.queueDeclare(1, 'audit');
    broker.queueDeclare(1, 'audit');
    broker.queuePurge(1, 'audit');
    broker.queueDelete(1, 'audit');

    assert.deepStrictEqual(seen, ['created:audit', 'purged:audit:0', 'deleted:audit:0']);
  });

  it('should stop calling a listener after offTyped', () => {
    let calls = 0;
    const listener = (): void => {
      calls++;
    };
    broker.events.onTyped('consumer:selected', listener);
    broker.consume(1, 'new-orders');
    broker.events.offTyped('consumer:selected', listener);
    broker.consume(1, 'new-orders');

    assert.strictEqual(calls, 1);
  });

  it('should call a once listener a single time', () => {
    const selected: string[] = [];
    broker.events.onceTyped('consumer:selected', (queue, channel) => selected.push(`${queue}@${channel}`));
    broker.consume(1, 'new-orders');
    broker.consume(1, 'new-orders');

    assert.deepStrictEqual(selected, ['new-orders@1']);
  });
});
