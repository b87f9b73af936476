// Test broker - in-process stand-in for an AMQP broker connection
//
// All state lives in this object and every method runs to completion before
// returning: nothing blocks, nothing is scheduled, and retrieval is polled.

import type {
  BindingDefinition,
  ChannelId,
  ConnectionState,
  ConsumeOptions,
  Delivery,
  ExchangeDeclareOptions,
  GetOptions,
  GetResult,
  Message,
  MessageBody,
  MessageProps,
  PublishCall,
  PublishOptions,
  QueueDeclareOptions,
} from './protocol/types';
import {
  DEFAULT_CONSUME_OPTIONS,
  DEFAULT_EXCHANGE,
  EMPTY_CONSUMER_TAG,
  EMPTY_CONTENT_TYPE,
} from './protocol/constants';

import { Channel } from './core/channel';
import type { ChannelInfo } from './core/channel';
import { Exchange } from './core/exchange';
import type { ExchangeInfo } from './core/exchange';
import { Queue } from './core/queue';
import type { QueueInfo } from './core/queue';
import { Binding, BindingRegistry } from './core/binding';
import { Transaction } from './core/transaction';
import { cloneMessage, createMessage } from './core/message';

import { MessageRouter } from './routing/router';
import { BrokerEventEmitter } from './events/broker-events';
import {
  ConnectionError,
  NoQueueSelectedError,
  NoTransactionError,
  NotConnectedError,
  TransactionAlreadyStartedError,
  UnknownBindingError,
  UnknownChannelError,
  UnknownExchangeError,
  UnknownQueueError,
  UnsupportedOptionError,
} from './errors';

export interface BrokerLogger {
  debug(message: string): void;
}

export const consoleLogger: BrokerLogger = {
  debug: (message: string) => console.log(message),
};

export interface BrokerOptions {
  connectable?: boolean;
  debug?: boolean;
  defaultExchange?: string;
  logger?: BrokerLogger;
}

export interface BrokerInfo {
  state: ConnectionState;
  channels: ChannelInfo[];
  transactions: ChannelId[];
  exchanges: ExchangeInfo[];
  queues: QueueInfo[];
  bindings: BindingDefinition[];
  currentQueue: string | null;
  deliveryTag: number;
}

interface RoutedMessage {
  message: Message;
  queues: string[];
}

export class TestBroker {
  private readonly options: Required<BrokerOptions>;

  // When false, connect() always fails
  connectable: boolean;
  // Log every binding match on publish
  debug: boolean;

  private _state: ConnectionState = 'closed';
  private deliveryTag: number = 0;
  private currentQueue: string | null = null;

  // Core entities
  private channels: Map<ChannelId, Channel> = new Map();
  private exchanges: Map<string, Exchange> = new Map();
  private queues: Map<string, Queue> = new Map();
  private bindings: BindingRegistry = new BindingRegistry();
  private transactions: Map<ChannelId, Transaction> = new Map();

  // Routing
  private router: MessageRouter;

  // Events
  readonly events: BrokerEventEmitter = new BrokerEventEmitter();

  constructor(options: BrokerOptions = {}) {
    this.options = {
      connectable: options.connectable ?? true,
      debug: options.debug ?? false,
      defaultExchange: options.defaultExchange ?? DEFAULT_EXCHANGE,
      logger: options.logger ?? consoleLogger,
    };

    this.connectable = this.options.connectable;
    this.debug = this.options.debug;

    this.router = new MessageRouter({
      exchanges: this.exchanges,
      queues: this.queues,
      bindings: this.bindings,
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === 'open';
  }

  // ---- Connection & channels ----

  connect(): void {
    if (!this.connectable) {
      throw new ConnectionError();
    }
    if (this.connected) {
      return;
    }
    this._state = 'open';
    this.events.emitTyped('connection:open');
  }

  disconnect(): void {
    this.assertConnected();
    this._state = 'closed';
    this.events.emitTyped('connection:close');
  }

  channelOpen(channel: ChannelId): void {
    this.assertConnected();
    if (this.channels.has(channel)) {
      return;
    }

    const opened = new Channel(channel);
    this.channels.set(channel, opened);
    this.events.emitTyped('channel:open', opened.getInfo());
  }

  // Leaves any open transaction on the channel in place
  channelClose(channel: ChannelId): void {
    const closing = this.getChannel(channel);
    closing.close();
    this.channels.delete(channel);
    this.events.emitTyped('channel:close', closing.getInfo());
  }

  // ---- Topology ----

  exchangeDeclare(channel: ChannelId, name: string, options: ExchangeDeclareOptions = {}): void {
    this.getChannel(channel);
    if (this.exchanges.has(name)) {
      return;
    }

    const exchange = new Exchange(name, options);
    this.exchanges.set(name, exchange);
    this.events.emitTyped('exchange:created', exchange.getInfo());
  }

  exchangeDelete(channel: ChannelId, name: string): void {
    this.getChannel(channel);
    const exchange = this.getExchange(name);

    for (const binding of this.bindings.removeBySource(name)) {
      this.events.emitTyped('binding:deleted', binding.getInfo());
    }
    this.exchanges.delete(name);
    this.events.emitTyped('exchange:deleted', exchange.getInfo());
  }

  // Re-declaring an existing queue keeps its messages
  queueDeclare(channel: ChannelId, name: string, options: QueueDeclareOptions = {}): void {
    this.getChannel(channel);
    if (this.queues.has(name)) {
      return;
    }

    const queue = new Queue(name, options);
    this.queues.set(name, queue);
    this.events.emitTyped('queue:created', queue.getInfo());
  }

  // Returns the number of messages discarded with the queue
  queueDelete(channel: ChannelId, name: string): number {
    this.getChannel(channel);
    const queue = this.getQueue(name);

    for (const binding of this.bindings.removeByDestination(name)) {
      this.events.emitTyped('binding:deleted', binding.getInfo());
    }
    if (this.currentQueue === name) {
      this.currentQueue = null;
    }

    const info = queue.getInfo();
    this.queues.delete(name);
    this.events.emitTyped('queue:deleted', info);
    return info.messageCount;
  }

  queuePurge(channel: ChannelId, name: string): number {
    this.getChannel(channel);
    const purged = this.getQueue(name).purge();
    this.events.emitTyped('queue:purged', name, purged);
    return purged;
  }

  // Binding the same pattern again on the exchange replaces its queue
  queueBind(channel: ChannelId, queue: string, exchange: string, pattern: string): void {
    this.getChannel(channel);
    this.getQueue(queue);
    this.getExchange(exchange);

    const binding = new Binding(exchange, queue, pattern);
    const replaced = this.bindings.add(binding);
    if (replaced) {
      this.events.emitTyped('binding:deleted', replaced.getInfo());
    }
    this.events.emitTyped('binding:created', binding.getInfo());
  }

  queueUnbind(channel: ChannelId, queue: string, exchange: string, routingKey: string): void {
    this.getChannel(channel);
    this.getQueue(queue);
    this.getExchange(exchange);

    const binding = this.bindings.remove(exchange, routingKey);
    if (!binding) {
      throw new UnknownBindingError(queue, exchange, routingKey);
    }
    this.events.emitTyped('binding:deleted', binding.getInfo());
  }

  // ---- Publish ----

  // Inside a transaction the call is only buffered and 0 is returned.
  // Otherwise returns how many messages were enqueued.
  publish(
    channel: ChannelId,
    routingKey: string,
    body: MessageBody,
    options: PublishOptions = {},
    props: MessageProps = {}
  ): number {
    const transaction = this.transactions.get(channel);
    if (transaction) {
      transaction.buffer(routingKey, body, options, props);
      return 0;
    }

    const routed = this.routeNow(channel, { routingKey, body, options, props });
    this.announceRouted(channel, routed);
    return routed.queues.length;
  }

  // Enqueues one copy per matching binding. Emits nothing, so listeners
  // only ever run once the queues are settled.
  private routeNow(channel: ChannelId, call: PublishCall): RoutedMessage {
    this.getChannel(channel);

    const exchange = call.options.exchange ?? this.options.defaultExchange;
    const queues = this.router.route(exchange, call.routingKey);
    const message = createMessage(exchange, call.routingKey, call.body, call.props);

    for (const queue of queues) {
      queue.enqueue(cloneMessage(message));
    }

    return { message, queues: queues.map(q => q.name) };
  }

  private announceRouted(channel: ChannelId, routed: RoutedMessage): void {
    if (this.debug) {
      for (const queue of routed.queues) {
        this.options.logger.debug(`Publishing '${routed.message.routingKey}' to queue '${queue}'`);
      }
    }
    this.events.emitTyped('message:published', cloneMessage(routed.message), channel);
    this.events.emitTyped('message:routed', cloneMessage(routed.message), [...routed.queues]);
  }

  // ---- Transactions ----

  txSelect(channel: ChannelId): void {
    this.getChannel(channel);
    if (this.transactions.has(channel)) {
      throw new TransactionAlreadyStartedError(channel);
    }
    this.transactions.set(channel, new Transaction());
    this.events.emitTyped('tx:select', channel);
  }

  // Replays buffered publishes in order. If one fails, it and the calls after
  // it stay buffered and the transaction stays open. Each call leaves the
  // buffer as soon as it has routed; announcements follow once the whole
  // replay is done or has failed.
  txCommit(channel: ChannelId): number {
    const transaction = this.getTransaction(channel);

    const replayed: RoutedMessage[] = [];
    try {
      let call = transaction.peek();
      while (call) {
        replayed.push(this.routeNow(channel, call));
        transaction.shift();
        call = transaction.peek();
      }
      this.transactions.delete(channel);
    } finally {
      for (const routed of replayed) {
        this.announceRouted(channel, routed);
      }
    }

    this.events.emitTyped('tx:commit', channel, replayed.length);
    return replayed.length;
  }

  txRollback(channel: ChannelId): number {
    const transaction = this.getTransaction(channel);
    const discarded = transaction.discard();
    this.transactions.delete(channel);
    this.events.emitTyped('tx:rollback', channel, discarded);
    return discarded;
  }

  // ---- Consume & retrieval ----

  // Selects the queue recv() reads from; one selection per broker
  consume(channel: ChannelId, queue: string, options: ConsumeOptions = {}): void {
    this.getChannel(channel);
    this.getQueue(queue);

    const effective: Required<ConsumeOptions> = {
      noLocal: options.noLocal ?? DEFAULT_CONSUME_OPTIONS.noLocal,
      noAck: options.noAck ?? DEFAULT_CONSUME_OPTIONS.noAck,
      exclusive: options.exclusive ?? DEFAULT_CONSUME_OPTIONS.exclusive,
    };
    if (!effective.noAck) {
      throw new UnsupportedOptionError('noAck', 'acknowledged delivery is not implemented');
    }

    this.currentQueue = queue;
    this.events.emitTyped('consumer:selected', queue, channel);
  }

  get(channel: ChannelId, queue: string, _options: GetOptions = {}): GetResult | undefined {
    this.getChannel(channel);
    const source = this.getQueue(queue);
    const message = source.dequeue();
    if (!message) {
      return undefined;
    }

    const result: GetResult = {
      ...message,
      deliveryTag: ++this.deliveryTag,
      contentType: EMPTY_CONTENT_TYPE,
      redelivered: false,
      messageCount: 0,
    };
    this.announceDelivery(source, message, { ...result, ...cloneMessage(result) });
    return result;
  }

  recv(): Delivery | undefined {
    this.assertConnected();
    if (this.currentQueue === null) {
      throw new NoQueueSelectedError();
    }

    const source = this.getQueue(this.currentQueue);
    const message = source.dequeue();
    if (!message) {
      return undefined;
    }

    const delivery: Delivery = {
      ...message,
      deliveryTag: ++this.deliveryTag,
      consumerTag: EMPTY_CONSUMER_TAG,
    };
    this.announceDelivery(source, message, { ...delivery, ...cloneMessage(delivery) });
    return delivery;
  }

  // A listener failure hands the message back to the head of its queue and
  // takes back the delivery tag, as the caller never receives it
  private announceDelivery(source: Queue, message: Message, delivered: GetResult | Delivery): void {
    try {
      this.events.emitTyped('message:delivered', delivered, source.name);
    } catch (err) {
      source.requeue(message);
      this.deliveryTag--;
      throw err;
    }
  }

  // ---- Introspection ----

  getInfo(): BrokerInfo {
    return {
      state: this._state,
      channels: Array.from(this.channels.values()).map(c => c.getInfo()),
      transactions: Array.from(this.transactions.keys()),
      exchanges: Array.from(this.exchanges.values()).map(e => e.getInfo()),
      queues: Array.from(this.queues.values()).map(q => q.getInfo()),
      bindings: this.bindings.getAll().map(b => b.getInfo()),
      currentQueue: this.currentQueue,
      deliveryTag: this.deliveryTag,
    };
  }

  // ---- Lookups ----

  private assertConnected(): void {
    if (!this.connected) {
      throw new NotConnectedError();
    }
  }

  // Also checks the connection, which every channel operation requires
  private getChannel(channel: ChannelId): Channel {
    this.assertConnected();
    const found = this.channels.get(channel);
    if (!found) {
      throw new UnknownChannelError(channel);
    }
    return found;
  }

  private getQueue(name: string): Queue {
    const queue = this.queues.get(name);
    if (!queue) {
      throw new UnknownQueueError(name);
    }
    return queue;
  }

  private getExchange(name: string): Exchange {
    const exchange = this.exchanges.get(name);
    if (!exchange) {
      throw new UnknownExchangeError(name);
    }
    return exchange;
  }

  private getTransaction(channel: ChannelId): Transaction {
    this.getChannel(channel);
    const transaction = this.transactions.get(channel);
    if (!transaction) {
      throw new NoTransactionError(channel);
    }
    return transaction;
  }
}
