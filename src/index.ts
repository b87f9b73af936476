// amqp-test-broker - in-process AMQP broker stand-in for tests
// Main entry point

export { TestBroker, consoleLogger } from './broker';
export type { BrokerOptions, BrokerInfo, BrokerLogger } from './broker';
export { BrokerEventEmitter } from './events/broker-events';
export type { BrokerEvents } from './events/broker-events';
export { Binding, BindingRegistry } from './core/binding';
export { compilePattern, patternToRegex, matchTopic } from './routing/topic-exchange';
export type { RoutingKeyMatcher } from './routing/topic-exchange';
export {
  BrokerError,
  ConnectionError,
  NotConnectedError,
  UnknownChannelError,
  UnknownQueueError,
  UnknownExchangeError,
  UnknownBindingError,
  TransactionAlreadyStartedError,
  NoTransactionError,
  NoQueueSelectedError,
  UnsupportedOptionError,
} from './errors';
export type { BrokerErrorKind } from './errors';
export type {
  ChannelId,
  FieldTable,
  FieldValue,
  Message,
  MessageBody,
  MessageProps,
  GetResult,
  Delivery,
  ExchangeDeclareOptions,
  QueueDeclareOptions,
  PublishOptions,
  ConsumeOptions,
  GetOptions,
} from './protocol/types';
export { DEFAULT_EXCHANGE, REPLY_CODE } from './protocol/constants';

// Quick start example:
//
// import { TestBroker } from 'amqp-test-broker';
//
// const broker = new TestBroker();
// broker.connect();
// broker.channelOpen(1);
// broker.exchangeDeclare(1, 'order');
// broker.queueDeclare(1, 'new-orders');
// broker.queueBind(1, 'new-orders', 'order', 'order.*');
//
// broker.publish(1, 'order.new', 'hello!', { exchange: 'order' });
// broker.consume(1, 'new-orders');
// const message = broker.recv(); // { body: 'hello!', deliveryTag: 1, ... }
