// Broker error types
//
// Every failure is thrown synchronously as a BrokerError subclass. Callers can
// branch on `kind` (or instanceof) and read the identifiers that caused it.

import { REPLY_CODE } from './protocol/constants';
import type { ReplyCode } from './protocol/constants';
import type { ChannelId } from './protocol/types';

export type BrokerErrorKind =
  | 'connection'
  | 'not-connected'
  | 'unknown-channel'
  | 'unknown-queue'
  | 'unknown-exchange'
  | 'unknown-binding'
  | 'transaction-already-started'
  | 'no-transaction'
  | 'no-queue-selected'
  | 'unsupported-option';

export abstract class BrokerError extends Error {
  abstract readonly kind: BrokerErrorKind;
  readonly replyCode: ReplyCode;

  constructor(message: string, replyCode: ReplyCode) {
    super(message);
    this.name = new.target.name;
    this.replyCode = replyCode;
  }
}

export class ConnectionError extends BrokerError {
  readonly kind = 'connection';

  constructor() {
    super('Unable to connect', REPLY_CODE.CONNECTION_FORCED);
  }
}

export class NotConnectedError extends BrokerError {
  readonly kind = 'not-connected';

  constructor() {
    super('Not connected', REPLY_CODE.CHANNEL_ERROR);
  }
}

export class UnknownChannelError extends BrokerError {
  readonly kind = 'unknown-channel';
  readonly channel: ChannelId;

  constructor(channel: ChannelId) {
    super(`Unknown channel: ${channel}`, REPLY_CODE.CHANNEL_ERROR);
    this.channel = channel;
  }
}

export class UnknownQueueError extends BrokerError {
  readonly kind = 'unknown-queue';
  readonly queue: string;

  constructor(queue: string) {
    super(`Unknown queue: ${queue}`, REPLY_CODE.NOT_FOUND);
    this.queue = queue;
  }
}

export class UnknownExchangeError extends BrokerError {
  readonly kind = 'unknown-exchange';
  readonly exchange: string;

  constructor(exchange: string) {
    super(`Unknown exchange: ${exchange}`, REPLY_CODE.NOT_FOUND);
    this.exchange = exchange;
  }
}

export class UnknownBindingError extends BrokerError {
  readonly kind = 'unknown-binding';
  readonly queue: string;
  readonly exchange: string;
  readonly routingKey: string;

  constructor(queue: string, exchange: string, routingKey: string) {
    super(
      `Unknown binding: '${routingKey}' on exchange ${exchange} for queue ${queue}`,
      REPLY_CODE.NOT_FOUND
    );
    this.queue = queue;
    this.exchange = exchange;
    this.routingKey = routingKey;
  }
}

export class TransactionAlreadyStartedError extends BrokerError {
  readonly kind = 'transaction-already-started';
  readonly channel: ChannelId;

  constructor(channel: ChannelId) {
    super(`Transaction already started on channel ${channel}`, REPLY_CODE.PRECONDITION_FAILED);
    this.channel = channel;
  }
}

export class NoTransactionError extends BrokerError {
  readonly kind = 'no-transaction';
  readonly channel: ChannelId;

  constructor(channel: ChannelId) {
    super(`No transaction started on channel ${channel}`, REPLY_CODE.PRECONDITION_FAILED);
    this.channel = channel;
  }
}

export class NoQueueSelectedError extends BrokerError {
  readonly kind = 'no-queue-selected';

  constructor() {
    super('No queue selected, call consume first', REPLY_CODE.COMMAND_INVALID);
  }
}

export class UnsupportedOptionError extends BrokerError {
  readonly kind = 'unsupported-option';
  readonly option: string;

  constructor(option: string, reason: string) {
    super(`Unsupported option ${option}: ${reason}`, REPLY_CODE.NOT_IMPLEMENTED);
    this.option = option;
  }
}
