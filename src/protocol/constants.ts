// Broker constants

import type { ConsumeOptions } from './types';

// Exchange used by publish when no exchange option is given
export const DEFAULT_EXCHANGE = 'amq.direct';

// Only no-ack consumption is supported
export const DEFAULT_CONSUME_OPTIONS: Required<ConsumeOptions> = {
  noLocal: false,
  noAck: true,
  exclusive: false,
};

// Values stamped on every retrieved message
export const EMPTY_CONSUMER_TAG = '';
export const EMPTY_CONTENT_TYPE = '';

// AMQP reply codes
export const REPLY_CODE = {
  CONNECTION_FORCED: 320,
  NOT_FOUND: 404,
  PRECONDITION_FAILED: 406,
  COMMAND_INVALID: 503,
  CHANNEL_ERROR: 504,
  NOT_IMPLEMENTED: 540,
} as const;

export type ReplyCode = typeof REPLY_CODE[keyof typeof REPLY_CODE];

// Topic wildcards
export const WILDCARD = {
  MULTI: '#',
  SINGLE: '*',
} as const;

export const WORD_SEPARATOR = '.';
