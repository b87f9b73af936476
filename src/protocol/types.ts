// AMQP-style type definitions for the in-process broker

// Channel numbers are positive integers, as on the wire
export type ChannelId = number;

// AMQP Field Table (key-value pairs with typed values)
export type FieldValue =
  | boolean
  | number
  | bigint
  | string
  | Date
  | Buffer
  | FieldTable
  | FieldValue[]
  | null
  | undefined;

export interface FieldTable {
  [key: string]: FieldValue;
}

export type MessageBody = string | Buffer;

// Opaque property bag supplied by the publisher and echoed on delivery
export type MessageProps = FieldTable;

// Connection state
export type ConnectionState = 'closed' | 'open';

// Channel state
export type ChannelState = 'open' | 'closed';

export type ExchangeType = 'direct' | 'fanout' | 'topic' | 'headers';

// Declare options are stored for reporting only
export interface ExchangeDeclareOptions {
  type?: ExchangeType;
  durable?: boolean;
  autoDelete?: boolean;
  internal?: boolean;
  arguments?: FieldTable;
}

export interface QueueDeclareOptions {
  durable?: boolean;
  exclusive?: boolean;
  autoDelete?: boolean;
  arguments?: FieldTable;
}

export interface PublishOptions {
  exchange?: string;
}

export interface ConsumeOptions {
  noLocal?: boolean;
  noAck?: boolean;
  exclusive?: boolean;
}

// Accepted for parity with client libraries; nothing reads it
export interface GetOptions {
  noAck?: boolean;
}

// A message as it sits in a queue
export interface Message {
  body: MessageBody;
  routingKey: string;
  exchange: string;
  props: MessageProps;
}

// Result of basic.get
export interface GetResult extends Message {
  deliveryTag: number;
  redelivered: boolean;
  messageCount: number;
  contentType: string;
}

// Result of recv on the consumed queue
export interface Delivery extends Message {
  deliveryTag: number;
  consumerTag: string;
}

// One publish call held back by an open transaction
export interface PublishCall {
  routingKey: string;
  body: MessageBody;
  options: PublishOptions;
  props: MessageProps;
}

// Binding definition
export interface BindingDefinition {
  source: string;       // exchange name
  destination: string;  // queue name
  pattern: string;
}
