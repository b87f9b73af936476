// Message structure

import type { FieldTable, FieldValue, Message, MessageBody, MessageProps } from '../protocol/types';

function cloneFieldValue(value: FieldValue): FieldValue {
  if (Buffer.isBuffer(value)) {
    return Buffer.from(value);
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    return value.map(cloneFieldValue);
  }
  if (value !== null && typeof value === 'object') {
    return cloneFieldTable(value);
  }
  return value;
}

export function cloneFieldTable(table: FieldTable): FieldTable {
  const copy: FieldTable = {};
  for (const [key, value] of Object.entries(table)) {
    copy[key] = cloneFieldValue(value);
  }
  return copy;
}

export function cloneBody(body: MessageBody): MessageBody {
  return Buffer.isBuffer(body) ? Buffer.from(body) : body;
}

export function createMessage(
  exchange: string,
  routingKey: string,
  body: MessageBody,
  props: MessageProps = {}
): Message {
  return {
    body: cloneBody(body),
    routingKey,
    exchange,
    props: cloneFieldTable(props),
  };
}

// Independent copy; nothing in it aliases the original
export function cloneMessage(message: Message): Message {
  return createMessage(message.exchange, message.routingKey, message.body, message.props);
}

// Get message size in bytes
export function getMessageSize(message: Message): number {
  return Buffer.byteLength(message.body);
}
