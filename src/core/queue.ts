// Queue implementation

import type { QueueDeclareOptions, FieldTable, Message } from '../protocol/types';
import { cloneFieldTable, getMessageSize } from './message';

export interface QueueInfo {
  name: string;
  durable: boolean;
  exclusive: boolean;
  autoDelete: boolean;
  arguments: FieldTable;
  messageCount: number;
  messageBytes: number;
}

export class Queue {
  readonly name: string;
  readonly durable: boolean;
  readonly exclusive: boolean;
  readonly autoDelete: boolean;
  readonly arguments: FieldTable;

  // Message storage, oldest first
  private messages: Message[] = [];

  constructor(name: string, options: QueueDeclareOptions = {}) {
    this.name = name;
    this.durable = options.durable ?? false;
    this.exclusive = options.exclusive ?? false;
    this.autoDelete = options.autoDelete ?? false;
    this.arguments = cloneFieldTable(options.arguments ?? {});
  }

  // Message operations
  enqueue(message: Message): void {
    this.messages.push(message);
  }

  dequeue(): Message | undefined {
    return this.messages.shift();
  }

  // Puts a dequeued message back at the head
  requeue(message: Message): void {
    this.messages.unshift(message);
  }

  purge(): number {
    const count = this.messages.length;
    this.messages = [];
    return count;
  }

  // Get queue info for status reporting
  getInfo(): QueueInfo {
    return {
      name: this.name,
      durable: this.durable,
      exclusive: this.exclusive,
      autoDelete: this.autoDelete,
      arguments: cloneFieldTable(this.arguments),
      messageCount: this.messages.length,
      messageBytes: this.messages.reduce((total, m) => total + getMessageSize(m), 0),
    };
  }
}
