// Exchange implementation
// Routing is always topic-style; the declared type is kept for reporting.

import type { ExchangeDeclareOptions, ExchangeType, FieldTable } from '../protocol/types';
import { cloneFieldTable } from './message';

export interface ExchangeInfo {
  name: string;
  type: ExchangeType;
  durable: boolean;
  autoDelete: boolean;
  internal: boolean;
  arguments: FieldTable;
}

export class Exchange {
  readonly name: string;
  readonly type: ExchangeType;
  readonly durable: boolean;
  readonly autoDelete: boolean;
  readonly internal: boolean;
  readonly arguments: FieldTable;

  constructor(name: string, options: ExchangeDeclareOptions = {}) {
    this.name = name;
    this.type = options.type ?? 'topic';
    this.durable = options.durable ?? false;
    this.autoDelete = options.autoDelete ?? false;
    this.internal = options.internal ?? false;
    this.arguments = cloneFieldTable(options.arguments ?? {});
  }

  // Get exchange info for status reporting
  getInfo(): ExchangeInfo {
    return {
      name: this.name,
      type: this.type,
      durable: this.durable,
      autoDelete: this.autoDelete,
      internal: this.internal,
      arguments: cloneFieldTable(this.arguments),
    };
  }
}
