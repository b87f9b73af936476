// Typed event emitter for broker events
// Listeners always get copies, never the broker's own records.

import { EventEmitter } from 'events';
import type { BindingDefinition, ChannelId, Delivery, GetResult, Message } from '../protocol/types';
import type { ChannelInfo } from '../core/channel';
import type { ExchangeInfo } from '../core/exchange';
import type { QueueInfo } from '../core/queue';

export interface BrokerEvents {
  // Connection events
  'connection:open': () => void;
  'connection:close': () => void;

  // Channel events
  'channel:open': (channel: ChannelInfo) => void;
  'channel:close': (channel: ChannelInfo) => void;

  // Exchange events
  'exchange:created': (exchange: ExchangeInfo) => void;
  'exchange:deleted': (exchange: ExchangeInfo) => void;

  // Queue events
  'queue:created': (queue: QueueInfo) => void;
  'queue:deleted': (queue: QueueInfo) => void;
  'queue:purged': (queue: string, messageCount: number) => void;

  // Binding events
  'binding:created': (binding: BindingDefinition) => void;
  'binding:deleted': (binding: BindingDefinition) => void;

  // Consumer events
  'consumer:selected': (queue: string, channel: ChannelId) => void;

  // Message events
  'message:published': (message: Message, channel: ChannelId) => void;
  'message:routed': (message: Message, queues: string[]) => void;
  'message:delivered': (message: GetResult | Delivery, queue: string) => void;

  // Transaction events
  'tx:select': (channel: ChannelId) => void;
  'tx:commit': (channel: ChannelId, publishCount: number) => void;
  'tx:rollback': (channel: ChannelId, discardedCount: number) => void;
}

export class BrokerEventEmitter extends EventEmitter {
  // Type-safe emit
  emitTyped<K extends keyof BrokerEvents>(
    event: K,
    ...args: Parameters<BrokerEvents[K]>
  ): boolean {
    return this.emit(event, ...args);
  }

  // Type-safe on
  onTyped<K extends keyof BrokerEvents>(
    event: K,
    listener: BrokerEvents[K]
  ): this {
    return this.on(event, listener);
  }

  // Type-safe once
  onceTyped<K extends keyof BrokerEvents>(
    event: K,
    listener: BrokerEvents[K]
  ): this {
    return this.once(event, listener);
  }

  // Type-safe off
  offTyped<K extends keyof BrokerEvents>(
    event: K,
    listener: BrokerEvents[K]
  ): this {
    return this.off(event, listener);
  }
}
