// Main message router

import type { Exchange } from '../core/exchange';
import type { Queue } from '../core/queue';
import type { BindingRegistry } from '../core/binding';
import { UnknownExchangeError } from '../errors';
import { matchTopic } from './topic-exchange';

export interface RouterContext {
  exchanges: Map<string, Exchange>;
  queues: Map<string, Queue>;
  bindings: BindingRegistry;
}

export class MessageRouter {
  private readonly context: RouterContext;

  constructor(context: RouterContext) {
    this.context = context;
  }

  // Queues a message with this routing key goes to, one entry per matching
  // binding. Throws if the exchange was never declared.
  route(exchangeName: string, routingKey: string): Queue[] {
    if (!this.context.exchanges.has(exchangeName)) {
      throw new UnknownExchangeError(exchangeName);
    }

    const bindings = this.context.bindings.getBySource(exchangeName);
    const queueNames = matchTopic(routingKey, bindings);

    const queues: Queue[] = [];
    for (const queueName of queueNames) {
      const queue = this.context.queues.get(queueName);
      if (queue) {
        queues.push(queue);
      }
    }

    return queues;
  }
}
