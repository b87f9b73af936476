// Per-channel transaction buffer

import type { MessageBody, MessageProps, PublishCall, PublishOptions } from '../protocol/types';
import { cloneBody, cloneFieldTable } from './message';

export class Transaction {
  private calls: PublishCall[] = [];

  // Arguments are copied so later changes by the caller don't leak in
  buffer(routingKey: string, body: MessageBody, options: PublishOptions, props: MessageProps): void {
    this.calls.push({
      routingKey,
      body: cloneBody(body),
      options: { ...options },
      props: cloneFieldTable(props),
    });
  }

  // Oldest buffered call, without removing it
  peek(): PublishCall | undefined {
    return this.calls[0];
  }

  shift(): PublishCall | undefined {
    return this.calls.shift();
  }

  discard(): number {
    const count = this.calls.length;
    this.calls = [];
    return count;
  }
}
