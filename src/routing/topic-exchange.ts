// Topic-style binding patterns
// - # matches any sequence of characters, dots included
// - * matches one or more characters that are not a dot
// A pattern with neither wildcard only matches the identical routing key.
// When a pattern contains #, any * in it is taken literally.

import type { Binding } from '../core/binding';
import { WILDCARD, WORD_SEPARATOR } from '../protocol/constants';

export type RoutingKeyMatcher = (routingKey: string) => boolean;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Build an anchored regex for a binding pattern
export function patternToRegex(pattern: string): RegExp {
  let wildcard: string | null = null;
  let replacement = '';

  if (pattern.includes(WILDCARD.MULTI)) {
    wildcard = WILDCARD.MULTI;
    replacement = '.*';
  } else if (pattern.includes(WILDCARD.SINGLE)) {
    wildcard = WILDCARD.SINGLE;
    replacement = `[^${escapeRegex(WORD_SEPARATOR)}]+`;
  }

  const body = wildcard === null
    ? escapeRegex(pattern)
    : pattern.split(wildcard).map(escapeRegex).join(replacement);

  return new RegExp(`^${body}$`);
}

export function compilePattern(pattern: string): RoutingKeyMatcher {
  const regex = patternToRegex(pattern);
  return (routingKey: string) => regex.test(routingKey);
}

// Queue names for every matching binding; duplicates are kept so that
// two bindings to the same queue deliver two copies
export function matchTopic(routingKey: string, bindings: Binding[]): string[] {
  const matchedQueues: string[] = [];

  for (const binding of bindings) {
    if (binding.matches(routingKey)) {
      matchedQueues.push(binding.destination);
    }
  }

  return matchedQueues;
}
