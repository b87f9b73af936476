// Binding management

import type { BindingDefinition } from '../protocol/types';
import { compilePattern } from '../routing/topic-exchange';
import type { RoutingKeyMatcher } from '../routing/topic-exchange';

export class Binding implements BindingDefinition {
  readonly source: string;
  readonly destination: string;
  readonly pattern: string;

  // Compiled once here, reused for every publish
  private readonly matcher: RoutingKeyMatcher;

  constructor(source: string, destination: string, pattern: string) {
    this.source = source;
    this.destination = destination;
    this.pattern = pattern;
    this.matcher = compilePattern(pattern);
  }

  matches(routingKey: string): boolean {
    return this.matcher(routingKey);
  }

  // Get binding info for status reporting
  getInfo(): BindingDefinition {
    return {
      source: this.source,
      destination: this.destination,
      pattern: this.pattern,
    };
  }
}

// Binding registry - bindings per exchange, unique by literal pattern
export class BindingRegistry {
  private bySource: Map<string, Map<string, Binding>> = new Map();

  // Returns the binding it replaced, if the pattern was already bound
  add(binding: Binding): Binding | undefined {
    let patterns = this.bySource.get(binding.source);
    if (!patterns) {
      patterns = new Map();
      this.bySource.set(binding.source, patterns);
    }

    const previous = patterns.get(binding.pattern);
    patterns.set(binding.pattern, binding);
    return previous;
  }

  remove(source: string, pattern: string): Binding | undefined {
    const patterns = this.bySource.get(source);
    const binding = patterns?.get(pattern);

    if (patterns && binding) {
      patterns.delete(pattern);
      if (patterns.size === 0) {
        this.bySource.delete(source);
      }
    }

    return binding;
  }

  get(source: string, pattern: string): Binding | undefined {
    return this.bySource.get(source)?.get(pattern);
  }

  // Ordered by first bind; a rebound pattern keeps its place
  getBySource(source: string): Binding[] {
    const patterns = this.bySource.get(source);
    return patterns ? Array.from(patterns.values()) : [];
  }

  getByDestination(destination: string): Binding[] {
    return this.getAll().filter(b => b.destination === destination);
  }

  removeBySource(source: string): Binding[] {
    const bindings = this.getBySource(source);
    this.bySource.delete(source);
    return bindings;
  }

  removeByDestination(destination: string): Binding[] {
    const bindings = this.getByDestination(destination);
    for (const binding of bindings) {
      this.remove(binding.source, binding.pattern);
    }
    return bindings;
  }

  getAll(): Binding[] {
    const all: Binding[] = [];
    for (const patterns of this.bySource.values()) {
      all.push(...patterns.values());
    }
    return all;
  }
}
