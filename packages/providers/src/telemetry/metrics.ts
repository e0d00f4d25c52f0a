/**
 * Named-counter sink. One counter per public operation, plus `retry`.
 */
export interface MetricsSink {
  increment(name: string, by?: number): void;
}

export class InMemoryMetrics implements MetricsSink {
  private counters = new Map<string, number>();

  increment(name: string, by = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  get(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  reset(): void {
    this.counters.clear();
  }
}

// Process-wide sink used when callers do not pass their own
let defaultSink: InMemoryMetrics | null = null;

export function getDefaultMetrics(): InMemoryMetrics {
  if (!defaultSink) {
    defaultSink = new InMemoryMetrics();
  }
  return defaultSink;
}
