/**
 * In-process metrics for detection runs
 */

import { MetricEvent } from '../types/index.js';

interface RingBuffer {
  events: Array<MetricEvent | undefined>;
  head: number;
  size: number;
}

export interface MetricStats {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
}

export class MetricsCollector {
  private static instance: MetricsCollector;
  private buffers: Map<string, RingBuffer> = new Map();
  private readonly capacity = 1000;

  private constructor() {}

  static getInstance(): MetricsCollector {
    if (!MetricsCollector.instance) {
      MetricsCollector.instance = new MetricsCollector();
    }
    return MetricsCollector.instance;
  }

  counter(name: string, value: number = 1, tags?: Record<string, string>): void {
    this.record({ name, value, type: 'counter', timestamp: Date.now(), tags });
  }

  increment(name: string, tags?: Record<string, string>): void {
    this.counter(name, 1, tags);
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    this.record({ name, value, type: 'gauge', timestamp: Date.now(), tags });
  }

  histogram(name: string, value: number, tags?: Record<string, string>): void {
    this.record({ name, value, type: 'histogram', timestamp: Date.now(), tags });
  }

  /**
   * O(1) append; the oldest event is overwritten once a name holds `capacity` events.
   */
  private record(event: MetricEvent): void {
    let ring = this.buffers.get(event.name);
    if (!ring) {
      ring = { events: new Array<MetricEvent | undefined>(this.capacity), head: 0, size: 0 };
      this.buffers.set(event.name, ring);
    }

    const tail = (ring.head + ring.size) % this.capacity;
    ring.events[tail] = event;

    if (ring.size < this.capacity) {
      ring.size++;
    } else {
      ring.head = (ring.head + 1) % this.capacity;
    }
  }

  private drain(ring: RingBuffer): MetricEvent[] {
    const result: MetricEvent[] = [];
    for (let offset = 0; offset < ring.size; offset++) {
      const event = ring.events[(ring.head + offset) % this.capacity];
      if (event) result.push(event);
    }
    return result;
  }

  getMetrics(name?: string): MetricEvent[] {
    if (name) {
      const ring = this.buffers.get(name);
      return ring ? this.drain(ring) : [];
    }

    const all: MetricEvent[] = [];
    for (const ring of this.buffers.values()) {
      all.push(...this.drain(ring));
    }
    return all;
  }

  getNames(): string[] {
    return [...this.buffers.keys()].sort();
  }

  getStats(name: string, tags?: Record<string, string>): MetricStats | null {
    const events = this.getMetrics(name).filter((event) => matchesTags(event, tags));
    if (events.length === 0) return null;

    const values = events.map((event) => event.value).sort((a, b) => a - b);
    const sum = values.reduce((acc, value) => acc + value, 0);

    return {
      count: values.length,
      sum,
      min: values[0],
      max: values[values.length - 1],
      mean: sum / values.length,
      p50: nearestRank(values, 0.5),
      p95: nearestRank(values, 0.95),
      p99: nearestRank(values, 0.99),
    };
  }

  summary(): Record<string, MetricStats> {
    const result: Record<string, MetricStats> = {};
    for (const name of this.getNames()) {
      const stats = this.getStats(name);
      if (stats) result[name] = stats;
    }
    return result;
  }

  clear(): void {
    this.buffers.clear();
  }
}

function matchesTags(event: MetricEvent, tags?: Record<string, string>): boolean {
  if (!tags) return true;
  return Object.entries(tags).every(([key, value]) => event.tags?.[key] === value);
}

function nearestRank(sortedValues: number[], p: number): number {
  const index = Math.ceil(sortedValues.length * p) - 1;
  return sortedValues[Math.max(0, index)];
}

// Global metrics collector
export const metrics = MetricsCollector.getInstance();
