import { Injectable } from '@nestjs/common';

export type MetricLabels = Record<string, string>;

export interface CounterSample {
  name: string;
  labels: MetricLabels;
  value: number;
}

/**
 * Process-local counters for the non-fatal conditions of the serving path
 * (dropped shadow logs, retried writes, stale quotes, calibration alerts).
 */
@Injectable()
export class MetricsService {
  private readonly counters = new Map<string, CounterSample>();

  increment(name: string, labels: MetricLabels = {}, by: number = 1): void {
    const key = this.keyOf(name, labels);
    const sample = this.counters.get(key);

    if (sample) {
      sample.value += by;
    } else {
      this.counters.set(key, { name, labels: { ...labels }, value: by });
    }
  }

  get(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(this.keyOf(name, labels))?.value ?? 0;
  }

  /** Sum of a counter across every label set. */
  total(name: string): number {
    let sum = 0;
    for (const sample of this.counters.values()) {
      if (sample.name === name) sum += sample.value;
    }
    return sum;
  }

  snapshot(): CounterSample[] {
    return Array.from(this.counters.values())
      .map(sample => ({ ...sample, labels: { ...sample.labels } }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  private keyOf(name: string, labels: MetricLabels): string {
    const labelPart = Object.keys(labels)
      .sort()
      .map(key => `${key}=${labels[key]}`)
      .join(',');
    return `${name}{${labelPart}}`;
  }
}
