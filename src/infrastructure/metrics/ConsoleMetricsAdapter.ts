/**
 * Metrics adapters for the catalog client.
 *
 * Console and in-memory adapters share one recording path so that both see
 * the same metric shape: `{ type, name, value, tags }`.
 */

import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

export type MetricType = 'counter' | 'duration' | 'gauge' | 'histogram';

export interface RecordedMetric {
    type: MetricType;
    name: string;
    value: number;
    tags: MetricTags;
}

abstract class RecordingMetricsAdapter implements IMetricsPort {
    protected abstract record(metric: RecordedMetric): void;

    incrementCounter(name: string, tags: MetricTags = {}, value: number = 1): void {
        this.record({ type: 'counter', name, value, tags });
    }

    recordDuration(name: string, durationMs: number, tags: MetricTags = {}): void {
        this.record({ type: 'duration', name, value: durationMs, tags });
    }

    recordGauge(name: string, value: number, tags: MetricTags = {}): void {
        this.record({ type: 'gauge', name, value, tags });
    }

    recordHistogram(name: string, value: number, tags: MetricTags = {}): void {
        this.record({ type: 'histogram', name, value, tags });
    }

    startTimer(name: string, tags: MetricTags = {}): () => void {
        const startTime = Date.now();
        return () => this.recordDuration(name, Date.now() - startTime, tags);
    }

    async flush(): Promise<void> { }
}

export interface ConsoleMetricsOptions {
    /** Namespace joined to every metric name with a dot. Empty string disables it. */
    prefix?: string;
    enabled?: boolean;
    logLevel?: 'debug' | 'info';
}

export const DEFAULT_METRICS_PREFIX = 'innertube';

/**
 * One `[Metrics] {...}` JSON line per metric. Tags are written in key order
 * so lines for the same endpoint/renderer/reason series compare equal.
 */
export class ConsoleMetricsAdapter extends RecordingMetricsAdapter {
    private readonly prefix: string;
    private readonly enabled: boolean;
    private readonly logLevel: 'debug' | 'info';

    constructor(options?: ConsoleMetricsOptions) {
        super();
        this.prefix = options?.prefix ?? DEFAULT_METRICS_PREFIX;
        this.enabled = options?.enabled ?? true;
        this.logLevel = options?.logLevel || 'info';
    }

    protected record(metric: RecordedMetric): void {
        if (!this.enabled) return;

        const line = {
            type: metric.type,
            name: this.prefix ? `${this.prefix}.${metric.name}` : metric.name,
            value: metric.value,
            tags: sortTags(metric.tags),
            timestamp: new Date().toISOString(),
        };

        const logFn = this.logLevel === 'debug' ? console.debug : console.log;
        logFn(`[Metrics] ${JSON.stringify(line)}`);
    }
}

function sortTags(tags: MetricTags): MetricTags {
    const sorted: MetricTags = {};
    for (const key of Object.keys(tags).sort()) {
        sorted[key] = tags[key];
    }
    return sorted;
}

/**
 * Used when METRICS_ENABLED=false and as the default for components built
 * without a metrics port.
 */
export class NoOpMetricsAdapter implements IMetricsPort {
    incrementCounter(): void { }
    recordDuration(): void { }
    recordGauge(): void { }
    recordHistogram(): void { }
    startTimer(): () => void { return () => { }; }
    async flush(): Promise<void> { }
}

/**
 * Keeps every metric in memory. Lets callers and tests observe dropped items.
 */
export class InMemoryMetricsAdapter extends RecordingMetricsAdapter {
    readonly records: RecordedMetric[] = [];

    protected record(metric: RecordedMetric): void {
        this.records.push(metric);
    }

    /** Sum of a counter, optionally restricted to records carrying the given tags */
    counter(name: string, tags: MetricTags = {}): number {
        return this.records
            .filter(record => record.type === 'counter' && record.name === name)
            .filter(record => Object.entries(tags).every(([key, value]) => record.tags[key] === value))
            .reduce((sum, record) => sum + record.value, 0);
    }
}
