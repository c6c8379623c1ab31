/**
 * Metrics Port Interface
 *
 * Contract for client telemetry. Dropped renderer nodes are only ever
 * visible through this port.
 * Implementations: ConsoleMetricsAdapter, NoOpMetricsAdapter, InMemoryMetricsAdapter
 */

export interface MetricTags {
    [key: string]: string | number | boolean;
}

export interface IMetricsPort {
    /**
     * Increment a counter metric.
     * @param name - Metric name (e.g., 'items_dropped')
     * @param tags - Optional tags for filtering/grouping
     * @param value - Increment amount (default: 1)
     */
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /**
     * Record a duration/timing metric.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    /**
     * Record a gauge metric (current value at a point in time).
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void;

    /**
     * Record a histogram metric (distribution of values).
     */
    recordHistogram(name: string, value: number, tags?: MetricTags): void;

    /**
     * Start a timer and return a function to stop it.
     */
    startTimer(name: string, tags?: MetricTags): () => void;

    /**
     * Flush any buffered metrics (for batch sending implementations).
     */
    flush(): Promise<void>;
}

/**
 * Standard metric names for the client.
 */
export const METRICS = {
    // Counters
    REQUESTS_TOTAL: 'requests_total',
    REQUEST_FAILURES_TOTAL: 'request_failures_total',
    RETRIES_TOTAL: 'retries_total',
    ITEMS_PARSED: 'items_parsed',
    ITEMS_DROPPED: 'items_dropped',
    SESSION_UPDATES_TOTAL: 'session_updates_total',
    PAGINATION_STOPPED_TOTAL: 'pagination_stopped_total',

    // Durations
    REQUEST_DURATION: 'request_duration_ms',

    // Histograms
    PAGE_SIZE: 'page_size_items',
} as const;
