import { ContinuationCursor } from '../domain/entities/ContinuationCursor';
import { MusicItem } from '../domain/entities/MusicItem';
import { ResultPage } from '../domain/entities/ResultPage';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { NoOpMetricsAdapter } from '../infrastructure/metrics/ConsoleMetricsAdapter';

export type PageFetcher<T extends MusicItem> = (continuation: ContinuationCursor | null) => Promise<ResultPage<T>>;

/**
 * Why a paginator stopped. Only 'exhausted' means the upstream ran out.
 */
export type StopReason = 'exhausted' | 'max-pages' | 'repeated-cursor' | 'empty-pages';

export interface PaginatorOptions {
    maxPages: number;
    /** Consecutive empty pages that still carry a cursor */
    maxConsecutiveEmptyPages: number;
    /** Label for logs and metrics */
    operation: string;
    metrics: IMetricsPort;
}

const DEFAULT_OPTIONS: PaginatorOptions = {
    maxPages: 20,
    maxConsecutiveEmptyPages: 3,
    operation: 'catalog',
    metrics: new NoOpMetricsAdapter(),
};

/**
 * Pulls successive pages of one operation, following continuation cursors
 * until the upstream stops returning one or a guard trips.
 *
 * @example
 * const pages = new Paginator((cursor) => catalog.search({ query: 'jazz' }, cursor), { maxPages: 5 });
 * const items = await pages.collect();
 */
export class Paginator<T extends MusicItem> {
    private readonly options: PaginatorOptions;
    private readonly seenTokens = new Set<string>();
    private cursor: ContinuationCursor | null = null;
    private pageCount = 0;
    private emptyStreak = 0;
    private reason: StopReason | null = null;

    constructor(private readonly fetchPage: PageFetcher<T>, options: Partial<PaginatorOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    get stopReason(): StopReason | null {
        return this.reason;
    }

    get done(): boolean {
        return this.reason !== null;
    }

    get pagesFetched(): number {
        return this.pageCount;
    }

    /**
     * @returns the next page, or null once stopped
     */
    async next(): Promise<ResultPage<T> | null> {
        if (this.reason) return null;
        if (this.pageCount >= this.options.maxPages) {
            this.stop('max-pages');
            return null;
        }

        const page = await this.fetchPage(this.cursor);
        this.pageCount++;
        this.emptyStreak = page.items.length === 0 ? this.emptyStreak + 1 : 0;

        const next = page.continuation;
        if (!next) {
            this.stop('exhausted');
        } else if (this.seenTokens.has(next.token)) {
            this.stop('repeated-cursor');
        } else if (this.emptyStreak >= this.options.maxConsecutiveEmptyPages) {
            this.stop('empty-pages');
        } else if (this.pageCount >= this.options.maxPages) {
            this.stop('max-pages');
        } else {
            this.seenTokens.add(next.token);
            this.cursor = next;
        }

        return page;
    }

    async collect(): Promise<T[]> {
        const items: T[] = [];
        for (let page = await this.next(); page; page = await this.next()) {
            items.push(...page.items);
        }
        return items;
    }

    private stop(reason: StopReason): void {
        this.reason = reason;
        if (reason === 'exhausted') return;

        console.warn(`[Paginator] Stopped ${this.options.operation} after ${this.pageCount} page(s): ${reason}`);
        this.options.metrics.incrementCounter(METRICS.PAGINATION_STOPPED_TOTAL, {
            operation: this.options.operation,
            reason,
        });
    }
}
