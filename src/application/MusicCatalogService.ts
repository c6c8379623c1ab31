import { ContinuationCursor } from '../domain/entities/ContinuationCursor';
import { isSong, MusicItem } from '../domain/entities/MusicItem';
import { createResultPage, emptyResultPage, ResultPage } from '../domain/entities/ResultPage';
import { isAuthenticated } from '../domain/entities/SessionContext';
import { Song } from '../domain/entities/Song';
import { AuthRequired, InvalidParameters, ItemDropped } from '../domain/errors/InnertubeErrors';
import { IInnertubeTransport } from '../domain/ports/IInnertubeTransport';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import {
    BrowseParams,
    CatalogCallOptions,
    IMusicCatalog,
    QueueParams,
    RelatedParams,
    SearchParams,
} from '../domain/ports/IMusicCatalog';
import { NoOpMetricsAdapter } from '../infrastructure/metrics/ConsoleMetricsAdapter';
import { RequestBuilder } from '../infrastructure/innertube/RequestBuilder';
import { findRelatedBrowseId, parsePage, ParsedPage } from '../infrastructure/renderers/RendererAdapter';
import { BROWSE, EndpointDescriptor, QUEUE, SEARCH } from './EndpointCatalog';
import { SessionStore } from './SessionStore';

/**
 * MusicCatalogService - builds requests from the current session, sends them
 * through the transport and maps every response into typed pages.
 *
 * Holds no per-call state, so any number of calls may run concurrently.
 */
export class MusicCatalogService implements IMusicCatalog {
    private readonly session: SessionStore;
    private readonly transport: IInnertubeTransport;
    private readonly builder: RequestBuilder;
    private readonly metrics: IMetricsPort;

    constructor(
        session: SessionStore,
        transport: IInnertubeTransport,
        builder: RequestBuilder,
        metrics: IMetricsPort = new NoOpMetricsAdapter()
    ) {
        this.session = session;
        this.transport = transport;
        this.builder = builder;
        this.metrics = metrics;
    }

    async search(
        params: SearchParams,
        continuation: ContinuationCursor | null = null,
        options: CatalogCallOptions = {}
    ): Promise<ResultPage<MusicItem>> {
        const page = await this.fetch(SEARCH, params, continuation, options);
        return createResultPage(page.items, page.continuation);
    }

    async browse(
        params: BrowseParams,
        continuation: ContinuationCursor | null = null,
        options: CatalogCallOptions = {}
    ): Promise<ResultPage<MusicItem>> {
        const page = await this.fetch(BROWSE, params, continuation, options);
        return createResultPage(page.items, page.continuation);
    }

    async queue(
        params: QueueParams,
        continuation: ContinuationCursor | null = null,
        options: CatalogCallOptions = {}
    ): Promise<ResultPage<Song>> {
        const page = await this.fetch(QUEUE, params, continuation, options);
        return createResultPage(page.items.filter(isSong), page.continuation);
    }

    /**
     * Two steps: `next` names the related tab's browse id, `browse` fills it.
     * Continuations of a related page are plain browse continuations.
     */
    async related(
        params: RelatedParams,
        continuation: ContinuationCursor | null = null,
        options: CatalogCallOptions = {}
    ): Promise<ResultPage<MusicItem>> {
        if (continuation) {
            // continuation requests carry no logical params
            return this.browse({ browseId: 'related' }, continuation, options);
        }
        if (!params.videoId.trim()) {
            throw new InvalidParameters('Related content requires a videoId');
        }

        const request = this.builder.build(
            {
                endpoint: QUEUE.endpoint,
                body: QUEUE.body({ videoId: params.videoId }),
                continuationStyle: QUEUE.continuationStyle,
            },
            this.session.snapshot()
        );
        const response = await this.transport.execute(request, options);
        const browseId = findRelatedBrowseId(response.data, QUEUE.endpoint);

        if (!browseId) {
            console.log(`[Catalog] No related content for ${params.videoId}`);
            return emptyResultPage();
        }
        return this.browse({ browseId }, null, options);
    }

    private async fetch<P>(
        descriptor: EndpointDescriptor<P>,
        params: P,
        continuation: ContinuationCursor | null,
        options: CatalogCallOptions
    ): Promise<ParsedPage> {
        const { endpoint } = descriptor;
        const session = this.session.snapshot();

        if (!continuation && descriptor.requiresAuth(params) && !isAuthenticated(session)) {
            throw new AuthRequired(endpoint, `${endpoint} requires a signed-in session`);
        }

        const request = this.builder.build(
            {
                endpoint,
                body: continuation ? {} : descriptor.body(params),
                continuation,
                continuationStyle: descriptor.continuationStyle,
            },
            session
        );

        const response = await this.transport.execute(request, options);
        const page = parsePage(response.data, descriptor.shape, endpoint);

        this.report(endpoint, page);
        return page;
    }

    private report(endpoint: string, page: ParsedPage): void {
        this.metrics.incrementCounter(METRICS.ITEMS_PARSED, { endpoint }, page.items.length);
        this.metrics.recordHistogram(METRICS.PAGE_SIZE, page.items.length, { endpoint });

        for (const dropped of page.dropped) {
            this.reportDropped(endpoint, dropped);
        }
    }

    private reportDropped(endpoint: string, dropped: ItemDropped): void {
        this.metrics.incrementCounter(METRICS.ITEMS_DROPPED, {
            endpoint,
            renderer: dropped.renderer,
            reason: dropped.reason,
            field: dropped.field ?? 'none',
        });
        const detail = dropped.field ? ` (${dropped.kind ?? 'item'}.${dropped.field})` : '';
        console.debug(`[Catalog] Dropped ${dropped.renderer} from ${endpoint}: ${dropped.reason}${detail}`);
    }
}
