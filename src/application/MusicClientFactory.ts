import { AxiosInstance } from 'axios';
import { Config } from '../config';
import { MusicItem } from '../domain/entities/MusicItem';
import { IInnertubeTransport } from '../domain/ports/IInnertubeTransport';
import { IMetricsPort } from '../domain/ports/IMetricsPort';
import { FixtureLoader } from '../infrastructure/fixtures/FixtureLoader';
import { FixtureTransport } from '../infrastructure/innertube/FixtureTransport';
import { InnertubeTransport } from '../infrastructure/innertube/InnertubeTransport';
import { RequestBuilder } from '../infrastructure/innertube/RequestBuilder';
import { ConsoleMetricsAdapter, NoOpMetricsAdapter } from '../infrastructure/metrics/ConsoleMetricsAdapter';
import { MusicCatalogService } from './MusicCatalogService';
import { Paginator, PageFetcher } from './Paginator';
import { SessionStore } from './SessionStore';

export interface MusicClientOverrides {
    metrics?: IMetricsPort;
    transport?: IInnertubeTransport;
    /** axios instance for the HTTP transport */
    http?: AxiosInstance;
    now?: () => number;
}

export interface MusicClient {
    catalog: MusicCatalogService;
    session: SessionStore;
    metrics: IMetricsPort;
    /** Paginator preconfigured with the configured guard limits */
    paginate<T extends MusicItem>(operation: string, fetchPage: PageFetcher<T>): Paginator<T>;
}

/**
 * Wires session, transport and catalog from configuration.
 */
export function createMusicClient(config: Config, overrides: MusicClientOverrides = {}): MusicClient {
    const metrics = overrides.metrics ?? (config.metrics.enabled
        ? new ConsoleMetricsAdapter({ prefix: config.metrics.prefix })
        : new NoOpMetricsAdapter());

    const { innertube } = config;
    const session = new SessionStore({
        client: {
            clientName: innertube.clientName,
            clientVersion: innertube.clientVersion,
            clientId: innertube.clientId,
            userAgent: innertube.userAgent,
            origin: innertube.origin,
        },
        locale: { hl: innertube.hl, gl: innertube.gl },
        visitorData: innertube.visitorData,
        credentials: innertube.cookie ? { cookie: innertube.cookie } : undefined,
    });

    let transport: IInnertubeTransport;
    if (overrides.transport) {
        transport = overrides.transport;
    } else if (config.testMode) {
        console.log('[Catalog] TEST_MODE enabled, using recorded responses');
        transport = new FixtureTransport(new FixtureLoader(config.fixturesDir));
    } else {
        transport = new InnertubeTransport(session, config.transport, metrics, overrides.http);
    }

    const builder = new RequestBuilder(innertube.baseUrl, overrides.now);
    const catalog = new MusicCatalogService(session, transport, builder, metrics);

    return {
        catalog,
        session,
        metrics,
        paginate: <T extends MusicItem>(operation: string, fetchPage: PageFetcher<T>) => new Paginator<T>(fetchPage, {
            operation,
            metrics,
            maxPages: config.pagination.maxPages,
            maxConsecutiveEmptyPages: config.pagination.maxConsecutiveEmptyPages,
        }),
    };
}
