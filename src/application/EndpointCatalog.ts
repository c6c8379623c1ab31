import { InvalidParameters } from '../domain/errors/InnertubeErrors';
import {
    BrowseParams,
    QueueParams,
    SearchFilter,
    SearchParams,
} from '../domain/ports/IMusicCatalog';
import { ContinuationStyle } from '../infrastructure/innertube/RequestBuilder';
import {
    BROWSE_PAGE,
    PageShape,
    QUEUE_PAGE,
    SEARCH_PAGE,
} from '../infrastructure/renderers/RendererAdapter';

/**
 * Opaque filter params understood by the search endpoint.
 */
export const SEARCH_FILTER_PARAMS: Readonly<Record<SearchFilter, string>> = {
    songs: 'EgWKAQIIAWoKEAkQBRAKEAMQBA%3D%3D',
    videos: 'EgWKAQIQAWoKEAkQChAFEAMQBA%3D%3D',
    albums: 'EgWKAQIYAWoKEAkQChAFEAMQBA%3D%3D',
    artists: 'EgWKAQIgAWoKEAkQChAFEAMQBA%3D%3D',
    featuredPlaylists: 'EgeKAQQoADgBagwQDhAKEAMQBRAJEAQ%3D',
    communityPlaylists: 'EgeKAQQoAEABagoQAxAEEAoQCRAF',
};

export function isSearchFilter(value: string): value is SearchFilter {
    return Object.prototype.hasOwnProperty.call(SEARCH_FILTER_PARAMS, value);
}

const LIBRARY_BROWSE_PREFIXES = ['FEmusic_library', 'FEmusic_liked'];
const LIBRARY_BROWSE_IDS = new Set(['VLLM']);

export function browseRequiresAuth(browseId: string): boolean {
    return LIBRARY_BROWSE_IDS.has(browseId)
        || LIBRARY_BROWSE_PREFIXES.some((prefix) => browseId.startsWith(prefix));
}

/**
 * Everything the service needs to know about one upstream operation.
 */
export interface EndpointDescriptor<P> {
    endpoint: string;
    shape: PageShape;
    continuationStyle: ContinuationStyle;
    requiresAuth(params: P): boolean;
    /** Logical body fields; throws InvalidParameters for unusable input */
    body(params: P): Record<string, unknown>;
}

export const SEARCH: EndpointDescriptor<SearchParams> = {
    endpoint: 'search',
    shape: SEARCH_PAGE,
    continuationStyle: { placement: 'query' },
    requiresAuth: () => false,
    body: ({ query, filter }) => {
        if (!query.trim()) {
            throw new InvalidParameters('Search query must not be empty');
        }
        const body: Record<string, unknown> = { query };
        if (filter) {
            body.params = SEARCH_FILTER_PARAMS[filter];
        }
        return body;
    },
};

export const BROWSE: EndpointDescriptor<BrowseParams> = {
    endpoint: 'browse',
    shape: BROWSE_PAGE,
    continuationStyle: { placement: 'query', type: 'next' },
    requiresAuth: ({ browseId }) => browseRequiresAuth(browseId),
    body: ({ browseId, params }) => {
        if (!browseId.trim()) {
            throw new InvalidParameters('Browse id must not be empty');
        }
        const body: Record<string, unknown> = { browseId };
        if (params) body.params = params;
        return body;
    },
};

export const QUEUE: EndpointDescriptor<QueueParams> = {
    endpoint: 'next',
    shape: QUEUE_PAGE,
    continuationStyle: { placement: 'body' },
    requiresAuth: () => false,
    body: ({ videoId, playlistId, playlistSetVideoId, params, index }) => {
        if (!videoId && !playlistId) {
            throw new InvalidParameters('Queue requires a videoId or a playlistId');
        }
        const body: Record<string, unknown> = {
            enablePersistentPlaylistPanel: true,
            isAudioOnly: true,
            tunerSettingValue: 'AUTOMIX_SETTING_NORMAL',
        };
        if (videoId) body.videoId = videoId;
        if (playlistId) body.playlistId = playlistId;
        if (playlistSetVideoId) body.playlistSetVideoId = playlistSetVideoId;
        if (params) body.params = params;
        if (index !== undefined) body.index = index;
        return body;
    },
};
