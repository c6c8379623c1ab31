import { ContinuationCursor } from '../entities/ContinuationCursor';
import { MusicItem } from '../entities/MusicItem';
import { ResultPage } from '../entities/ResultPage';
import { Song } from '../entities/Song';

export type SearchFilter =
    | 'songs'
    | 'videos'
    | 'albums'
    | 'artists'
    | 'featuredPlaylists'
    | 'communityPlaylists';

export interface SearchParams {
    query: string;
    filter?: SearchFilter;
}

export interface BrowseParams {
    /** Channel, album, playlist ("VL…") or feed browse id */
    browseId: string;
    params?: string;
}

/**
 * Same fields as a watch playback endpoint, so a parsed PlaybackEndpoint can
 * be passed straight through.
 */
export interface QueueParams {
    videoId?: string;
    playlistId?: string;
    playlistSetVideoId?: string;
    params?: string;
    index?: number;
}

export interface RelatedParams {
    videoId: string;
}

export interface CatalogCallOptions {
    signal?: AbortSignal;
}

/**
 * IMusicCatalog - The only interface exposed to collaborators.
 * Every call returns typed entities plus an optional cursor, never a raw response.
 * Pass the cursor of the previous page to resume the same operation.
 */
export interface IMusicCatalog {
    search(
        params: SearchParams,
        continuation?: ContinuationCursor | null,
        options?: CatalogCallOptions
    ): Promise<ResultPage<MusicItem>>;

    browse(
        params: BrowseParams,
        continuation?: ContinuationCursor | null,
        options?: CatalogCallOptions
    ): Promise<ResultPage<MusicItem>>;

    queue(
        params: QueueParams,
        continuation?: ContinuationCursor | null,
        options?: CatalogCallOptions
    ): Promise<ResultPage<Song>>;

    related(
        params: RelatedParams,
        continuation?: ContinuationCursor | null,
        options?: CatalogCallOptions
    ): Promise<ResultPage<MusicItem>>;
}
