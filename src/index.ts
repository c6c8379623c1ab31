export { ContinuationCursor } from './domain/entities/ContinuationCursor';
export type { PlaybackEndpoint, WatchPlaybackEndpoint, WatchPlaylistPlaybackEndpoint } from './domain/entities/PlaybackEndpoint';
export type { Artist, ArtistRef } from './domain/entities/Artist';
export type { Album, AlbumRef } from './domain/entities/Album';
export type { Song } from './domain/entities/Song';
export type { Playlist } from './domain/entities/Playlist';
export { isSong, itemKey } from './domain/entities/MusicItem';
export type { MusicItem, MusicItemType } from './domain/entities/MusicItem';
export type { ResultPage } from './domain/entities/ResultPage';
export type { ClientDescriptor, Credentials, Locale, SessionSnapshot } from './domain/entities/SessionContext';
export {
    AuthRequired,
    InnertubeError,
    InvalidParameters,
    SchemaMismatch,
    TransportFailure,
} from './domain/errors/InnertubeErrors';
export type { ItemDropped } from './domain/errors/InnertubeErrors';
export type {
    BrowseParams,
    CatalogCallOptions,
    IMusicCatalog,
    QueueParams,
    RelatedParams,
    SearchFilter,
    SearchParams,
} from './domain/ports/IMusicCatalog';
export type { IMetricsPort, MetricTags } from './domain/ports/IMetricsPort';
export { METRICS } from './domain/ports/IMetricsPort';

export { MusicCatalogService } from './application/MusicCatalogService';
export { SessionStore } from './application/SessionStore';
export { Paginator } from './application/Paginator';
export type { StopReason } from './application/Paginator';
export { createMusicClient } from './application/MusicClientFactory';
export type { MusicClient } from './application/MusicClientFactory';
export { loadConfig, validateConfig } from './config';
export type { Config } from './config';
export {
    ConsoleMetricsAdapter,
    InMemoryMetricsAdapter,
    NoOpMetricsAdapter,
} from './infrastructure/metrics/ConsoleMetricsAdapter';
