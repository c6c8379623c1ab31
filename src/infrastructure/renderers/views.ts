import { PlaybackEndpoint } from '../../domain/entities/PlaybackEndpoint';
import { arrayAt, at, isRecord, JsonRecord, numberAt, recordAt, stringAt } from './json';

/**
 * Typed views over the upstream's renderer objects.
 *
 * This is the only module that knows the upstream's field paths. Everything
 * downstream works on these views; a renamed field is fixed here.
 */

export const PAGE_TYPE = {
    ALBUM: 'MUSIC_PAGE_TYPE_ALBUM',
    AUDIOBOOK: 'MUSIC_PAGE_TYPE_AUDIOBOOK',
    ARTIST: 'MUSIC_PAGE_TYPE_ARTIST',
    LIBRARY_ARTIST: 'MUSIC_PAGE_TYPE_LIBRARY_ARTIST',
    PLAYLIST: 'MUSIC_PAGE_TYPE_PLAYLIST',
    TRACK_RELATED: 'MUSIC_PAGE_TYPE_TRACK_RELATED',
} as const;

export const ICON = {
    EXPLICIT: 'MUSIC_EXPLICIT_BADGE',
    SHUFFLE: 'MUSIC_SHUFFLE',
    RADIO: 'MIX',
} as const;

export interface BrowseEndpoint {
    browseId: string;
    params?: string;
    pageType?: string;
}

export interface WatchEndpoint {
    videoId?: string;
    playlistId?: string;
    playlistSetVideoId?: string;
    params?: string;
    index?: number;
}

export interface WatchPlaylistEndpoint {
    playlistId: string;
    params?: string;
}

export interface NavigationEndpoint {
    browseEndpoint?: BrowseEndpoint;
    watchEndpoint?: WatchEndpoint;
    watchPlaylistEndpoint?: WatchPlaylistEndpoint;
}

/** One styled text fragment */
export interface Run {
    text: string;
    navigationEndpoint?: NavigationEndpoint;
}

export interface MenuItem {
    iconType?: string;
    navigationEndpoint?: NavigationEndpoint;
}

export function readBrowseEndpoint(node: unknown): BrowseEndpoint | undefined {
    const browseId = stringAt(node, 'browseId');
    if (!browseId) return undefined;
    return {
        browseId,
        params: stringAt(node, 'params'),
        pageType: stringAt(
            node,
            'browseEndpointContextSupportedConfigs',
            'browseEndpointContextMusicConfig',
            'pageType'
        ),
    };
}

export function readWatchEndpoint(node: unknown): WatchEndpoint | undefined {
    if (!isRecord(node)) return undefined;
    return {
        videoId: stringAt(node, 'videoId'),
        playlistId: stringAt(node, 'playlistId'),
        playlistSetVideoId: stringAt(node, 'playlistSetVideoId'),
        params: stringAt(node, 'params'),
        index: numberAt(node, 'index'),
    };
}

export function readWatchPlaylistEndpoint(node: unknown): WatchPlaylistEndpoint | undefined {
    const playlistId = stringAt(node, 'playlistId');
    if (!playlistId) return undefined;
    return { playlistId, params: stringAt(node, 'params') };
}

export function readNavigationEndpoint(node: unknown): NavigationEndpoint | undefined {
    if (!isRecord(node)) return undefined;
    const endpoint: NavigationEndpoint = {
        browseEndpoint: readBrowseEndpoint(node.browseEndpoint),
        watchEndpoint: readWatchEndpoint(node.watchEndpoint),
        watchPlaylistEndpoint: readWatchPlaylistEndpoint(node.watchPlaylistEndpoint),
    };
    if (!endpoint.browseEndpoint && !endpoint.watchEndpoint && !endpoint.watchPlaylistEndpoint) {
        return undefined;
    }
    return endpoint;
}

/**
 * Reads `{ runs: [...] }`. Runs without text are skipped.
 */
export function readRuns(node: unknown): Run[] {
    const runs: Run[] = [];
    for (const raw of arrayAt(node, 'runs')) {
        const text = stringAt(raw, 'text');
        if (text === undefined) continue;
        runs.push({ text, navigationEndpoint: readNavigationEndpoint(at(raw, 'navigationEndpoint')) });
    }
    return runs;
}

/**
 * URL of the last (largest) thumbnail of a `{ thumbnails: [...] }` node.
 */
export function readThumbnailUrl(node: unknown): string | undefined {
    const thumbnails = arrayAt(node, 'thumbnails');
    for (let i = thumbnails.length - 1; i >= 0; i--) {
        const url = stringAt(thumbnails[i], 'url');
        if (url) return url;
    }
    return undefined;
}

/**
 * Icon tags of an inline badge list. Order and count do not matter.
 */
export function readBadgeIcons(badges: unknown): Set<string> {
    const icons = new Set<string>();
    if (!Array.isArray(badges)) return icons;
    for (const badge of badges) {
        const iconType = stringAt(badge, 'musicInlineBadgeRenderer', 'icon', 'iconType');
        if (iconType) icons.add(iconType);
    }
    return icons;
}

export function readMenuItems(menu: unknown): MenuItem[] {
    return arrayAt(menu, 'menuRenderer', 'items')
        .map((item) => recordAt(item, 'menuNavigationItemRenderer'))
        .filter((item): item is JsonRecord => item !== undefined)
        .map((item) => ({
            iconType: stringAt(item, 'icon', 'iconType'),
            navigationEndpoint: readNavigationEndpoint(item.navigationEndpoint),
        }));
}

/**
 * Play endpoint of a thumbnail overlay's play button.
 */
export function readPlayButtonEndpoint(overlay: unknown): NavigationEndpoint | undefined {
    return readNavigationEndpoint(
        at(overlay, 'musicItemThumbnailOverlayRenderer', 'content', 'musicPlayButtonRenderer', 'playNavigationEndpoint')
    );
}

/**
 * Converts a navigation endpoint into an opaque playback descriptor.
 * A watch-playlist endpoint wins over a plain watch endpoint.
 */
export function toPlaybackEndpoint(endpoint: NavigationEndpoint | undefined): PlaybackEndpoint | undefined {
    if (endpoint?.watchPlaylistEndpoint) {
        return {
            type: 'watchPlaylist',
            playlistId: endpoint.watchPlaylistEndpoint.playlistId,
            params: endpoint.watchPlaylistEndpoint.params,
        };
    }
    const watch = endpoint?.watchEndpoint;
    if (watch && (watch.videoId || watch.playlistId)) {
        return {
            type: 'watch',
            videoId: watch.videoId,
            playlistId: watch.playlistId,
            playlistSetVideoId: watch.playlistSetVideoId,
            params: watch.params,
            index: watch.index,
        };
    }
    return undefined;
}

/**
 * Playback descriptor of the first menu item carrying the icon tag.
 * Absence means the action is unavailable for the entity.
 */
export function menuAction(menu: MenuItem[], iconType: string): PlaybackEndpoint | undefined {
    const item = menu.find((entry) => entry.iconType === iconType);
    return toPlaybackEndpoint(item?.navigationEndpoint);
}

export function pageTypeOf(endpoint: NavigationEndpoint | undefined): string | undefined {
    return endpoint?.browseEndpoint?.pageType;
}

// ---------------------------------------------------------------------------
// Renderer views
// ---------------------------------------------------------------------------

export interface ResponsiveListItemView {
    flexColumns: Run[][];
    fixedColumns: Run[][];
    videoId?: string;
    navigationEndpoint?: NavigationEndpoint;
    thumbnailUrl?: string;
    badges: Set<string>;
    playEndpoint?: NavigationEndpoint;
    menu: MenuItem[];
}

export function readResponsiveListItem(node: JsonRecord): ResponsiveListItemView {
    return {
        flexColumns: arrayAt(node, 'flexColumns').map((column) =>
            readRuns(at(column, 'musicResponsiveListItemFlexColumnRenderer', 'text'))
        ),
        fixedColumns: arrayAt(node, 'fixedColumns').map((column) =>
            readRuns(at(column, 'musicResponsiveListItemFixedColumnRenderer', 'text'))
        ),
        videoId: stringAt(node, 'playlistItemData', 'videoId'),
        navigationEndpoint: readNavigationEndpoint(node.navigationEndpoint),
        thumbnailUrl: readThumbnailUrl(at(node, 'thumbnail', 'musicThumbnailRenderer', 'thumbnail')),
        badges: readBadgeIcons(node.badges),
        playEndpoint: readPlayButtonEndpoint(node.overlay),
        menu: readMenuItems(node.menu),
    };
}

export interface TwoRowItemView {
    title: Run[];
    subtitle: Run[];
    navigationEndpoint?: NavigationEndpoint;
    thumbnailUrl?: string;
    badges: Set<string>;
    playEndpoint?: NavigationEndpoint;
    menu: MenuItem[];
}

export function readTwoRowItem(node: JsonRecord): TwoRowItemView {
    return {
        title: readRuns(node.title),
        subtitle: readRuns(node.subtitle),
        navigationEndpoint: readNavigationEndpoint(node.navigationEndpoint),
        thumbnailUrl: readThumbnailUrl(at(node, 'thumbnailRenderer', 'musicThumbnailRenderer', 'thumbnail')),
        badges: readBadgeIcons(node.subtitleBadges),
        playEndpoint: readPlayButtonEndpoint(node.thumbnailOverlay),
        menu: readMenuItems(node.menu),
    };
}

export interface PlaylistPanelVideoView {
    videoId?: string;
    title: Run[];
    byline: Run[];
    lengthText?: string;
    thumbnailUrl?: string;
    badges: Set<string>;
    navigationEndpoint?: NavigationEndpoint;
}

export function readPlaylistPanelVideo(node: JsonRecord): PlaylistPanelVideoView {
    const lengthRuns = readRuns(node.lengthText);
    return {
        videoId: stringAt(node, 'videoId'),
        title: readRuns(node.title),
        byline: readRuns(node.longBylineText),
        lengthText: lengthRuns[0]?.text ?? stringAt(node, 'lengthText', 'simpleText'),
        thumbnailUrl: readThumbnailUrl(node.thumbnail),
        badges: readBadgeIcons(node.badges),
        navigationEndpoint: readNavigationEndpoint(node.navigationEndpoint),
    };
}
