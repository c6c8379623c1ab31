/**
 * Reference to a playback start (play, shuffle, radio).
 * Never resolved at parse time; resolving one is a later queue request.
 */
export type PlaybackEndpoint = WatchPlaybackEndpoint | WatchPlaylistPlaybackEndpoint;

export interface WatchPlaybackEndpoint {
    type: 'watch';
    videoId?: string;
    playlistId?: string;
    playlistSetVideoId?: string;
    params?: string;
    index?: number;
}

export interface WatchPlaylistPlaybackEndpoint {
    type: 'watchPlaylist';
    playlistId: string;
    params?: string;
}

