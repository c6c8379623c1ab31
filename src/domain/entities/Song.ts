import { AlbumRef } from './Album';
import { ArtistRef } from './Artist';

/**
 * A playable track.
 */
export interface Song {
    readonly type: 'song';
    /** Video id */
    readonly id: string;
    readonly title: string;
    readonly artists: readonly ArtistRef[];
    readonly album?: AlbumRef;
    /** Absent when the upstream omits a duration */
    readonly durationSeconds?: number;
    readonly thumbnailUrl: string;
    readonly explicit: boolean;
}

export function createSong(params: {
    id: string;
    title: string;
    artists: ArtistRef[];
    album?: AlbumRef;
    durationSeconds?: number;
    thumbnailUrl: string;
    explicit: boolean;
}): Song {
    if (!params.id) {
        throw new Error('Song id cannot be empty');
    }
    if (params.durationSeconds !== undefined && params.durationSeconds < 0) {
        throw new Error('Song durationSeconds must be non-negative');
    }

    return Object.freeze({
        type: 'song' as const,
        id: params.id,
        title: params.title,
        artists: Object.freeze([...params.artists]),
        album: params.album,
        durationSeconds: params.durationSeconds,
        thumbnailUrl: params.thumbnailUrl,
        explicit: params.explicit,
    });
}
