import { ArtistRef } from './Artist';

/**
 * Album reference inside a song byline.
 */
export interface AlbumRef {
    readonly id: string;
    readonly name: string;
}

export interface Album {
    readonly type: 'album';
    /** Browse id of the album page */
    readonly browseId: string;
    /** Playback collection id used to resolve the track list */
    readonly playlistId: string;
    readonly title: string;
    readonly artists: readonly ArtistRef[];
    readonly year?: number;
    readonly thumbnailUrl: string;
    readonly explicit: boolean;
}

export function createAlbumRef(name: string, id: string): AlbumRef {
    return Object.freeze({ id, name });
}

export function createAlbum(params: {
    browseId: string;
    playlistId: string;
    title: string;
    artists: ArtistRef[];
    year?: number;
    thumbnailUrl: string;
    explicit: boolean;
}): Album {
    if (!params.browseId) {
        throw new Error('Album browseId cannot be empty');
    }
    if (!params.playlistId) {
        throw new Error('Album playlistId cannot be empty');
    }

    return Object.freeze({
        type: 'album' as const,
        browseId: params.browseId,
        playlistId: params.playlistId,
        title: params.title,
        artists: Object.freeze([...params.artists]),
        year: params.year,
        thumbnailUrl: params.thumbnailUrl,
        explicit: params.explicit,
    });
}
