import { ArtistRef } from './Artist';
import { PlaybackEndpoint } from './PlaybackEndpoint';

export interface Playlist {
    readonly type: 'playlist';
    /** Playlist id without the browse "VL" prefix */
    readonly id: string;
    readonly title: string;
    readonly author: ArtistRef;
    /** Display string such as "52 songs"; the upstream never sends a number */
    readonly songCountText: string;
    readonly thumbnailUrl: string;
    readonly playEndpoint: PlaybackEndpoint;
    readonly shuffleEndpoint?: PlaybackEndpoint;
    readonly radioEndpoint?: PlaybackEndpoint;
}

export function createPlaylist(params: {
    id: string;
    title: string;
    author: ArtistRef;
    songCountText: string;
    thumbnailUrl: string;
    playEndpoint: PlaybackEndpoint;
    shuffleEndpoint?: PlaybackEndpoint;
    radioEndpoint?: PlaybackEndpoint;
}): Playlist {
    if (!params.id) {
        throw new Error('Playlist id cannot be empty');
    }

    return Object.freeze({
        type: 'playlist' as const,
        id: params.id,
        title: params.title,
        author: params.author,
        songCountText: params.songCountText,
        thumbnailUrl: params.thumbnailUrl,
        playEndpoint: params.playEndpoint,
        shuffleEndpoint: params.shuffleEndpoint,
        radioEndpoint: params.radioEndpoint,
    });
}
