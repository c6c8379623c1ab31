import { PlaybackEndpoint } from './PlaybackEndpoint';

/**
 * Name plus optional browse identity, as found in a byline run.
 */
export interface ArtistRef {
    /** Channel browse id, or null when the upstream exposes a bare name */
    readonly id: string | null;
    readonly name: string;
}

export interface Artist extends ArtistRef {
    readonly type: 'artist';
    readonly thumbnailUrl?: string;
    readonly shuffleEndpoint?: PlaybackEndpoint;
    readonly radioEndpoint?: PlaybackEndpoint;
}

export function createArtistRef(name: string, id?: string | null): ArtistRef {
    return Object.freeze({ id: id ?? null, name });
}

export function createArtist(params: {
    id: string | null;
    name: string;
    thumbnailUrl?: string;
    shuffleEndpoint?: PlaybackEndpoint;
    radioEndpoint?: PlaybackEndpoint;
}): Artist {
    if (!params.name.trim()) {
        throw new Error('Artist name cannot be empty');
    }

    return Object.freeze({
        type: 'artist' as const,
        id: params.id,
        name: params.name,
        thumbnailUrl: params.thumbnailUrl,
        shuffleEndpoint: params.shuffleEndpoint,
        radioEndpoint: params.radioEndpoint,
    });
}
