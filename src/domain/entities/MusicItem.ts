import { Album } from './Album';
import { Artist } from './Artist';
import { Playlist } from './Playlist';
import { Song } from './Song';

export type MusicItem = Song | Album | Artist | Playlist;

export type MusicItemType = MusicItem['type'];

export function isSong(item: MusicItem): item is Song {
    return item.type === 'song';
}

/**
 * Stable join key collaborators use for caching and deduplication.
 * Artists without a browse identity have no key.
 */
export function itemKey(item: MusicItem): string | null {
    switch (item.type) {
        case 'song':
            return `song:${item.id}`;
        case 'album':
            return `album:${item.browseId}`;
        case 'playlist':
            return `playlist:${item.id}`;
        case 'artist':
            return item.id ? `artist:${item.id}` : null;
    }
}
