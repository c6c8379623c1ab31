import { createAlbum } from '../../domain/entities/Album';
import { createArtist } from '../../domain/entities/Artist';
import { MusicItem } from '../../domain/entities/MusicItem';
import { createPlaylist } from '../../domain/entities/Playlist';
import { createSong } from '../../domain/entities/Song';
import { ClassificationRule, Extraction, extracted, missing } from './extraction';
import { firstText, parseYear, splitBySeparator, toAlbumRef, toArtistRef, toArtistRefs } from './runs';
import { ICON, menuAction, PAGE_TYPE, pageTypeOf, Run, toPlaybackEndpoint, TwoRowItemView } from './views';

/**
 * Rules for `musicTwoRowItemRenderer`: carousel cards on home, artist and
 * related pages. The subtitle is split the same way as a list item's
 * secondary line:
 *   song:     [artists] · [views or album]
 *   album:    [kind] · [artists] · [year]
 *   playlist: [kind] · [author] · [song count]   (kind is omitted on some shelves)
 */

function runsWithPageType(runs: Run[], pageTypes: string[]): Run[] {
    return runs.filter((run) => {
        const pageType = run.navigationEndpoint?.browseEndpoint?.pageType;
        return pageType !== undefined && pageTypes.includes(pageType);
    });
}

function buildSong(view: TwoRowItemView): Extraction<MusicItem> {
    const id = view.navigationEndpoint?.watchEndpoint?.videoId;
    if (!id) return missing('videoId');
    const name = firstText(view.title);
    if (!name) return missing('title');
    if (!view.thumbnailUrl) return missing('thumbnail');

    const groups = splitBySeparator(view.subtitle);
    const albumRun = runsWithPageType(view.subtitle, [PAGE_TYPE.ALBUM])[0];
    return extracted(createSong({
        id,
        title: name,
        artists: toArtistRefs(groups[0]),
        album: toAlbumRef(albumRun),
        thumbnailUrl: view.thumbnailUrl,
        explicit: view.badges.has(ICON.EXPLICIT),
    }));
}

function buildAlbum(view: TwoRowItemView): Extraction<MusicItem> {
    const browseId = view.navigationEndpoint?.browseEndpoint?.browseId;
    if (!browseId) return missing('browseId');
    const playlistId = toPlaybackEndpoint(view.playEndpoint)?.playlistId;
    if (!playlistId) return missing('playlistId');
    const name = firstText(view.title);
    if (!name) return missing('title');
    if (!view.thumbnailUrl) return missing('thumbnail');

    const groups = splitBySeparator(view.subtitle);
    const yearGroup = groups.length - 1;
    const year = parseYear(groups[yearGroup]?.[0]?.text);
    // "Album · 2023": the second group is the year, not an artist
    const artistGroup = year !== undefined && yearGroup === 1 ? undefined : groups[1];
    const linkedArtists = runsWithPageType(view.subtitle, [PAGE_TYPE.ARTIST, PAGE_TYPE.LIBRARY_ARTIST]);
    const artists = linkedArtists.length > 0 ? linkedArtists.map(toArtistRef) : toArtistRefs(artistGroup);

    return extracted(createAlbum({
        browseId,
        playlistId,
        title: name,
        artists,
        year,
        thumbnailUrl: view.thumbnailUrl,
        explicit: view.badges.has(ICON.EXPLICIT),
    }));
}

function buildPlaylist(view: TwoRowItemView): Extraction<MusicItem> {
    const id = view.navigationEndpoint?.browseEndpoint?.browseId?.replace(/^VL/, '');
    if (!id) return missing('browseId');
    const name = firstText(view.title);
    if (!name) return missing('title');

    const groups = splitBySeparator(view.subtitle);
    if (groups.length < 2) return missing('songCountText');
    const authorRun = groups.length >= 3 ? groups[1][0] : groups[0][0];
    if (!authorRun) return missing('author');
    const songCountText = firstText(groups[groups.length - 1]);
    if (!songCountText) return missing('songCountText');
    if (!view.thumbnailUrl) return missing('thumbnail');
    const playEndpoint = toPlaybackEndpoint(view.playEndpoint);
    if (!playEndpoint) return missing('playEndpoint');

    return extracted(createPlaylist({
        id,
        title: name,
        author: toArtistRef(authorRun),
        songCountText,
        thumbnailUrl: view.thumbnailUrl,
        playEndpoint,
        shuffleEndpoint: menuAction(view.menu, ICON.SHUFFLE),
        radioEndpoint: menuAction(view.menu, ICON.RADIO),
    }));
}

function buildArtist(view: TwoRowItemView): Extraction<MusicItem> {
    const id = view.navigationEndpoint?.browseEndpoint?.browseId;
    if (!id) return missing('browseId');
    const name = firstText(view.title);
    if (!name) return missing('title');

    return extracted(createArtist({
        id,
        name,
        thumbnailUrl: view.thumbnailUrl,
        shuffleEndpoint: menuAction(view.menu, ICON.SHUFFLE),
        radioEndpoint: menuAction(view.menu, ICON.RADIO),
    }));
}

/**
 * A card that starts playback directly is a song; the rest are told apart by
 * the page type of the card's browse endpoint.
 */
export const TWO_ROW_ITEM_RULES: readonly ClassificationRule<TwoRowItemView>[] = [
    {
        kind: 'song',
        matches: (view) =>
            view.navigationEndpoint?.browseEndpoint === undefined &&
            view.navigationEndpoint?.watchEndpoint !== undefined,
        build: buildSong,
    },
    {
        kind: 'album',
        matches: (view) => {
            const pageType = pageTypeOf(view.navigationEndpoint);
            return pageType === PAGE_TYPE.ALBUM || pageType === PAGE_TYPE.AUDIOBOOK;
        },
        build: buildAlbum,
    },
    {
        kind: 'playlist',
        matches: (view) => pageTypeOf(view.navigationEndpoint) === PAGE_TYPE.PLAYLIST,
        build: buildPlaylist,
    },
    {
        kind: 'artist',
        matches: (view) => {
            const pageType = pageTypeOf(view.navigationEndpoint);
            return pageType === PAGE_TYPE.ARTIST || pageType === PAGE_TYPE.LIBRARY_ARTIST;
        },
        build: buildArtist,
    },
];
