import { createAlbum } from '../../domain/entities/Album';
import { createArtist } from '../../domain/entities/Artist';
import { MusicItem } from '../../domain/entities/MusicItem';
import { createPlaylist } from '../../domain/entities/Playlist';
import { createSong } from '../../domain/entities/Song';
import { ClassificationRule, Extraction, extracted, missing } from './extraction';
import {
    firstText,
    parseTime,
    parseYear,
    splitBySeparator,
    toAlbumRef,
    toArtistRef,
    toArtistRefs,
} from './runs';
import { ICON, menuAction, PAGE_TYPE, pageTypeOf, ResponsiveListItemView, Run, toPlaybackEndpoint } from './views';

/**
 * Rules for `musicResponsiveListItemRenderer`: search results and track lists.
 *
 * Column layout:
 *   flexColumns[0]  title
 *   flexColumns[1]  secondary line, split on separators into groups
 *                   song:     [artists] · [album] · [duration]
 *                   album:    [kind] · [artists] · [year]
 *                   playlist: [author] · ... · [song count]
 *   fixedColumns[0] duration on album and playlist track lists
 */

function title(view: ResponsiveListItemView): string | undefined {
    return firstText(view.flexColumns[0]);
}

function secondaryGroups(view: ResponsiveListItemView): Extraction<Run[][]> {
    const line = view.flexColumns[1];
    return line ? extracted(splitBySeparator(line)) : missing('flexColumns[1]');
}

function buildSong(view: ResponsiveListItemView): Extraction<MusicItem> {
    const groups = secondaryGroups(view);
    if (!groups.ok) return groups;

    const id = view.videoId ?? view.navigationEndpoint?.watchEndpoint?.videoId;
    if (!id) return missing('videoId');
    const name = title(view);
    if (!name) return missing('title');
    if (!view.thumbnailUrl) return missing('thumbnail');

    const lastGroup = groups.value[groups.value.length - 1];
    return extracted(createSong({
        id,
        title: name,
        artists: toArtistRefs(groups.value[0]),
        album: toAlbumRef(groups.value[1]?.[0]),
        durationSeconds: parseTime(lastGroup?.[0]?.text) ?? parseTime(firstText(view.fixedColumns[0])),
        thumbnailUrl: view.thumbnailUrl,
        explicit: view.badges.has(ICON.EXPLICIT),
    }));
}

function buildArtist(view: ResponsiveListItemView): Extraction<MusicItem> {
    const id = view.navigationEndpoint?.browseEndpoint?.browseId;
    if (!id) return missing('browseId');
    const name = title(view);
    if (!name) return missing('title');

    return extracted(createArtist({
        id,
        name,
        thumbnailUrl: view.thumbnailUrl,
        shuffleEndpoint: menuAction(view.menu, ICON.SHUFFLE),
        radioEndpoint: menuAction(view.menu, ICON.RADIO),
    }));
}

function buildAlbum(view: ResponsiveListItemView): Extraction<MusicItem> {
    const groups = secondaryGroups(view);
    if (!groups.ok) return groups;

    const browseId = view.navigationEndpoint?.browseEndpoint?.browseId;
    if (!browseId) return missing('browseId');
    const playlistId = toPlaybackEndpoint(view.playEndpoint)?.playlistId;
    if (!playlistId) return missing('playlistId');
    const name = title(view);
    if (!name) return missing('title');
    if (!view.thumbnailUrl) return missing('thumbnail');

    return extracted(createAlbum({
        browseId,
        playlistId,
        title: name,
        artists: toArtistRefs(groups.value[1]),
        year: parseYear(groups.value[2]?.[0]?.text),
        thumbnailUrl: view.thumbnailUrl,
        explicit: view.badges.has(ICON.EXPLICIT),
    }));
}

function buildPlaylist(view: ResponsiveListItemView): Extraction<MusicItem> {
    const groups = secondaryGroups(view);
    if (!groups.ok) return groups;

    const id = view.navigationEndpoint?.browseEndpoint?.browseId?.replace(/^VL/, '');
    if (!id) return missing('browseId');
    const name = title(view);
    if (!name) return missing('title');
    const authorRun = groups.value[0]?.[0];
    if (!authorRun) return missing('author');
    const secondaryLine = view.flexColumns[1];
    const songCountText = secondaryLine[secondaryLine.length - 1]?.text;
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

/**
 * A song row has no browse endpoint; every other kind is told apart by the
 * page type of its browse endpoint.
 */
export const RESPONSIVE_LIST_ITEM_RULES: readonly ClassificationRule<ResponsiveListItemView>[] = [
    {
        kind: 'song',
        matches: (view) => view.navigationEndpoint?.browseEndpoint === undefined,
        build: buildSong,
    },
    {
        kind: 'artist',
        matches: (view) => {
            const pageType = pageTypeOf(view.navigationEndpoint);
            return pageType === PAGE_TYPE.ARTIST || pageType === PAGE_TYPE.LIBRARY_ARTIST;
        },
        build: buildArtist,
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
];
