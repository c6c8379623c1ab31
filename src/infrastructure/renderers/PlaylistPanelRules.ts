import { createSong } from '../../domain/entities/Song';
import { MusicItem } from '../../domain/entities/MusicItem';
import { ClassificationRule, Extraction, extracted, missing } from './extraction';
import { firstText, parseTime, splitBySeparator, toAlbumRef, toArtistRefs } from './runs';
import { ICON, PlaylistPanelVideoView } from './views';

/**
 * `playlistPanelVideoRenderer`: one entry of a watch queue. Always a song.
 * Byline: [artists] · [album] · [year]
 */
function buildQueuedSong(view: PlaylistPanelVideoView): Extraction<MusicItem> {
    const id = view.videoId ?? view.navigationEndpoint?.watchEndpoint?.videoId;
    if (!id) return missing('videoId');
    const name = firstText(view.title);
    if (!name) return missing('title');
    if (!view.thumbnailUrl) return missing('thumbnail');

    const groups = splitBySeparator(view.byline);
    return extracted(createSong({
        id,
        title: name,
        artists: toArtistRefs(groups[0]),
        album: toAlbumRef(groups[1]?.[0]),
        durationSeconds: parseTime(view.lengthText),
        thumbnailUrl: view.thumbnailUrl,
        explicit: view.badges.has(ICON.EXPLICIT),
    }));
}

export const PLAYLIST_PANEL_RULES: readonly ClassificationRule<PlaylistPanelVideoView>[] = [
    {
        kind: 'song',
        matches: () => true,
        build: buildQueuedSong,
    },
];
