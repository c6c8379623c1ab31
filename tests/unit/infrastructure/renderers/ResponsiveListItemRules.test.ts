import { MusicItem } from '../../../../src/domain/entities/MusicItem';
import { recordAt } from '../../../../src/infrastructure/renderers/json';
import { NodeOutcome, RESPONSIVE_LIST_ITEM } from '../../../../src/infrastructure/renderers/RendererAdapter';
import { RESPONSIVE_LIST_ITEM_RULES } from '../../../../src/infrastructure/renderers/ResponsiveListItemRules';
import { readResponsiveListItem } from '../../../../src/infrastructure/renderers/views';
import {
    browseEndpoint,
    link,
    menu,
    Node,
    PAGE,
    responsiveItem,
    SEP,
    text,
} from '../../../helpers/innertubeNodes';

function rendererOf(node: Node) {
    const renderer = recordAt(node, RESPONSIVE_LIST_ITEM.key);
    if (!renderer) throw new Error('not a list item node');
    return renderer;
}

function mapNode(node: Node): NodeOutcome {
    return RESPONSIVE_LIST_ITEM.map(rendererOf(node));
}

function mapItem(node: Node): MusicItem {
    const outcome = mapNode(node);
    if (!outcome.ok) {
        throw new Error(`node dropped: ${JSON.stringify(outcome.dropped)}`);
    }
    return outcome.item;
}

const SHUFFLE = { watchPlaylistEndpoint: { playlistId: 'RDAOshuffle', params: 'wAEB8gECKAE%3D' } };
const RADIO = { watchPlaylistEndpoint: { playlistId: 'RDEMradio', params: 'wAEB' } };

const songNode = responsiveItem({
    title: 'Song One',
    secondary: [
        link('Artist A', 'UC_A', PAGE.ARTIST),
        text(' & '),
        link('Artist B', 'UC_B', PAGE.ARTIST),
        SEP,
        link('Album X', 'MPREb_X', PAGE.ALBUM),
        SEP,
        text('3:45'),
    ],
    videoId: 'vid1',
    thumbnail: 'https://img.test/vid1.jpg',
    explicit: true,
});

const artistNode = responsiveItem({
    title: 'Artist A',
    secondary: [text('Artist'), SEP, text('1.2M subscribers')],
    navigation: browseEndpoint('UC_A', PAGE.ARTIST),
    thumbnail: 'https://img.test/artist-a.jpg',
    menu: menu([
        { iconType: 'MUSIC_SHUFFLE', endpoint: SHUFFLE },
        { iconType: 'MIX', endpoint: RADIO },
    ]),
});

const albumNode = responsiveItem({
    title: 'Album X',
    secondary: [text('Album'), SEP, link('Artist A', 'UC_A', PAGE.ARTIST), SEP, text('2021')],
    navigation: browseEndpoint('MPREb_X', PAGE.ALBUM),
    thumbnail: 'https://img.test/album-x.jpg',
    play: { watchPlaylistEndpoint: { playlistId: 'OLAK5uy_X' } },
});

const playlistNode = responsiveItem({
    title: 'Road Trip',
    secondary: [text('Some Curator'), SEP, text('52 songs')],
    navigation: browseEndpoint('VLPL123', PAGE.PLAYLIST),
    thumbnail: 'https://img.test/pl123.jpg',
    play: { watchPlaylistEndpoint: { playlistId: 'PL123' } },
});

describe('ResponsiveListItemRules', () => {
    describe('classification', () => {
        it.each([
            ['song', songNode],
            ['artist', artistNode],
            ['album', albumNode],
            ['playlist', playlistNode],
        ])('matches exactly one rule for a %s row', (kind, node) => {
            const view = readResponsiveListItem(rendererOf(node));
            const matching = RESPONSIVE_LIST_ITEM_RULES.filter((rule) => rule.matches(view));

            expect(matching.map((rule) => rule.kind)).toEqual([kind]);
        });

        it('reports a row with an unknown page type as unclassified', () => {
            const node = responsiveItem({
                title: 'Podcast',
                secondary: [text('Podcast')],
                navigation: browseEndpoint('MPSPx', 'MUSIC_PAGE_TYPE_PODCAST_SHOW_DETAIL_PAGE'),
                thumbnail: 'https://img.test/podcast.jpg',
            });

            expect(mapNode(node)).toEqual({
                ok: false,
                dropped: { renderer: 'musicResponsiveListItemRenderer', reason: 'unclassified' },
            });
        });
    });

    describe('song', () => {
        it('extracts every field', () => {
            expect(mapItem(songNode)).toEqual({
                type: 'song',
                id: 'vid1',
                title: 'Song One',
                artists: [
                    { id: 'UC_A', name: 'Artist A' },
                    { id: 'UC_B', name: 'Artist B' },
                ],
                album: { id: 'MPREb_X', name: 'Album X' },
                durationSeconds: 225,
                thumbnailUrl: 'https://img.test/vid1.jpg',
                explicit: true,
            });
        });

        it('splits "Artist A & Artist B · Album X" into two artists and one album', () => {
            const item = mapItem(responsiveItem({
                title: 'Song Two',
                secondary: [
                    link('Artist A', 'UC_A', PAGE.ARTIST),
                    text(' & '),
                    link('Artist B', 'UC_B', PAGE.ARTIST),
                    text(' · '),
                    link('Album X', 'MPREb_X', PAGE.ALBUM),
                ],
                videoId: 'vid2',
                thumbnail: 'https://img.test/vid2.jpg',
            }));

            expect(item).toEqual({
                type: 'song',
                id: 'vid2',
                title: 'Song Two',
                artists: [
                    { id: 'UC_A', name: 'Artist A' },
                    { id: 'UC_B', name: 'Artist B' },
                ],
                album: { id: 'MPREb_X', name: 'Album X' },
                thumbnailUrl: 'https://img.test/vid2.jpg',
                explicit: false,
            });
            expect(item.type === 'song' && item.durationSeconds).toBeUndefined();
        });

        it('leaves the album absent when the album run is not browsable', () => {
            const item = mapItem(responsiveItem({
                title: 'Song Three',
                secondary: [link('Artist A', 'UC_A', PAGE.ARTIST), SEP, text('Unlinked Album'), SEP, text('2:10')],
                videoId: 'vid3',
                thumbnail: 'https://img.test/vid3.jpg',
            }));

            expect(item.type).toBe('song');
            if (item.type !== 'song') return;
            expect(item.album).toBeUndefined();
            expect(item.durationSeconds).toBe(130);
            expect(item.artists).toEqual([{ id: 'UC_A', name: 'Artist A' }]);
        });

        it('falls back to the first fixed column for the duration', () => {
            const item = mapItem(responsiveItem({
                title: 'Track 1',
                secondary: [link('Artist A', 'UC_A', PAGE.ARTIST)],
                fixed: '4:05',
                videoId: 'vid4',
                thumbnail: 'https://img.test/vid4.jpg',
            }));

            expect(item.type === 'song' && item.durationSeconds).toBe(245);
        });

        it('drops a row without a thumbnail', () => {
            const node = responsiveItem({
                title: 'No Art',
                secondary: [text('Artist A')],
                videoId: 'vid5',
            });

            expect(mapNode(node)).toEqual({
                ok: false,
                dropped: {
                    renderer: 'musicResponsiveListItemRenderer',
                    reason: 'missing-field',
                    kind: 'song',
                    field: 'thumbnail',
                },
            });
        });

        it('drops a row without a secondary line', () => {
            const outcome = mapNode(responsiveItem({
                title: 'Bare',
                videoId: 'vid6',
                thumbnail: 'https://img.test/vid6.jpg',
            }));

            expect(outcome.ok).toBe(false);
            if (outcome.ok) return;
            expect(outcome.dropped.field).toBe('flexColumns[1]');
        });
    });

    describe('artist', () => {
        it('extracts name, thumbnail and menu actions', () => {
            expect(mapItem(artistNode)).toEqual({
                type: 'artist',
                id: 'UC_A',
                name: 'Artist A',
                thumbnailUrl: 'https://img.test/artist-a.jpg',
                shuffleEndpoint: { type: 'watchPlaylist', playlistId: 'RDAOshuffle', params: 'wAEB8gECKAE%3D' },
                radioEndpoint: { type: 'watchPlaylist', playlistId: 'RDEMradio', params: 'wAEB' },
            });
        });

        it('leaves unavailable actions absent', () => {
            const item = mapItem(responsiveItem({
                title: 'Artist C',
                secondary: [text('Artist')],
                navigation: browseEndpoint('UC_C', PAGE.ARTIST),
            }));

            expect(item.type).toBe('artist');
            if (item.type !== 'artist') return;
            expect(item.shuffleEndpoint).toBeUndefined();
            expect(item.radioEndpoint).toBeUndefined();
            expect(item.thumbnailUrl).toBeUndefined();
        });
    });

    describe('album', () => {
        it('extracts artists, year and the playback collection id', () => {
            expect(mapItem(albumNode)).toEqual({
                type: 'album',
                browseId: 'MPREb_X',
                playlistId: 'OLAK5uy_X',
                title: 'Album X',
                artists: [{ id: 'UC_A', name: 'Artist A' }],
                year: 2021,
                thumbnailUrl: 'https://img.test/album-x.jpg',
                explicit: false,
            });
        });

        it('drops an album without a play button', () => {
            const outcome = mapNode(responsiveItem({
                title: 'Album Y',
                secondary: [text('Album'), SEP, text('Artist A')],
                navigation: browseEndpoint('MPREb_Y', PAGE.ALBUM),
                thumbnail: 'https://img.test/album-y.jpg',
            }));

            expect(outcome).toEqual({
                ok: false,
                dropped: {
                    renderer: 'musicResponsiveListItemRenderer',
                    reason: 'missing-field',
                    kind: 'album',
                    field: 'playlistId',
                },
            });
        });
    });

    describe('playlist', () => {
        it('gives an unbrowsable author a null id', () => {
            expect(mapItem(playlistNode)).toEqual({
                type: 'playlist',
                id: 'PL123',
                title: 'Road Trip',
                author: { id: null, name: 'Some Curator' },
                songCountText: '52 songs',
                thumbnailUrl: 'https://img.test/pl123.jpg',
                playEndpoint: { type: 'watchPlaylist', playlistId: 'PL123' },
            });
        });

        it('keeps the channel id of a browsable author', () => {
            const item = mapItem(responsiveItem({
                title: 'Mix',
                secondary: [link('Curator', 'UC_CUR', PAGE.ARTIST), SEP, text('1.1K views'), SEP, text('20 songs')],
                navigation: browseEndpoint('VLPLmix', PAGE.PLAYLIST),
                thumbnail: 'https://img.test/mix.jpg',
                play: { watchEndpoint: { videoId: 'first', playlistId: 'PLmix' } },
            }));

            expect(item.type).toBe('playlist');
            if (item.type !== 'playlist') return;
            expect(item.id).toBe('PLmix');
            expect(item.author).toEqual({ id: 'UC_CUR', name: 'Curator' });
            expect(item.songCountText).toBe('20 songs');
            expect(item.playEndpoint).toEqual({ type: 'watch', videoId: 'first', playlistId: 'PLmix' });
        });
    });
});
