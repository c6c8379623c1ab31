import { SchemaMismatch } from '../../../../src/domain/errors/InnertubeErrors';
import {
    BROWSE_PAGE,
    findRelatedBrowseId,
    parsePage,
    QUEUE_PAGE,
    rendererFamily,
    SEARCH_PAGE,
} from '../../../../src/infrastructure/renderers/RendererAdapter';
import {
    browseEndpoint,
    browseResponse,
    link,
    nextResponse,
    PAGE,
    panelVideo,
    responsiveItem,
    searchResponse,
    SEP,
    shelfContinuationResponse,
    text,
    twoRowItem,
} from '../../../helpers/innertubeNodes';

function song(videoId: string, thumbnail: boolean = true) {
    return responsiveItem({
        title: `Song ${videoId}`,
        secondary: [link('Artist A', 'UC_A', PAGE.ARTIST), SEP, text('3:00')],
        videoId,
        thumbnail: thumbnail ? `https://img.test/${videoId}.jpg` : undefined,
    });
}

const unknownRow = responsiveItem({
    title: 'Episode',
    secondary: [text('Episode')],
    navigation: browseEndpoint('MPEDx', 'MUSIC_PAGE_TYPE_NON_MUSIC_AUDIO_TRACK_PAGE'),
});

const artistRow = responsiveItem({
    title: 'Artist A',
    secondary: [text('Artist')],
    navigation: browseEndpoint('UC_A', PAGE.ARTIST),
});

describe('RendererAdapter', () => {
    describe('parsePage', () => {
        it('returns the N classifiable nodes of N + K and reports the K others', () => {
            const tree = searchResponse([song('s1'), unknownRow, artistRow, song('s2', false), song('s3')], 'CURSOR_2');

            const page = parsePage(tree, SEARCH_PAGE);

            expect(page.items.map((item) => item.type === 'artist' ? item.id : item.type === 'song' ? item.id : null))
                .toEqual(['s1', 'UC_A', 's3']);
            expect(page.dropped).toEqual([
                { renderer: 'musicResponsiveListItemRenderer', reason: 'unclassified' },
                {
                    renderer: 'musicResponsiveListItemRenderer',
                    reason: 'missing-field',
                    kind: 'song',
                    field: 'thumbnail',
                },
            ]);
            expect(page.continuation?.token).toBe('CURSOR_2');
        });

        it('drops a playlist row whose browse id is only the VL prefix', () => {
            const bareVlPlaylist = responsiveItem({
                title: 'Untitled',
                secondary: [text('Curator'), SEP, text('12 songs')],
                navigation: browseEndpoint('VL', PAGE.PLAYLIST),
                thumbnail: 'https://img.test/pl.jpg',
                play: { watchPlaylistEndpoint: { playlistId: 'PL_x' } },
            });

            const page = parsePage(searchResponse([song('s1'), bareVlPlaylist]), SEARCH_PAGE);

            expect(page.items).toHaveLength(1);
            expect(page.dropped).toEqual([{
                renderer: 'musicResponsiveListItemRenderer',
                reason: 'missing-field',
                kind: 'playlist',
                field: 'browseId',
            }]);
        });

        it('drops a node whose entity factory throws instead of failing the page', () => {
            jest.spyOn(console, 'debug').mockImplementation(() => { });
            const family = rendererFamily('testItemRenderer', (node) => node, [{
                kind: 'song',
                matches: () => true,
                build: () => {
                    throw new Error('Song id cannot be empty');
                },
            }]);

            const page = parsePage(
                searchResponse([song('s1'), { testItemRenderer: {} }]),
                { ...SEARCH_PAGE, families: [...SEARCH_PAGE.families, family] }
            );

            expect(page.items).toHaveLength(1);
            expect(page.dropped).toEqual([{ renderer: 'testItemRenderer', reason: 'invalid-entity', kind: 'song' }]);
            jest.restoreAllMocks();
        });

        it('keeps a cursor on a page with no items', () => {
            const page = parsePage(shelfContinuationResponse([], 'CURSOR_3'), SEARCH_PAGE);

            expect(page.items).toEqual([]);
            expect(page.continuation?.token).toBe('CURSOR_3');
        });

        it('returns a null cursor on the last page', () => {
            const page = parsePage(shelfContinuationResponse([song('s9')]), SEARCH_PAGE);

            expect(page.items).toHaveLength(1);
            expect(page.continuation).toBeNull();
        });

        it('reads a continuation command token', () => {
            const tree = browseResponse([[
                song('b1'),
                {
                    continuationItemRenderer: {
                        continuationEndpoint: { continuationCommand: { token: 'CMD_TOKEN' } },
                    },
                },
            ]]);

            const page = parsePage(tree, BROWSE_PAGE);

            expect(page.items).toHaveLength(1);
            expect(page.continuation?.token).toBe('CMD_TOKEN');
        });

        it('maps list items and cards of one page in document order', () => {
            const album = twoRowItem({
                title: 'Album Z',
                subtitle: [text('Album'), SEP, text('Artist Q')],
                navigation: browseEndpoint('MPREb_Z', PAGE.ALBUM),
                thumbnail: 'https://img.test/z.jpg',
                play: { watchPlaylistEndpoint: { playlistId: 'OLAK5uy_Z' } },
            });

            const page = parsePage(browseResponse([[album], [song('b2')]]), BROWSE_PAGE);

            expect(page.items.map((item) => item.type)).toEqual(['album', 'song']);
        });

        it('reads queue entries, unwrapping wrappers and skipping counterparts', () => {
            const tree = nextResponse([
                panelVideo({ videoId: 'q1', title: 'One', thumbnail: 'https://img.test/q1.jpg' }),
                {
                    playlistPanelVideoWrapperRenderer: {
                        primaryRenderer: panelVideo({ videoId: 'q2', title: 'Two', thumbnail: 'https://img.test/q2.jpg' }),
                        counterpart: [{
                            counterpartRenderer: panelVideo({ videoId: 'q2v', title: 'Two (video)', thumbnail: 'https://img.test/q2v.jpg' }),
                        }],
                    },
                },
            ], { continuation: 'Q_NEXT' });

            const page = parsePage(tree, QUEUE_PAGE);

            expect(page.items.map((item) => item.type === 'song' ? item.id : null)).toEqual(['q1', 'q2']);
            expect(page.continuation?.token).toBe('Q_NEXT');
        });

        it('throws SchemaMismatch when no required section is present', () => {
            const parse = () => parsePage({ responseContext: {} }, SEARCH_PAGE);

            expect(parse).toThrow(SchemaMismatch);
            try {
                parse();
            } catch (error) {
                expect(error).toBeInstanceOf(SchemaMismatch);
                expect(error instanceof SchemaMismatch && error.section).toBe(
                    'contents.tabbedSearchResultsRenderer | contents.sectionListRenderer | continuationContents'
                );
            }
        });

        it('throws SchemaMismatch for a non-object body', () => {
            expect(() => parsePage('<html>', SEARCH_PAGE, 'search')).toThrow('Response from search is not a JSON object');
        });
    });

    describe('findRelatedBrowseId', () => {
        it('returns the related tab browse id', () => {
            expect(findRelatedBrowseId(nextResponse([], { relatedBrowseId: 'MPTRt_rel' }))).toBe('MPTRt_rel');
        });

        it('returns undefined when the video has no related tab', () => {
            expect(findRelatedBrowseId(nextResponse([]))).toBeUndefined();
        });

        it('rejects a response that is not a watch-next response', () => {
            expect(() => findRelatedBrowseId(searchResponse([]))).toThrow(SchemaMismatch);
        });
    });
});
