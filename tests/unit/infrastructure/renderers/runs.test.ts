import {
    oddElements,
    parseTime,
    parseYear,
    splitBySeparator,
    toAlbumRef,
    toArtistRefs,
} from '../../../../src/infrastructure/renderers/runs';
import { readRuns, Run } from '../../../../src/infrastructure/renderers/views';
import { link, PAGE, SEP, text } from '../../../helpers/innertubeNodes';

describe('runs', () => {
    describe('parseTime', () => {
        it('parses minutes and seconds', () => {
            expect(parseTime('3:45')).toBe(225);
        });

        it('parses hours, minutes and seconds', () => {
            expect(parseTime('1:02:03')).toBe(3723);
        });

        it('parses bare seconds', () => {
            expect(parseTime('42')).toBe(42);
        });

        it('rejects non-numeric text', () => {
            expect(parseTime('1.2M views')).toBeUndefined();
            expect(parseTime('3:4x')).toBeUndefined();
            expect(parseTime('')).toBeUndefined();
        });

        it('rejects more than three parts', () => {
            expect(parseTime('1:00:00:00')).toBeUndefined();
        });

        it('returns undefined for undefined', () => {
            expect(parseTime(undefined)).toBeUndefined();
        });
    });

    describe('parseYear', () => {
        it('accepts four digits only', () => {
            expect(parseYear('2021')).toBe(2021);
            expect(parseYear(' 1999 ')).toBe(1999);
            expect(parseYear('21')).toBeUndefined();
            expect(parseYear('Album')).toBeUndefined();
        });
    });

    describe('splitBySeparator', () => {
        it('splits "Artist A & Artist B · Album X" into two groups', () => {
            const runs: Run[] = [
                { text: 'Artist A' },
                { text: ' & ' },
                { text: 'Artist B' },
                { text: ' · ' },
                { text: 'Album X' },
            ];

            const groups = splitBySeparator(runs);

            expect(groups.map((group) => group.map((run) => run.text))).toEqual([
                ['Artist A', ' & ', 'Artist B'],
                ['Album X'],
            ]);
        });

        it('returns one group when there is no separator', () => {
            expect(splitBySeparator([{ text: 'Solo' }])).toEqual([[{ text: 'Solo' }]]);
        });

        it('returns an empty group for an empty line', () => {
            expect(splitBySeparator([])).toEqual([[]]);
        });
    });

    describe('oddElements', () => {
        it('keeps names and skips connectors', () => {
            const names = oddElements([{ text: 'A' }, { text: ', ' }, { text: 'B' }, { text: ' & ' }, { text: 'C' }]);
            expect(names.map((run) => run.text)).toEqual(['A', 'B', 'C']);
        });
    });

    describe('toArtistRefs', () => {
        it('keeps the browse id of linked artists and null for bare names', () => {
            const runs = readRuns({
                runs: [link('Artist A', 'UC_A', PAGE.ARTIST), text(' & '), text('Artist B')],
            });

            expect(toArtistRefs(runs)).toEqual([
                { id: 'UC_A', name: 'Artist A' },
                { id: null, name: 'Artist B' },
            ]);
        });

        it('returns an empty list for a missing group', () => {
            expect(toArtistRefs(undefined)).toEqual([]);
        });
    });

    describe('toAlbumRef', () => {
        it('requires a browsable run', () => {
            const [album, plain] = readRuns({
                runs: [link('Album X', 'MPREb_X', PAGE.ALBUM), SEP],
            });

            expect(toAlbumRef(album)).toEqual({ id: 'MPREb_X', name: 'Album X' });
            expect(toAlbumRef(plain)).toBeUndefined();
            expect(toAlbumRef(undefined)).toBeUndefined();
        });
    });
});
