import { ContinuationCursor } from './ContinuationCursor';
import { MusicItem } from './MusicItem';

/**
 * One page of typed results. A null continuation is the end-of-results signal.
 */
export interface ResultPage<T extends MusicItem = MusicItem> {
    readonly items: readonly T[];
    readonly continuation: ContinuationCursor | null;
}

export function createResultPage<T extends MusicItem>(
    items: T[],
    continuation: ContinuationCursor | null
): ResultPage<T> {
    return Object.freeze({
        items: Object.freeze([...items]),
        continuation,
    });
}

export function emptyResultPage<T extends MusicItem>(): ResultPage<T> {
    return createResultPage<T>([], null);
}
