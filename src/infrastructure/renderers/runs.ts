import { ArtistRef, createArtistRef } from '../../domain/entities/Artist';
import { AlbumRef, createAlbumRef } from '../../domain/entities/Album';
import { Run } from './views';

const SEPARATORS = new Set(['•', '·']);

export function isSeparator(run: Run): boolean {
    return SEPARATORS.has(run.text.trim());
}

/**
 * Splits a secondary line into groups on separator runs.
 * `A & B · X` becomes `[[A, &, B], [X]]`. The separators themselves are dropped.
 */
export function splitBySeparator(runs: Run[]): Run[][] {
    const groups: Run[][] = [];
    let current: Run[] = [];
    for (const run of runs) {
        if (isSeparator(run)) {
            groups.push(current);
            current = [];
        } else {
            current.push(run);
        }
    }
    groups.push(current);
    return groups;
}

/**
 * Every other run starting at the first: names, with connector runs
 * ("&", ", ") in between skipped.
 */
export function oddElements(runs: Run[]): Run[] {
    return runs.filter((_, index) => index % 2 === 0);
}

/**
 * Parses `[[H:]MM:]SS` into total seconds.
 * Returns undefined for anything that is not one to three numeric parts.
 */
export function parseTime(text: string | undefined): number | undefined {
    if (text === undefined) return undefined;
    const parts = text.trim().split(':');
    if (parts.length > 3) return undefined;
    if (!parts.every((part) => /^\d+$/.test(part))) return undefined;

    return parts.reduce((total, part) => total * 60 + parseInt(part, 10), 0);
}

/**
 * Four-digit year, or undefined.
 */
export function parseYear(text: string | undefined): number | undefined {
    if (text === undefined) return undefined;
    const trimmed = text.trim();
    return /^\d{4}$/.test(trimmed) ? parseInt(trimmed, 10) : undefined;
}

export function firstText(runs: Run[] | undefined): string | undefined {
    const text = runs?.[0]?.text;
    return text && text.trim() ? text : undefined;
}

export function toArtistRef(run: Run): ArtistRef {
    return createArtistRef(run.text, run.navigationEndpoint?.browseEndpoint?.browseId ?? null);
}

export function toArtistRefs(runs: Run[] | undefined): ArtistRef[] {
    return runs ? oddElements(runs).map(toArtistRef) : [];
}

/**
 * Album reference from a run, only when the run is browsable.
 */
export function toAlbumRef(run: Run | undefined): AlbumRef | undefined {
    const browseId = run?.navigationEndpoint?.browseEndpoint?.browseId;
    return run && browseId ? createAlbumRef(run.text, browseId) : undefined;
}
