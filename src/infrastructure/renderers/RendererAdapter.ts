import { ContinuationCursor } from '../../domain/entities/ContinuationCursor';
import { MusicItem } from '../../domain/entities/MusicItem';
import { ItemDropped, SchemaMismatch } from '../../domain/errors/InnertubeErrors';
import { classify, ClassificationRule, Extraction } from './extraction';
import { at, arrayAt, isRecord, JsonRecord, PathKey, stringAt } from './json';
import { PLAYLIST_PANEL_RULES } from './PlaylistPanelRules';
import { RESPONSIVE_LIST_ITEM_RULES } from './ResponsiveListItemRules';
import { TWO_ROW_ITEM_RULES } from './TwoRowItemRules';
import {
    PAGE_TYPE,
    readBrowseEndpoint,
    readPlaylistPanelVideo,
    readResponsiveListItem,
    readTwoRowItem,
} from './views';

export type NodeOutcome =
    | { ok: true; item: MusicItem }
    | { ok: false; dropped: ItemDropped };

/**
 * A renderer kind the adapter knows how to map, keyed by its JSON tag.
 */
export interface RendererFamily {
    key: string;
    map(node: JsonRecord): NodeOutcome;
}

/**
 * Builds a family from a view reader and its dispatch table. A node whose
 * entity factory throws is dropped like any other unusable node.
 */
export function rendererFamily<V>(
    key: string,
    read: (node: JsonRecord) => V,
    rules: readonly ClassificationRule<V>[]
): RendererFamily {
    return {
        key,
        map(node: JsonRecord): NodeOutcome {
            const view = read(node);
            const rule = classify(rules, view);
            if (!rule) {
                return { ok: false, dropped: { renderer: key, reason: 'unclassified' } };
            }
            let result: Extraction<MusicItem>;
            try {
                result = rule.build(view);
            } catch (error: unknown) {
                const message = error instanceof Error ? error.message : String(error);
                console.debug(`[Catalog] ${key} rejected as ${rule.kind}: ${message}`);
                return { ok: false, dropped: { renderer: key, reason: 'invalid-entity', kind: rule.kind } };
            }
            if (!result.ok) {
                return {
                    ok: false,
                    dropped: { renderer: key, reason: 'missing-field', kind: rule.kind, field: result.missingField },
                };
            }
            return { ok: true, item: result.value };
        },
    };
}

export const RESPONSIVE_LIST_ITEM = rendererFamily(
    'musicResponsiveListItemRenderer',
    readResponsiveListItem,
    RESPONSIVE_LIST_ITEM_RULES
);

export const TWO_ROW_ITEM = rendererFamily('musicTwoRowItemRenderer', readTwoRowItem, TWO_ROW_ITEM_RULES);

export const PLAYLIST_PANEL_VIDEO = rendererFamily(
    'playlistPanelVideoRenderer',
    readPlaylistPanelVideo,
    PLAYLIST_PANEL_RULES
);

/** Alternate renditions of an entry already listed (e.g. the video of a song) */
const SKIPPED_KEYS: ReadonlySet<string> = new Set(['counterpart']);

export interface RendererNode {
    key: string;
    node: JsonRecord;
}

/**
 * Collects every node tagged with one of the keys, in document order,
 * whatever tab/section/shelf wrappers surround it. Matched nodes are not
 * searched further.
 */
export function findRendererNodes(tree: unknown, keys: ReadonlySet<string>): RendererNode[] {
    const found: RendererNode[] = [];
    const visit = (value: unknown): void => {
        if (Array.isArray(value)) {
            value.forEach(visit);
            return;
        }
        if (!isRecord(value)) return;
        for (const [key, child] of Object.entries(value)) {
            if (SKIPPED_KEYS.has(key)) continue;
            if (keys.has(key) && isRecord(child)) {
                found.push({ key, node: child });
            } else {
                visit(child);
            }
        }
    };
    visit(tree);
    return found;
}

function continuationFromList(value: unknown): string | undefined {
    for (const entry of arrayAt(value)) {
        const token =
            stringAt(entry, 'nextContinuationData', 'continuation') ??
            stringAt(entry, 'nextRadioContinuationData', 'continuation');
        if (token) return token;
    }
    return undefined;
}

/**
 * Finds the next-page token. It sits beside the item list, never inside an
 * item, and may be present on a page with no items.
 */
export function findContinuation(tree: unknown, itemKeys: ReadonlySet<string>): ContinuationCursor | null {
    let token: string | undefined;
    const visit = (value: unknown): void => {
        if (token) return;
        if (Array.isArray(value)) {
            for (const child of value) {
                visit(child);
                if (token) return;
            }
            return;
        }
        if (!isRecord(value)) return;
        for (const [key, child] of Object.entries(value)) {
            if (itemKeys.has(key) || SKIPPED_KEYS.has(key)) continue;
            if (key === 'continuations') {
                token = continuationFromList(child);
            } else if (key === 'continuationItemRenderer') {
                token = stringAt(child, 'continuationEndpoint', 'continuationCommand', 'token');
            } else {
                visit(child);
            }
            if (token) return;
        }
    };
    visit(tree);
    return token ? ContinuationCursor.from(token) : null;
}

/**
 * Entry point description for one response kind.
 */
export interface PageShape {
    name: string;
    families: readonly RendererFamily[];
    /** The response must carry at least one of these sections */
    requiredSections: readonly (readonly PathKey[])[];
}

export interface ParsedPage {
    items: MusicItem[];
    continuation: ContinuationCursor | null;
    dropped: ItemDropped[];
}

function hasSection(tree: unknown, path: readonly PathKey[]): boolean {
    const section = at(tree, ...path);
    return isRecord(section) || Array.isArray(section);
}

function assertSections(tree: unknown, shape: PageShape, endpoint: string): void {
    if (!isRecord(tree)) {
        throw new SchemaMismatch(endpoint, 'root', `Response from ${endpoint} is not a JSON object`);
    }
    if (!shape.requiredSections.some((path) => hasSection(tree, path))) {
        const expected = shape.requiredSections.map((path) => path.join('.')).join(' | ');
        throw new SchemaMismatch(endpoint, expected);
    }
}

/**
 * Maps one response into entities. Pure: no I/O and no shared state.
 * @throws SchemaMismatch when none of the shape's required sections is present
 */
export function parsePage(tree: unknown, shape: PageShape, endpoint: string = shape.name): ParsedPage {
    assertSections(tree, shape, endpoint);

    const byKey = new Map(shape.families.map((family) => [family.key, family]));
    const keys = new Set(byKey.keys());
    const items: MusicItem[] = [];
    const dropped: ItemDropped[] = [];

    for (const { key, node } of findRendererNodes(tree, keys)) {
        const family = byKey.get(key);
        if (!family) continue;
        const outcome = family.map(node);
        if (outcome.ok) {
            items.push(outcome.item);
        } else {
            dropped.push(outcome.dropped);
        }
    }

    return { items, continuation: findContinuation(tree, keys), dropped };
}

export const SEARCH_PAGE: PageShape = {
    name: 'search',
    families: [RESPONSIVE_LIST_ITEM],
    requiredSections: [
        ['contents', 'tabbedSearchResultsRenderer'],
        ['contents', 'sectionListRenderer'],
        ['continuationContents'],
    ],
};

export const BROWSE_PAGE: PageShape = {
    name: 'browse',
    families: [RESPONSIVE_LIST_ITEM, TWO_ROW_ITEM],
    requiredSections: [['contents'], ['continuationContents'], ['onResponseReceivedActions']],
};

export const QUEUE_PAGE: PageShape = {
    name: 'next',
    families: [PLAYLIST_PANEL_VIDEO],
    requiredSections: [
        ['contents', 'singleColumnMusicWatchNextResultsRenderer'],
        ['continuationContents', 'playlistPanelContinuation'],
    ],
};

const WATCH_NEXT_TABS = [
    'contents',
    'singleColumnMusicWatchNextResultsRenderer',
    'tabbedRenderer',
    'watchNextTabbedResultsRenderer',
    'tabs',
] as const;

/**
 * Browse id of the "Related" tab of a watch-next response, if the video has one.
 * @throws SchemaMismatch when the response is not a watch-next response
 */
export function findRelatedBrowseId(tree: unknown, endpoint: string = 'next'): string | undefined {
    assertSections(tree, QUEUE_PAGE, endpoint);
    for (const tab of arrayAt(tree, ...WATCH_NEXT_TABS)) {
        const browse = readBrowseEndpoint(at(tab, 'tabRenderer', 'endpoint', 'browseEndpoint'));
        if (browse?.pageType === PAGE_TYPE.TRACK_RELATED) {
            return browse.browseId;
        }
    }
    return undefined;
}
