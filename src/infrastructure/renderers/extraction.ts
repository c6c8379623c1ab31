import { MusicItem, MusicItemType } from '../../domain/entities/MusicItem';

/**
 * Outcome of building one entity from one renderer node.
 */
export type Extraction<T> =
    | { ok: true; value: T }
    | { ok: false; missingField: string };

export function extracted<T>(value: T): Extraction<T> {
    return { ok: true, value };
}

export function missing(field: string): Extraction<never> {
    return { ok: false, missingField: field };
}

/**
 * One row of a renderer family's dispatch table. Predicates of a table are
 * mutually exclusive; the first match decides the entity kind.
 */
export interface ClassificationRule<V> {
    kind: MusicItemType;
    matches(view: V): boolean;
    build(view: V): Extraction<MusicItem>;
}

export function classify<V>(rules: readonly ClassificationRule<V>[], view: V): ClassificationRule<V> | undefined {
    return rules.find((rule) => rule.matches(view));
}
