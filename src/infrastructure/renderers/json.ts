/**
 * Narrowing helpers for untyped JSON trees.
 */

export type JsonRecord = { [key: string]: unknown };

export type PathKey = string | number;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follows a key path through nested objects and arrays.
 * Returns undefined as soon as a step is missing or of the wrong kind.
 */
export function at(node: unknown, ...path: PathKey[]): unknown {
    let current: unknown = node;
    for (const key of path) {
        if (typeof key === 'number') {
            if (!Array.isArray(current)) return undefined;
            current = current[key];
        } else {
            if (!isRecord(current)) return undefined;
            current = current[key];
        }
    }
    return current;
}

export function stringAt(node: unknown, ...path: PathKey[]): string | undefined {
    const value = at(node, ...path);
    return typeof value === 'string' ? value : undefined;
}

export function numberAt(node: unknown, ...path: PathKey[]): number | undefined {
    const value = at(node, ...path);
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function recordAt(node: unknown, ...path: PathKey[]): JsonRecord | undefined {
    const value = at(node, ...path);
    return isRecord(value) ? value : undefined;
}

/**
 * Array at the path, or an empty array when absent.
 */
export function arrayAt(node: unknown, ...path: PathKey[]): unknown[] {
    const value = at(node, ...path);
    return Array.isArray(value) ? value : [];
}
