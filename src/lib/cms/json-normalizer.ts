/**
 * Canonical JSON for snapshot comparison: keys sorted at every depth, arrays
 * left in order.
 */

import { createHash } from 'node:crypto';
import { isJsonObject, type JsonObject, type JsonValue } from './types';

export function sortKeysDeep(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(sortKeysDeep);
    }
    if (isJsonObject(value)) {
        const sorted: JsonObject = {};
        for (const key of Object.keys(value).sort()) {
            sorted[key] = sortKeysDeep(value[key]);
        }
        return sorted;
    }
    return value;
}

/** Deterministic serialization; `pretty` uses a two-space indent for line diffs. */
export function normalizeJson(value: JsonValue, pretty = false): string {
    return JSON.stringify(sortKeysDeep(value), null, pretty ? 2 : undefined);
}

/**
 * Equality fingerprint of a snapshot. md5 is fast and good enough for
 * detecting edits; it is not used for anything security related.
 */
export function generateStructureHash(value: JsonValue): string {
    return createHash('md5').update(normalizeJson(value)).digest('hex');
}

export type JsonType = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';

export function jsonTypeOf(value: JsonValue): JsonType {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'object') return 'object';
    if (typeof value === 'boolean') return 'boolean';
    if (typeof value === 'number') return 'number';
    return 'string';
}

export type JsonChange =
    | { path: string; segments: string[]; type: 'addition'; value: JsonValue }
    | { path: string; segments: string[]; type: 'removal'; value: JsonValue }
    | { path: string; segments: string[]; type: 'value_change'; oldValue: JsonValue; newValue: JsonValue }
    | { path: string; segments: string[]; type: 'type_change'; oldType: JsonType; newType: JsonType; oldValue: JsonValue; newValue: JsonValue };

export interface DifferenceSummary {
    areEqual: boolean;
    changes: JsonChange[];
}

function entriesOf(value: JsonObject | JsonValue[]): Map<string, JsonValue> {
    return Array.isArray(value)
        ? new Map(value.map((item, index) => [String(index), item]))
        : new Map(Object.entries(value));
}

function findChanges(before: JsonValue, after: JsonValue, segments: string[], changes: JsonChange[]): void {
    const path = segments.join('.');
    const beforeType = jsonTypeOf(before);
    const afterType = jsonTypeOf(after);

    if (beforeType !== afterType) {
        changes.push({ path, segments, type: 'type_change', oldType: beforeType, newType: afterType, oldValue: before, newValue: after });
        return;
    }

    if (!(Array.isArray(before) || isJsonObject(before)) || !(Array.isArray(after) || isJsonObject(after))) {
        if (before !== after) {
            changes.push({ path, segments, type: 'value_change', oldValue: before, newValue: after });
        }
        return;
    }

    const left = entriesOf(before);
    const right = entriesOf(after);

    // Additions, then removals, then recursion into keys both sides share.
    for (const [key, value] of right) {
        if (!left.has(key)) {
            const child = [...segments, key];
            changes.push({ path: child.join('.'), segments: child, type: 'addition', value });
        }
    }
    for (const [key, value] of left) {
        if (!right.has(key)) {
            const child = [...segments, key];
            changes.push({ path: child.join('.'), segments: child, type: 'removal', value });
        }
    }
    for (const [key, value] of left) {
        const counterpart = right.get(key);
        if (counterpart !== undefined) {
            findChanges(value, counterpart, [...segments, key], changes);
        }
    }
}

/** Structural differences from `before` to `after`, in key-sorted order. */
export function getDifferenceSummary(before: JsonValue, after: JsonValue): DifferenceSummary {
    const left = sortKeysDeep(before);
    const right = sortKeysDeep(after);
    const changes: JsonChange[] = [];
    findChanges(left, right, [], changes);
    return { areEqual: changes.length === 0, changes };
}
