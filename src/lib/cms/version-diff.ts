import { z } from 'zod';
import { buildHunks, formatUnifiedDiff, lcsDiff, type DiffHunk, type DiffLine } from '@/lib/diff';
import { InvalidStateError } from './errors';
import { getDifferenceSummary, normalizeJson, type DifferenceSummary } from './json-normalizer';
import type { JsonValue } from './types';

export const DiffFormatSchema = z.enum(['unified', 'side_by_side', 'json_patch', 'summary']);
export type DiffFormat = z.infer<typeof DiffFormatSchema>;

export function parseDiffFormat(raw: string): DiffFormat {
    const parsed = DiffFormatSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidStateError(`Invalid diff format '${raw}'. Expected one of: ${DiffFormatSchema.options.join(', ')}`);
    }
    return parsed.data;
}

export interface UnifiedDiff {
    text: string;
    hunks: DiffHunk[];
}

export interface SideBySideCell {
    number: number;
    text: string;
}

export interface SideBySideRow {
    type: 'same' | 'changed' | 'added' | 'removed';
    left: SideBySideCell | null;
    right: SideBySideCell | null;
}

export type JsonPatchOperation =
    | { op: 'add'; path: string; value: JsonValue }
    | { op: 'remove'; path: string }
    | { op: 'replace'; path: string; value: JsonValue };

export type DiffResult =
    | { format: 'unified'; diff: UnifiedDiff }
    | { format: 'side_by_side'; diff: SideBySideRow[] }
    | { format: 'json_patch'; diff: JsonPatchOperation[] }
    | { format: 'summary'; diff: DifferenceSummary };

function cell(line: DiffLine, side: 'oldLine' | 'newLine'): SideBySideCell | null {
    const number = line[side];
    return number === null ? null : { number, text: line.line };
}

/** Pair each run of removals with the additions that follow it, row by row. */
export function toSideBySide(lines: DiffLine[]): SideBySideRow[] {
    const rows: SideBySideRow[] = [];
    let index = 0;
    while (index < lines.length) {
        const line = lines[index];
        if (line.type === 'same') {
            rows.push({ type: 'same', left: cell(line, 'oldLine'), right: cell(line, 'newLine') });
            index++;
            continue;
        }

        const removed: DiffLine[] = [];
        const added: DiffLine[] = [];
        while (index < lines.length && lines[index].type === 'remove') removed.push(lines[index++]);
        while (index < lines.length && lines[index].type === 'add') added.push(lines[index++]);

        for (let i = 0; i < Math.max(removed.length, added.length); i++) {
            const left = removed[i] ? cell(removed[i], 'oldLine') : null;
            const right = added[i] ? cell(added[i], 'newLine') : null;
            rows.push({ type: left && right ? 'changed' : left ? 'removed' : 'added', left, right });
        }
    }
    return rows;
}

function escapePointerSegment(segment: string): string {
    return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function toJsonPointer(segments: string[]): string {
    return segments.map((segment) => `/${escapePointerSegment(segment)}`).join('');
}

export function createJsonPatch(before: JsonValue, after: JsonValue): JsonPatchOperation[] {
    return getDifferenceSummary(before, after).changes.map((change): JsonPatchOperation => {
        const path = toJsonPointer(change.segments);
        switch (change.type) {
            case 'addition':
                return { op: 'add', path, value: change.value };
            case 'removal':
                return { op: 'remove', path };
            case 'value_change':
            case 'type_change':
                return { op: 'replace', path, value: change.newValue };
        }
    });
}

/** Compare two snapshots; both sides are key-sorted before any format runs. */
export function compareSnapshots(before: JsonValue, after: JsonValue, format: DiffFormat): DiffResult {
    switch (format) {
        case 'unified': {
            const hunks = buildHunks(lcsDiff(normalizeJson(before, true), normalizeJson(after, true)));
            return { format, diff: { text: formatUnifiedDiff(hunks, 'before', 'after'), hunks } };
        }
        case 'side_by_side':
            return { format, diff: toSideBySide(lcsDiff(normalizeJson(before, true), normalizeJson(after, true))) };
        case 'json_patch':
            return { format, diff: createJsonPatch(before, after) };
        case 'summary':
            return { format, diff: getDifferenceSummary(before, after) };
    }
}
