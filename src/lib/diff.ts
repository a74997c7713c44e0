export type DiffOp = 'same' | 'add' | 'remove';

export interface DiffLine {
    type: DiffOp;
    line: string;
    /** 1-based line number in the old text; null for added lines. */
    oldLine: number | null;
    /** 1-based line number in the new text; null for removed lines. */
    newLine: number | null;
}

function lcsCore(aLines: string[], bLines: string[]): { type: DiffOp; line: string }[] {
    const m = aLines.length;
    const n = bLines.length;

    // Build LCS table
    const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
    for (let i = 1; i <= m; i++) {
        for (let j = 1; j <= n; j++) {
            if (aLines[i - 1] === bLines[j - 1]) {
                dp[i][j] = dp[i - 1][j - 1] + 1;
            } else {
                dp[i][j] = Math.max(dp[i - 1][j], dp[i][j - 1]);
            }
        }
    }

    // Backtrack to produce diff
    const result: { type: DiffOp; line: string }[] = [];
    let i = m, j = n;
    while (i > 0 || j > 0) {
        if (i > 0 && j > 0 && aLines[i - 1] === bLines[j - 1]) {
            result.push({ type: 'same', line: aLines[i - 1] });
            i--; j--;
        } else if (j > 0 && (i === 0 || dp[i][j - 1] >= dp[i - 1][j])) {
            result.push({ type: 'add', line: bLines[j - 1] });
            j--;
        } else {
            result.push({ type: 'remove', line: aLines[i - 1] });
            i--;
        }
    }

    return result.reverse();
}

/**
 * Line-level LCS diff between two texts. Common leading and trailing lines
 * are matched directly so the quadratic table only covers the changed middle,
 * which keeps large, mostly identical snapshots cheap to compare.
 */
export function lcsDiff(a: string, b: string): DiffLine[] {
    const aLines = a.split('\n');
    const bLines = b.split('\n');

    let prefix = 0;
    while (prefix < aLines.length && prefix < bLines.length && aLines[prefix] === bLines[prefix]) {
        prefix++;
    }
    let suffix = 0;
    while (
        suffix < aLines.length - prefix
        && suffix < bLines.length - prefix
        && aLines[aLines.length - 1 - suffix] === bLines[bLines.length - 1 - suffix]
    ) {
        suffix++;
    }

    const middle = lcsCore(
        aLines.slice(prefix, aLines.length - suffix),
        bLines.slice(prefix, bLines.length - suffix),
    );
    const ops = [
        ...aLines.slice(0, prefix).map((line) => ({ type: 'same' as const, line })),
        ...middle,
        ...aLines.slice(aLines.length - suffix).map((line) => ({ type: 'same' as const, line })),
    ];

    const result: DiffLine[] = [];
    let oldLine = 0;
    let newLine = 0;
    for (const op of ops) {
        if (op.type !== 'add') oldLine++;
        if (op.type !== 'remove') newLine++;
        result.push({
            type: op.type,
            line: op.line,
            oldLine: op.type === 'add' ? null : oldLine,
            newLine: op.type === 'remove' ? null : newLine,
        });
    }
    return result;
}

export interface DiffHunk {
    oldStart: number;
    oldLines: number;
    newStart: number;
    newLines: number;
    lines: DiffLine[];
}

/** Group changed lines into hunks with `context` unchanged lines around each change. */
export function buildHunks(lines: DiffLine[], context = 3): DiffHunk[] {
    const changed = lines.flatMap((line, index) => (line.type === 'same' ? [] : [index]));
    if (changed.length === 0) return [];

    const ranges: Array<[number, number]> = [];
    for (const index of changed) {
        const start = Math.max(0, index - context);
        const end = Math.min(lines.length - 1, index + context);
        const last = ranges[ranges.length - 1];
        if (last && start <= last[1] + 1) {
            last[1] = Math.max(last[1], end);
        } else {
            ranges.push([start, end]);
        }
    }

    return ranges.map(([start, end]) => {
        const slice = lines.slice(start, end + 1);
        const oldNumbers = slice.flatMap((line) => (line.oldLine === null ? [] : [line.oldLine]));
        const newNumbers = slice.flatMap((line) => (line.newLine === null ? [] : [line.newLine]));
        return {
            oldStart: oldNumbers[0] ?? precedingNumber(lines, start, 'oldLine'),
            oldLines: oldNumbers.length,
            newStart: newNumbers[0] ?? precedingNumber(lines, start, 'newLine'),
            newLines: newNumbers.length,
            lines: slice,
        };
    });
}

// An empty side starts at the line before the hunk, as unified diff does.
function precedingNumber(lines: DiffLine[], start: number, side: 'oldLine' | 'newLine'): number {
    for (let i = start - 1; i >= 0; i--) {
        const value = lines[i][side];
        if (value !== null) return value;
    }
    return 0;
}

const MARKERS: Record<DiffOp, string> = { same: ' ', add: '+', remove: '-' };

export function formatUnifiedDiff(hunks: DiffHunk[], oldLabel: string, newLabel: string): string {
    if (hunks.length === 0) return '';
    const out = [`--- ${oldLabel}`, `+++ ${newLabel}`];
    for (const hunk of hunks) {
        out.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);
        for (const line of hunk.lines) {
            out.push(`${MARKERS[line.type]}${line.line}`);
        }
    }
    return out.join('\n');
}
