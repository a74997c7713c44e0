/**
 * Delete old page versions, keeping the newest N per page and always the
 * published one.
 *
 * Usage:
 *   npm run retention                          # keep CMS_VERSION_RETENTION_KEEP (default 10) on every page
 *   npm run retention -- --keep 5 --page 12    # one page
 *   npm run retention -- --dry-run             # list what would be deleted
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { getCmsConfig } from '@/lib/config';
import { runRetention } from '@/lib/cms/retention';
import { closeDb } from '@/lib/db';
import { createPageComposer } from '@/lib/page-composer';

function getArg(name: string): string | null {
    const idx = process.argv.indexOf(name);
    if (idx === -1) return null;
    const value = process.argv[idx + 1];
    return value && !value.startsWith('--') ? value : null;
}

function getIntArg(name: string, defaultValue: number): number {
    const raw = getArg(name);
    if (!raw) return defaultValue;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : defaultValue;
}

async function main() {
    const config = getCmsConfig();
    const keep = Math.max(1, getIntArg('--keep', config.retentionKeep));
    const pageArg = getArg('--page');
    const pageId = pageArg ? Number.parseInt(pageArg, 10) : null;
    const dryRun = process.argv.includes('--dry-run');

    if (pageId !== null && !Number.isFinite(pageId)) {
        throw new Error(`Invalid --page (expected a page id): ${pageArg}`);
    }

    const { repository, versions } = createPageComposer();
    const results = await runRetention(repository, versions, { keep, pageId, dryRun });

    for (const result of results) {
        if (result.candidates.length === 0) continue;
        console.log(`[Retention] page ${result.pageId}: ${dryRun ? 'would delete' : 'deleted'} ${dryRun ? result.candidates.length : result.deleted} version(s)`, result.candidates);
    }

    const total = results.reduce((sum, result) => sum + (dryRun ? result.candidates.length : result.deleted), 0);
    console.log(`[Retention] ${dryRun ? 'Dry run: ' : ''}${total} version(s) across ${results.length} page(s) (keep=${keep}).`);
}

void main()
    .catch((err) => {
        console.error('[Retention] Failed:', err);
        process.exitCode = 1;
    })
    .finally(() => closeDb());
