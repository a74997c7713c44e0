import type { CacheStore } from '@/lib/cms/cache-scopes';
import { createConditionEvaluator, type ConditionEvaluatorKind } from '@/lib/cms/conditions';
import { PageRenderer } from '@/lib/cms/page-renderer';
import { PageVersionService } from '@/lib/cms/page-versions';
import { getCmsConfig } from '@/lib/config';
import { db, type DbOrTx } from '@/lib/db';
import { DrizzleCmsRepository } from '@/lib/db/cms-repository';
import { DrizzleDataRetriever } from '@/lib/db/data-retriever';

export interface PageComposerOptions {
    dbClient?: DbOrTx;
    conditions?: ConditionEvaluatorKind;
    cache?: CacheStore;
}

export interface PageComposer {
    repository: DrizzleCmsRepository;
    renderer: PageRenderer;
    versions: PageVersionService;
}

/** Wire the engine to Postgres with settings from the environment. */
export function createPageComposer(options: PageComposerOptions = {}): PageComposer {
    const config = getCmsConfig();
    const dbClient = options.dbClient ?? db;
    const repository = new DrizzleCmsRepository(dbClient);

    return {
        repository,
        renderer: new PageRenderer({
            content: repository,
            retriever: new DrizzleDataRetriever(dbClient),
            conditions: createConditionEvaluator(options.conditions ?? 'json_logic'),
            cache: options.cache,
            propertyLanguageId: config.propertyLanguageId,
            fallbackLanguageId: config.fallbackLanguageId,
        }),
        versions: new PageVersionService(repository, {
            versionCreateRetries: config.versionCreateRetries,
            retentionKeep: config.retentionKeep,
        }),
    };
}
