import { logger } from '@/lib/logger';
import { evaluateSectionCondition, type ConditionEvaluator } from './conditions';
import { retrieveSectionData, type RetrievalContext } from './data-retrieval';
import { interpolateFields, interpolateNullable } from './interpolation';
import { mergeScopes } from './scope';
import type {
    DataSourceDeclaration,
    FieldMap,
    JsonObject,
    RenderedSection,
    ScopeStore,
    TranslatedSection,
} from './types';

export interface OrchestratorContext extends RetrievalContext {
    conditions: ConditionEvaluator;
}

interface InterpolatedContent {
    fields: FieldMap;
    condition: string | null;
    css: string | null;
    cssMobile: string | null;
}

function interpolateContent(content: InterpolatedContent, scope: ScopeStore): InterpolatedContent {
    return {
        fields: interpolateFields(content.fields, scope),
        condition: interpolateNullable(content.condition, scope),
        css: interpolateNullable(content.css, scope),
        cssMobile: interpolateNullable(content.cssMobile, scope),
    };
}

function declarationsOf(section: TranslatedSection): DataSourceDeclaration[] {
    const config = section.dataConfig;
    switch (config.status) {
        case 'none':
            return [];
        case 'valid':
            return config.declarations;
        case 'invalid':
            logger.warn('Skipping malformed data_config', { sectionId: section.id, error: config.error });
            return [];
    }
}

/**
 * Run one section through interpolation, retrieval and its condition, then
 * recurse into the children with the merged scope. Returns null when the
 * condition drops the section, in which case its subtree is never visited.
 */
export async function processSection(
    section: TranslatedSection,
    inherited: ScopeStore,
    ctx: OrchestratorContext,
): Promise<RenderedSection | null> {
    // A placeholder resolved by the first pass keeps the ancestor's value even
    // when this section's own retrieval reuses the namespace.
    const firstPass = interpolateContent(section, inherited);

    const declarations = declarationsOf(section);
    const local: JsonObject = {};
    for (const outcome of await retrieveSectionData(declarations, inherited, ctx)) {
        if (outcome.result.ok) {
            local[outcome.namespace] = outcome.result.value;
        } else {
            // Retrieval is best-effort: the namespace stays absent and rendering continues.
            logger.warn('Data retrieval failed', {
                sectionId: section.id,
                table: outcome.declaration.table,
                scope: outcome.namespace,
                error: outcome.result.error,
            });
        }
    }

    const scope = mergeScopes(inherited, local);
    const content = interpolateContent(firstPass, scope);

    const { passes, trace } = await evaluateSectionCondition(ctx.conditions, content.condition, {
        userId: ctx.userId,
        sectionName: section.name,
        scope,
    });
    if (!passes) {
        logger.debug('Section dropped by condition', { sectionId: section.id });
        return null;
    }

    return {
        id: section.id,
        name: section.name,
        styleName: section.styleName,
        position: section.position,
        css: content.css,
        cssMobile: content.cssMobile,
        debug: section.debug,
        condition: section.condition,
        fields: content.fields,
        properties: section.properties,
        dataConfig: declarations,
        retrievedData: local,
        conditionTrace: trace,
        children: await processSections(section.children, scope, ctx),
    };
}

/** Depth-first, in sibling order; siblings each start from the same inherited scope. */
export async function processSections(
    sections: TranslatedSection[],
    inherited: ScopeStore,
    ctx: OrchestratorContext,
): Promise<RenderedSection[]> {
    const rendered: RenderedSection[] = [];
    for (const section of sections) {
        const result = await processSection(section, inherited, ctx);
        if (result) rendered.push(result);
    }
    return rendered;
}
