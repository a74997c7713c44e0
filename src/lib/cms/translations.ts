/**
 * Translation Resolver.
 *
 * A field missing from both the working and the default language is left out
 * of the map entirely; an empty string is a translation like any other.
 */

import type {
    FieldMap,
    SectionNode,
    SnapshotTranslations,
    TranslatedSection,
    TranslationRow,
} from './types';

export type TranslationIndex = Map<number, FieldMap>;

/** sectionId → fieldName → content, for rows of a single language. */
export function indexTranslations(rows: TranslationRow[]): TranslationIndex {
    const index: TranslationIndex = new Map();
    for (const row of rows) {
        let fields = index.get(row.sectionId);
        if (!fields) {
            fields = {};
            index.set(row.sectionId, fields);
        }
        fields[row.fieldName] = { content: row.content, meta: row.meta };
    }
    return index;
}

export interface LanguageTranslations {
    working: TranslationIndex;
    /** Project default language; empty when the working language is the default or none is configured. */
    fallback: TranslationIndex;
    property: TranslationIndex;
}

/**
 * Attach per-language content to every node. Resolution order for `fields` is
 * property language, then default language, then working language; the later
 * one wins. `properties` holds the property language alone and never falls back.
 */
export function applyTranslations(nodes: SectionNode[], translations: LanguageTranslations): TranslatedSection[] {
    return nodes.map((node) => ({
        ...node,
        fields: {
            ...translations.property.get(node.id),
            ...translations.fallback.get(node.id),
            ...translations.working.get(node.id),
        },
        properties: { ...translations.property.get(node.id) },
        children: applyTranslations(node.children, translations),
    }));
}

/** sectionId → languageId → fieldName → content, across every language. */
export function indexAllLanguageTranslations(rows: TranslationRow[]): Map<number, SnapshotTranslations> {
    const index = new Map<number, SnapshotTranslations>();
    for (const row of rows) {
        let byLanguage = index.get(row.sectionId);
        if (!byLanguage) {
            byLanguage = {};
            index.set(row.sectionId, byLanguage);
        }
        const languageKey = String(row.languageId);
        const fields = byLanguage[languageKey] ?? {};
        fields[row.fieldName] = { content: row.content, meta: row.meta };
        byLanguage[languageKey] = fields;
    }
    return index;
}
