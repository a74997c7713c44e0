/**
 * Shared value types for the section composition and versioning engine.
 *
 * Everything here is a plain, fully-materialised value: rows come out of the
 * repositories, trees are built once per request, and nothing holds a live
 * database handle.
 */

import { z } from 'zod';

// ============================================================
// JSON values
// ============================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
]));

export const JsonObjectSchema = z.record(z.string(), JsonValueSchema);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type Result<T, E = string> =
    | { ok: true; value: T }
    | { ok: false; error: E };

// ============================================================
// Data-source declarations (sections.data_config)
// ============================================================

export const RetrieveModeEnum = z.enum(['all', 'first', 'last', 'all_as_array', 'JSON']);
export type RetrieveMode = z.infer<typeof RetrieveModeEnum>;

export const FieldConfigSchema = z.object({
    field_name: z.string().min(1),
    field_holder: z.string().optional(),
    not_found_text: z.string().optional(),
});

export const MapFieldSchema = z.object({
    field_name: z.string().min(1),
    field_new_name: z.string().min(1),
});

export const DataSourceDeclarationSchema = z.object({
    table: z.string().min(1),
    filter: z.string().optional(),
    scope: z.string().optional(),
    retrieve: RetrieveModeEnum.optional(),
    current_user: z.boolean().optional(),
    all_fields: z.boolean().optional(),
    fields: z.array(FieldConfigSchema).optional(),
    map_fields: z.array(MapFieldSchema).optional(),
});

export type FieldConfig = z.infer<typeof FieldConfigSchema>;
export type MapField = z.infer<typeof MapFieldSchema>;
export type DataSourceDeclaration = z.infer<typeof DataSourceDeclarationSchema>;

export const DataConfigSchema = z.array(DataSourceDeclarationSchema);

/** Decoded form of a section's data_config column. `source` is what gets persisted in snapshots. */
export type DataConfigState =
    | { status: 'none' }
    | { status: 'valid'; declarations: DataSourceDeclaration[]; source: JsonValue }
    | { status: 'invalid'; error: string; source: JsonValue };

// ============================================================
// Pages, sections and translations (storage rows)
// ============================================================

export interface PageRecord {
    id: number;
    keyword: string;
    url: string | null;
    parentPageId: number | null;
    isHeadless: boolean;
    navPosition: number | null;
    footerPosition: number | null;
    publishedVersionId: number | null;
}

/** One row of the flattened page → section hierarchy. */
export interface SectionRow {
    id: number;
    parentId: number | null;
    position: number | null;
    name: string;
    styleName: string;
    condition: string | null;
    dataConfig: string | null;
    css: string | null;
    cssMobile: string | null;
    debug: boolean;
}

export interface TranslationRow {
    sectionId: number;
    languageId: number;
    fieldName: string;
    content: string | null;
    meta: string | null;
}

export type FieldContent = { content: string | null; meta: string | null };
export type FieldMap = Record<string, FieldContent>;

// ============================================================
// Trees
// ============================================================

export interface SectionNode {
    readonly id: number;
    readonly name: string;
    readonly styleName: string;
    readonly position: number | null;
    readonly condition: string | null;
    readonly dataConfig: DataConfigState;
    readonly css: string | null;
    readonly cssMobile: string | null;
    readonly debug: boolean;
    readonly children: SectionNode[];
}

export interface TranslatedSection extends Omit<SectionNode, 'children'> {
    /** Content fields in the working language, falling back to the default and then the property language. */
    readonly fields: FieldMap;
    /** Structural fields stored under the reserved property language. */
    readonly properties: FieldMap;
    readonly children: TranslatedSection[];
}

// ============================================================
// Scopes
// ============================================================

/** namespace → value; namespaces are usually objects but JSON-mode retrievals yield arrays. */
export type ScopeStore = Readonly<Record<string, JsonValue>>;

export type Platform = 'web' | 'mobile';

/** Request/session facts that populate the reserved `system` namespace. */
export interface RequestContext {
    userId: number | null;
    userName: string;
    userEmail: string;
    userCode: string;
    userGroups: string[];
    languageId: number | null;
    lastLogin: string | null;
    pageKeyword: string;
    platform: Platform;
    projectName: string;
    now: Date;
    timezone: string;
}

// ============================================================
// Live render output
// ============================================================

export interface ConditionTrace {
    result: boolean;
    error: string | null;
    /** Values of the variables the expression references, as the evaluator saw them. */
    variables: JsonObject;
    conditionObject: JsonValue;
}

export interface RenderedSection {
    id: number;
    name: string;
    styleName: string;
    position: number | null;
    css: string | null;
    cssMobile: string | null;
    debug: boolean;
    condition: string | null;
    fields: FieldMap;
    properties: FieldMap;
    dataConfig: DataSourceDeclaration[];
    /** Namespaces produced by this section's own declarations. */
    retrievedData: JsonObject;
    conditionTrace: ConditionTrace | null;
    children: RenderedSection[];
}

export interface RenderedPage {
    page: {
        id: number;
        keyword: string;
        url: string | null;
        parentPageId: number | null;
        isHeadless: boolean;
        navPosition: number | null;
        footerPosition: number | null;
        languageId: number;
        sections: RenderedSection[];
    };
}

// ============================================================
// Snapshots (persisted in page_versions.page_json)
// ============================================================

export type SnapshotTranslations = Record<string, Record<string, FieldContent>>;

export type SnapshotSection = {
    id: number;
    section_name: string;
    style_name: string;
    position: number | null;
    condition: string | null;
    data_config: JsonValue;
    css: string | null;
    css_mobile: string | null;
    debug: boolean;
    translations: SnapshotTranslations;
    children: SnapshotSection[];
};

export type PageSnapshot = {
    page: {
        id: number;
        keyword: string;
        url: string | null;
        parent_page_id: number | null;
        is_headless: boolean;
        nav_position: number | null;
        footer_position: number | null;
        sections: SnapshotSection[];
    };
};

// ============================================================
// Versions
// ============================================================

export interface PageVersionRecord {
    id: number;
    pageId: number;
    versionNumber: number;
    versionName: string | null;
    pageJson: PageSnapshot;
    createdBy: number | null;
    createdAt: Date;
    publishedAt: Date | null;
    metadata: JsonObject | null;
}

export type PageVersionSummary = Omit<PageVersionRecord, 'pageJson'>;

export interface NewPageVersion {
    pageId: number;
    versionNumber: number;
    versionName: string | null;
    pageJson: PageSnapshot;
    createdBy: number | null;
    metadata: JsonObject | null;
}
