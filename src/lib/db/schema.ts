import { pgTable, serial, text, integer, boolean, timestamp, jsonb, index, unique, primaryKey, type AnyPgColumn } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { JsonObject, JsonValue } from '@/lib/cms/types';
export { sql };

// ===========================================
// LANGUAGES: id 1 is reserved for untranslated section properties.
// ===========================================
export const languages = pgTable('languages', {
    id: serial('id').primaryKey(),
    locale: text('locale').notNull().unique(),
    name: text('name').notNull(),
});

export const cmsPreferences = pgTable('cms_preferences', {
    id: serial('id').primaryKey(),
    defaultLanguageId: integer('default_language_id').references(() => languages.id, { onDelete: 'set null' }),
});

// ===========================================
// STYLES & FIELDS: what a section renders as, and the names its content uses.
// ===========================================
export const styles = pgTable('styles', {
    id: serial('id').primaryKey(),
    name: text('name').notNull().unique(),
    description: text('description'),
    canHaveChildren: boolean('can_have_children').notNull().default(false),
});

export const fields = pgTable('fields', {
    id: serial('id').primaryKey(),
    name: text('name').notNull().unique(),
    display: boolean('display').notNull().default(true),
});

// ===========================================
// PAGES & SECTIONS: the draft tree. Versions snapshot it.
// ===========================================
export const pages = pgTable('pages', {
    id: serial('id').primaryKey(),
    keyword: text('keyword').notNull().unique(),
    url: text('url'),
    parentPageId: integer('parent').references((): AnyPgColumn => pages.id, { onDelete: 'cascade' }),
    isHeadless: boolean('is_headless').notNull().default(false),
    navPosition: integer('nav_position'),
    footerPosition: integer('footer_position'),
    publishedVersionId: integer('published_version_id').references((): AnyPgColumn => pageVersions.id),
}, (t) => ({
    publishedVersionIdx: index('pages_published_version_idx').on(t.publishedVersionId),
}));

export const sections = pgTable('sections', {
    id: serial('id').primaryKey(),
    styleId: integer('style_id').notNull().references(() => styles.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    debug: boolean('debug').notNull().default(false),
    condition: text('condition'),
    dataConfig: text('data_config'),
    css: text('css'),
    cssMobile: text('css_mobile'),
});

export const pagesSections = pgTable('pages_sections', {
    pageId: integer('page_id').notNull().references(() => pages.id, { onDelete: 'cascade' }),
    sectionId: integer('section_id').notNull().references(() => sections.id, { onDelete: 'cascade' }),
    position: integer('position'),
}, (t) => ({
    pk: primaryKey({ columns: [t.pageId, t.sectionId] }),
}));

export const sectionsHierarchy = pgTable('sections_hierarchy', {
    parentId: integer('parent').notNull().references(() => sections.id, { onDelete: 'cascade' }),
    childId: integer('child').notNull().references(() => sections.id, { onDelete: 'cascade' }),
    position: integer('position'),
}, (t) => ({
    pk: primaryKey({ columns: [t.parentId, t.childId] }),
    childIdx: index('sections_hierarchy_child_idx').on(t.childId),
}));

export const sectionsFieldsTranslation = pgTable('sections_fields_translation', {
    sectionId: integer('section_id').notNull().references(() => sections.id, { onDelete: 'cascade' }),
    fieldId: integer('field_id').notNull().references(() => fields.id, { onDelete: 'cascade' }),
    languageId: integer('language_id').notNull().references(() => languages.id, { onDelete: 'cascade' }),
    content: text('content'),
    meta: text('meta'),
}, (t) => ({
    pk: primaryKey({ columns: [t.sectionId, t.fieldId, t.languageId] }),
    languageIdx: index('sft_language_idx').on(t.languageId),
}));

export const globalValues = pgTable('global_values', {
    key: text('key').notNull(),
    languageId: integer('language_id').notNull().references(() => languages.id, { onDelete: 'cascade' }),
    value: text('value').notNull(),
}, (t) => ({
    pk: primaryKey({ columns: [t.key, t.languageId] }),
}));

// ===========================================
// PAGE VERSIONS: immutable snapshots. Only published_at and metadata change.
// ===========================================
export const pageVersions = pgTable('page_versions', {
    id: serial('id').primaryKey(),
    pageId: integer('page_id').notNull().references((): AnyPgColumn => pages.id, { onDelete: 'cascade' }),
    versionNumber: integer('version_number').notNull(),
    versionName: text('version_name'),
    pageJson: jsonb('page_json').$type<JsonValue>().notNull(),
    createdBy: integer('created_by'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    publishedAt: timestamp('published_at'),
    metadata: jsonb('metadata').$type<JsonObject>(),
}, (t) => ({
    pageVersionUnq: unique('uniq_page_version_number').on(t.pageId, t.versionNumber),
    pageIdx: index('page_versions_page_idx').on(t.pageId),
    createdIdx: index('page_versions_created_idx').on(t.createdAt),
}));

// ===========================================
// DATA TABLES: user-submitted records that sections read through data_config.
// ===========================================
export const dataTables = pgTable('data_tables', {
    id: serial('id').primaryKey(),
    name: text('name').notNull().unique(),
    displayName: text('display_name'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
});

export const dataRecords = pgTable('data_records', {
    id: serial('id').primaryKey(),
    dataTableId: integer('data_table_id').notNull().references(() => dataTables.id, { onDelete: 'cascade' }),
    userId: integer('user_id'),
    /** Null for records that apply to every language. */
    languageId: integer('language_id').references(() => languages.id, { onDelete: 'cascade' }),
    values: jsonb('values').$type<Record<string, JsonValue>>().notNull().default({}),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    deletedAt: timestamp('deleted_at'),
}, (t) => ({
    tableIdx: index('data_records_table_idx').on(t.dataTableId),
    tableUserIdx: index('data_records_table_user_idx').on(t.dataTableId, t.userId),
}));

export type DataRecordRow = typeof dataRecords.$inferSelect;
