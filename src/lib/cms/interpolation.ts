/**
 * Interpolation Engine: `{{namespace.key}}` substitution against a scope.
 *
 * Placeholders that do not resolve are left exactly as written, so content
 * rendered against a partial scope degrades to its template text.
 */

import { lookupScopePath } from './scope';
import {
    DataSourceDeclarationSchema,
    type DataSourceDeclaration,
    type FieldConfig,
    type FieldMap,
    type MapField,
    type JsonObject,
    type JsonValue,
    type ScopeStore,
} from './types';

const PLACEHOLDER = /\{\{([^}]+)\}\}/g;

/**
 * Content fields whose text may carry placeholders. Structural fields
 * (ids, style names, positions, property-language fields) are never touched.
 */
export const INTERPOLATED_FIELDS: ReadonlySet<string> = new Set([
    'text',
    'html',
    'markdown',
    'content',
    'label',
    'placeholder',
    'description',
    'name',
    'title',
    'btn_save_label',
    'btn_update_label',
    'btn_cancel_label',
    'btn_cancel_url',
    'alert_success',
    'alert_error',
    'redirect_at_end',
    'confirmation_title',
    'confirmation_continue',
    'confirmation_message',
    'mantine_rich_text_editor_placeholder',
    'mantine_highlight_highlight',
    'mantine_spoiler_show_label',
    'mantine_spoiler_hide_label',
    'mantine_switch_on_label',
    'mantine_switch_off_label',
    'mantine_tooltip_label',
    'mantine_list_item_content',
    'mantine_datepicker_placeholder',
    'mantine_color_picker_button_label',
    'mantine_text_gradient',
    'mantine_accordion_item_value',
    'mantine_accordion_default_value',
    'mantine_notification_title',
    'mantine_title_text_wrap',
    'mantine_blockquote_icon_size',
]);

export function stringifyScopeValue(value: JsonValue): string {
    if (value === null) return '';
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

export function interpolate(content: string, scope: ScopeStore): string {
    if (!content.includes('{{')) return content;

    return content.replace(PLACEHOLDER, (placeholder: string, inner: string) => {
        const value = lookupScopePath(scope, inner.trim());
        return value === undefined ? placeholder : stringifyScopeValue(value);
    });
}

/** Interpolate every string inside a JSON value; keys are left alone. */
export function interpolateDeep(value: JsonValue, scope: ScopeStore): JsonValue {
    if (typeof value === 'string') return interpolate(value, scope);
    if (Array.isArray(value)) return value.map((item) => interpolateDeep(item, scope));
    if (value !== null && typeof value === 'object') {
        const result: JsonObject = {};
        for (const [key, item] of Object.entries(value)) {
            result[key] = interpolateDeep(item, scope);
        }
        return result;
    }
    return value;
}

export function interpolateNullable(value: string | null, scope: ScopeStore): string | null {
    return value === null ? null : interpolate(value, scope);
}

/** Content fields get both `content` and `meta` interpolated; other fields pass through. */
export function interpolateFields(fields: FieldMap, scope: ScopeStore): FieldMap {
    const result: FieldMap = {};
    for (const [name, field] of Object.entries(fields)) {
        result[name] = INTERPOLATED_FIELDS.has(name)
            ? { content: interpolateNullable(field.content, scope), meta: interpolateNullable(field.meta, scope) }
            : field;
    }
    return result;
}

export function declarationToJson(declaration: DataSourceDeclaration): JsonObject {
    const json: JsonObject = {};
    for (const [key, value] of Object.entries(declaration)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
            const entries: Array<FieldConfig | MapField> = value;
            json[key] = entries.map((entry) => {
                const item: JsonObject = {};
                for (const [entryKey, entryValue] of Object.entries(entry)) {
                    if (typeof entryValue === 'string') item[entryKey] = entryValue;
                }
                return item;
            });
        } else {
            json[key] = value;
        }
    }
    return json;
}

/**
 * Interpolate the string-valued parts of a declaration (table, filter, scope,
 * field lists). A result that no longer validates keeps the original.
 */
export function interpolateDeclaration(declaration: DataSourceDeclaration, scope: ScopeStore): DataSourceDeclaration {
    const interpolated = DataSourceDeclarationSchema.safeParse(interpolateDeep(declarationToJson(declaration), scope));
    return interpolated.success ? interpolated.data : declaration;
}
