/**
 * Data Retrieval Stage.
 *
 * Every declaration is interpolated against the inherited scope, fetched, and
 * shaped into a namespace. Failures are returned, never thrown: one broken
 * declaration must not take its siblings or the section down with it.
 */

import { errorMessage } from '@/lib/logger';
import { interpolateDeclaration, stringifyScopeValue } from './interpolation';
import type { DataRetriever, DataRow, RetrieveRequest } from './ports';
import type {
    DataSourceDeclaration,
    FieldConfig,
    JsonObject,
    JsonValue,
    Result,
    RetrieveMode,
    ScopeStore,
} from './types';

export interface RetrievalContext {
    retriever: DataRetriever;
    languageId: number;
    timezone: string;
    userId: number | null;
}

export interface DeclarationOutcome {
    /** Namespace the result lands in: the declared scope, or the declaration's index. */
    namespace: string;
    declaration: DataSourceDeclaration;
    result: Result<JsonValue>;
}

export function namespaceFor(declaration: DataSourceDeclaration, index: number): string {
    return declaration.scope && declaration.scope.trim() !== '' ? declaration.scope : String(index);
}

function isEmptyValue(value: JsonValue | undefined): boolean {
    return value === undefined || value === null || value === '';
}

function projectField(record: DataRow, field: FieldConfig): JsonValue {
    const value = record[field.field_name];
    return isEmptyValue(value) ? field.not_found_text ?? '' : value ?? '';
}

function holderOf(field: FieldConfig): string {
    return field.field_holder ?? field.field_name;
}

function projectRecord(record: DataRow, declaration: DataSourceDeclaration): JsonObject {
    const allFields = declaration.all_fields ?? true;
    const fields = declaration.fields ?? [];
    if (allFields || fields.length === 0) {
        return { ...record };
    }

    const projected: JsonObject = {};
    for (const field of fields) {
        projected[holderOf(field)] = projectField(record, field);
    }
    return projected;
}

/** One entry per output field: values of that field across every row. */
function collectColumns(rows: DataRow[], declaration: DataSourceDeclaration): Array<[string, JsonValue[]]> {
    const allFields = declaration.all_fields ?? true;
    const fields = declaration.fields ?? [];

    if (allFields || fields.length === 0) {
        const names = Object.keys(rows[0] ?? {});
        return names.map((name) => [name, rows.map((row) => row[name] ?? null)]);
    }

    return fields.map((field) => [holderOf(field), rows.map((row) => projectField(row, field))]);
}

function shapeJson(rows: DataRow[], declaration: DataSourceDeclaration): JsonValue[] {
    const mapFields = declaration.map_fields ?? [];
    const fields = declaration.fields ?? [];

    return rows.map((row) => {
        const record: JsonObject = {};
        for (const mapping of mapFields) {
            const value = row[mapping.field_name];
            if (value !== undefined && value !== null) {
                record[mapping.field_new_name] = value;
            }
        }
        if (fields.length === 0) {
            return { ...row, ...record };
        }
        for (const field of fields) {
            record[holderOf(field)] = projectField(row, field);
        }
        return record;
    });
}

/** Turn fetched rows into the namespace value for the declaration's retrieve mode. */
export function shapeRows(rows: DataRow[], declaration: DataSourceDeclaration): JsonValue {
    const mode: RetrieveMode = declaration.retrieve ?? 'all';

    switch (mode) {
        case 'first':
        case 'last':
            return rows[0] ? projectRecord(rows[0], declaration) : {};
        case 'all': {
            if (rows.length === 0) return {};
            if (rows.length === 1) return projectRecord(rows[0], declaration);
            const joined: JsonObject = {};
            for (const [name, values] of collectColumns(rows, declaration)) {
                joined[name] = values.map(stringifyScopeValue).join(',');
            }
            return joined;
        }
        case 'all_as_array': {
            if (rows.length === 0) return {};
            const columns: JsonObject = {};
            for (const [name, values] of collectColumns(rows, declaration)) {
                columns[name] = values;
            }
            return columns;
        }
        case 'JSON':
            return shapeJson(rows, declaration);
        default: {
            const unreachable: never = mode;
            throw new Error(`Unsupported retrieve mode: ${String(unreachable)}`);
        }
    }
}

export function buildRetrieveRequest(declaration: DataSourceDeclaration, ctx: RetrievalContext): RetrieveRequest {
    const mode: RetrieveMode = declaration.retrieve ?? 'all';
    const allFields = declaration.all_fields ?? true;
    const fields = declaration.fields ?? [];

    return {
        table: declaration.table,
        filter: declaration.filter ?? '',
        fields: allFields || fields.length === 0 ? null : fields.map((field) => field.field_name),
        excludeDeleted: true,
        languageId: ctx.languageId,
        timezone: ctx.timezone,
        ownEntriesOnly: declaration.current_user ?? true,
        userId: ctx.userId,
        order: mode === 'last' ? 'desc' : 'asc',
        limit: mode === 'first' || mode === 'last' ? 1 : null,
    };
}

async function runDeclaration(
    declaration: DataSourceDeclaration,
    ctx: RetrievalContext,
): Promise<Result<JsonValue>> {
    try {
        const rows = await ctx.retriever.retrieve(buildRetrieveRequest(declaration, ctx));
        return { ok: true, value: shapeRows(rows, declaration) };
    } catch (error) {
        return { ok: false, error: errorMessage(error) };
    }
}

/**
 * Evaluate a section's declarations in order. Declarations are interpolated
 * against `inherited` only, so one declaration cannot see another declared in
 * the same section.
 */
export async function retrieveSectionData(
    declarations: DataSourceDeclaration[],
    inherited: ScopeStore,
    ctx: RetrievalContext,
): Promise<DeclarationOutcome[]> {
    const outcomes: DeclarationOutcome[] = [];
    for (const [index, raw] of declarations.entries()) {
        const declaration = interpolateDeclaration(raw, inherited);
        outcomes.push({
            namespace: namespaceFor(declaration, index),
            declaration,
            result: await runDeclaration(declaration, ctx),
        });
    }
    return outcomes;
}
