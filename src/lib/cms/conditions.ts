/**
 * Condition Evaluator.
 *
 * Sections carry an optional JsonLogic rule (stored as JSON text, sometimes
 * encoded more than once). The orchestrator talks to a `ConditionEvaluator`;
 * which one is used is picked by `ConditionEvaluatorKind`.
 */

import * as jsonLogic from 'json-logic-js';
import type { RulesLogic } from 'json-logic-js';
import { errorMessage } from '@/lib/logger';
import { lookupScopePath, SYSTEM_NAMESPACE } from './scope';
import { isJsonObject, JsonValueSchema, type ConditionTrace, type JsonObject, type JsonValue, type ScopeStore } from './types';

export interface ConditionRequest {
    expression: string;
    userId: number | null;
    /** Used in error messages only. */
    sectionName: string;
    scope: ScopeStore;
}

export interface ConditionEvaluator {
    evaluate(request: ConditionRequest): ConditionTrace | Promise<ConditionTrace>;
}

export interface ConditionOutcome {
    passes: boolean;
    trace: ConditionTrace | null;
}

const MAX_DECODE_ATTEMPTS = 5;

type Decoded = { ok: true; value: JsonValue } | { ok: false; error: string };

function parseJson(text: string): Decoded {
    try {
        const parsed = JsonValueSchema.safeParse(JSON.parse(text));
        return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: 'not a JSON value' };
    } catch (error) {
        return { ok: false, error: errorMessage(error) };
    }
}

/** Decode a stored condition, unwrapping up to five layers of JSON-in-a-string. */
export function decodeCondition(expression: string): Decoded {
    const first = parseJson(expression);
    if (!first.ok) return first;

    let value = first.value;
    for (let attempt = 0; attempt < MAX_DECODE_ATTEMPTS && typeof value === 'string'; attempt++) {
        const next = parseJson(value);
        if (!next.ok) break;
        value = next.value;
    }
    return { ok: true, value };
}

/** Every `{"var": ...}` name a rule reads, in first-seen order. */
export function extractConditionVariables(rule: JsonValue): string[] {
    const names: string[] = [];
    const visit = (node: JsonValue) => {
        if (Array.isArray(node)) {
            node.forEach(visit);
            return;
        }
        if (!isJsonObject(node)) return;
        for (const [operator, args] of Object.entries(node)) {
            if (operator === 'var') {
                const name = Array.isArray(args) ? args[0] : args;
                if ((typeof name === 'string' || typeof name === 'number') && !names.includes(String(name))) {
                    names.push(String(name));
                }
            } else {
                visit(args);
            }
        }
    };
    visit(rule);
    return names;
}

/**
 * Data visible to a rule: every namespace of the scope, plus the `system`
 * keys un-prefixed (`user_group`, `platform`, ...). A namespace wins over a
 * system key of the same name.
 */
export function buildConditionData(scope: ScopeStore): JsonObject {
    const system = scope[SYSTEM_NAMESPACE];
    return { ...(isJsonObject(system) ? system : {}), ...scope };
}

const SWAPPED_OPERATORS = new Set(['in', 'notIn']);
/** Operators whose later arguments read the current element, not the page data. */
const ELEMENT_OPERATORS = new Set(['map', 'filter', 'reduce', 'all', 'some', 'none']);
const NUMERIC = /^-?\d+(\.\d+)?$/;

function isVarNode(node: JsonValue | undefined): boolean {
    return isJsonObject(node) && Object.keys(node).length === 1 && 'var' in node;
}

/**
 * Rewrite a rule the way the editor's query builder means it:
 * `{"in": [{"var": "user_group"}, ["admin"]]}` asks whether "admin" is one of
 * the user's groups, so the operands are swapped and a one-element list is
 * unwrapped. A `{"var": "38"}` left behind by interpolation becomes the
 * value "38".
 */
export function normalizeConditionRule(node: JsonValue): JsonValue {
    if (Array.isArray(node)) return node.map(normalizeConditionRule);
    if (!isJsonObject(node)) return node;

    const name = node.var;
    if (isVarNode(node) && typeof name === 'string' && NUMERIC.test(name)) return name;

    const result: JsonObject = {};
    for (const [operator, args] of Object.entries(node)) {
        if (operator === 'var') {
            result[operator] = args;
        } else if (SWAPPED_OPERATORS.has(operator) && Array.isArray(args) && args.length === 2 && isVarNode(args[0])) {
            const [field, selected] = args;
            const value = Array.isArray(selected) && selected.length === 1 ? selected[0] : selected;
            result[operator] = [normalizeConditionRule(value), normalizeConditionRule(field)];
        } else if (ELEMENT_OPERATORS.has(operator) && Array.isArray(args) && args.length > 0) {
            const [source, ...rest] = args;
            result[operator] = [normalizeConditionRule(source), ...rest];
        } else {
            result[operator] = normalizeConditionRule(args);
        }
    }
    return result;
}

function isRulesLogic(value: unknown): value is RulesLogic {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTruthy(value: unknown): boolean {
    return Array.isArray(value) ? value.length > 0 : Boolean(value);
}

export class JsonLogicConditionEvaluator implements ConditionEvaluator {
    evaluate(request: ConditionRequest): ConditionTrace {
        const decoded = decodeCondition(request.expression);
        if (!decoded.ok) {
            return this.failure(
                `Invalid JSON condition in section '${request.sectionName}': ${decoded.error}`,
                request.expression,
            );
        }

        const rule = decoded.value;
        if (typeof rule === 'boolean') {
            return { result: rule, error: null, variables: {}, conditionObject: rule };
        }
        if (!isJsonObject(rule) || !isRulesLogic(rule)) {
            return this.failure(
                `Condition must be a JSON object in section '${request.sectionName}' (got ${JSON.stringify(rule)})`,
                rule,
            );
        }

        const normalized = normalizeConditionRule(rule);
        const data = buildConditionData(request.scope);
        const variables: JsonObject = {};
        for (const name of extractConditionVariables(normalized)) {
            variables[name] = lookupScopePath(data, name) ?? null;
        }
        if (!isRulesLogic(normalized)) {
            return { result: isTruthy(normalized), error: null, variables, conditionObject: normalized };
        }

        try {
            const outcome: unknown = jsonLogic.apply(normalized, data);
            return { result: isTruthy(outcome), error: null, variables, conditionObject: normalized };
        } catch (error) {
            return {
                result: false,
                error: `JsonLogic evaluation failed in section '${request.sectionName}': ${errorMessage(error)}`,
                variables,
                conditionObject: normalized,
            };
        }
    }

    private failure(error: string, conditionObject: JsonValue): ConditionTrace {
        return { result: false, error, variables: {}, conditionObject };
    }
}

export class AlwaysPassConditionEvaluator implements ConditionEvaluator {
    evaluate(request: ConditionRequest): ConditionTrace {
        return { result: true, error: null, variables: {}, conditionObject: request.expression };
    }
}

export type ConditionEvaluatorKind = 'json_logic' | 'always_pass';

export function createConditionEvaluator(kind: ConditionEvaluatorKind): ConditionEvaluator {
    switch (kind) {
        case 'json_logic':
            return new JsonLogicConditionEvaluator();
        case 'always_pass':
            return new AlwaysPassConditionEvaluator();
        default: {
            const unreachable: never = kind;
            throw new Error(`Unknown condition evaluator: ${String(unreachable)}`);
        }
    }
}

/**
 * Decide whether a section renders. No condition always passes. An evaluator
 * that throws hides the section, with the error kept in the trace.
 */
export async function evaluateSectionCondition(
    evaluator: ConditionEvaluator,
    condition: string | null,
    request: Omit<ConditionRequest, 'expression'>,
): Promise<ConditionOutcome> {
    if (condition === null || condition.trim() === '') {
        return { passes: true, trace: null };
    }

    try {
        const trace = await evaluator.evaluate({ ...request, expression: condition });
        return { passes: trace.result, trace };
    } catch (error) {
        return {
            passes: false,
            trace: {
                result: false,
                error: `Condition evaluation failed in section '${request.sectionName}': ${errorMessage(error)}`,
                variables: {},
                conditionObject: condition,
            },
        };
    }
}
