import { describe, expect, it } from 'vitest';
import {
    AlwaysPassConditionEvaluator,
    buildConditionData,
    createConditionEvaluator,
    decodeCondition,
    evaluateSectionCondition,
    extractConditionVariables,
    JsonLogicConditionEvaluator,
    normalizeConditionRule,
    type ConditionEvaluator,
} from '@/lib/cms/conditions';
import type { JsonValue, ScopeStore } from '@/lib/cms/types';

const scope: ScopeStore = {
    system: { user_id: 7, user_group: ['editors'], platform: 'web' },
    orders: { count: 3 },
};

const request = { userId: 7, sectionName: 'hero', scope };

describe('decodeCondition', () => {
    it('unwraps JSON encoded more than once', () => {
        const rule = { '==': [1, 1] };
        const twice = JSON.stringify(JSON.stringify(rule));
        const thrice = JSON.stringify(twice);

        expect(decodeCondition(twice)).toEqual({ ok: true, value: rule });
        expect(decodeCondition(thrice)).toEqual({ ok: true, value: rule });
    });

    it('stops at a string that is not JSON', () => {
        expect(decodeCondition('"hello"')).toEqual({ ok: true, value: 'hello' });
    });

    it('reports text that is not JSON at all', () => {
        expect(decodeCondition('{oops').ok).toBe(false);
    });
});

describe('extractConditionVariables', () => {
    it('collects var names once each, including the array form', () => {
        const rule: JsonValue = {
            and: [
                { '>': [{ var: 'orders.count' }, 1] },
                { in: ['editors', { var: ['user_group', []] }] },
                { '==': [{ var: 'orders.count' }, 3] },
            ],
        };

        expect(extractConditionVariables(rule)).toEqual(['orders.count', 'user_group']);
    });
});

describe('normalizeConditionRule', () => {
    it('swaps query-builder in operands and unwraps a single selected value', () => {
        expect(normalizeConditionRule({ in: [{ var: 'user_group' }, ['admin']] }))
            .toEqual({ in: ['admin', { var: 'user_group' }] });
        expect(normalizeConditionRule({ notIn: [{ var: 'user_group' }, 'guest'] }))
            .toEqual({ notIn: ['guest', { var: 'user_group' }] });
        expect(normalizeConditionRule({ in: [{ var: 'user_group' }, ['a', 'b']] }))
            .toEqual({ in: [['a', 'b'], { var: 'user_group' }] });
    });

    it('leaves the standard in form alone', () => {
        const rule = { in: ['admin', { var: 'user_group' }] };
        expect(normalizeConditionRule(rule)).toEqual(rule);
    });

    it('turns a numeric var into its value at any depth', () => {
        expect(normalizeConditionRule({ and: [{ '==': [{ var: '38' }, 38] }, { var: 'orders.count' }] }))
            .toEqual({ and: [{ '==': ['38', 38] }, { var: 'orders.count' }] });
    });

    it('does not rewrite the per-element part of array operators', () => {
        const rule: JsonValue = { some: [{ var: 'user_group' }, { '==': [{ var: '0' }, 'x'] }] };
        expect(normalizeConditionRule(rule)).toEqual(rule);
    });
});

describe('buildConditionData', () => {
    it('exposes system keys un-prefixed next to every namespace', () => {
        expect(buildConditionData(scope)).toEqual({
            user_id: 7,
            user_group: ['editors'],
            platform: 'web',
            system: scope.system,
            orders: { count: 3 },
        });
    });
});

describe('JsonLogicConditionEvaluator', () => {
    const evaluator = new JsonLogicConditionEvaluator();

    it('evaluates against namespaced and system variables and records them', () => {
        const expression = JSON.stringify({
            and: [{ '>': [{ var: 'orders.count' }, 2] }, { in: ['editors', { var: 'user_group' }] }],
        });

        const trace = evaluator.evaluate({ ...request, expression });

        expect(trace.result).toBe(true);
        expect(trace.error).toBeNull();
        expect(trace.variables).toEqual({ 'orders.count': 3, user_group: ['editors'] });
    });

    it('records missing variables as null', () => {
        const trace = evaluator.evaluate({ ...request, expression: '{"==":[{"var":"profile.age"},null]}' });
        expect(trace.result).toBe(true);
        expect(trace.variables).toEqual({ 'profile.age': null });
    });

    it('takes a boolean literal at face value', () => {
        expect(evaluator.evaluate({ ...request, expression: 'false' }).result).toBe(false);
        expect(evaluator.evaluate({ ...request, expression: '"true"' }).result).toBe(true);
    });

    it('fails closed on invalid JSON with the section named in the error', () => {
        const trace = evaluator.evaluate({ ...request, expression: '{oops' });
        expect(trace.result).toBe(false);
        expect(trace.error).toMatch(/^Invalid JSON condition in section 'hero': /);
        expect(trace.conditionObject).toBe('{oops');
    });

    it('rejects rules that are not objects', () => {
        const trace = evaluator.evaluate({ ...request, expression: '[1,2]' });
        expect(trace.result).toBe(false);
        expect(trace.error).toBe("Condition must be a JSON object in section 'hero' (got [1,2])");
    });

    it('checks query-builder membership rules against the user groups', () => {
        const admin = { ...request, scope: { system: { user_group: ['admin'] } } };
        const expression = '{"in":[{"var":"user_group"},["admin"]]}';

        expect(evaluator.evaluate({ ...admin, expression }).result).toBe(true);
        expect(evaluator.evaluate({ ...request, expression }).result).toBe(false);
    });

    it('compares a numeric var as a literal value', () => {
        const trace = evaluator.evaluate({ ...request, expression: '{"==":[{"var":"38"},38]}' });
        expect(trace.result).toBe(true);
        expect(trace.variables).toEqual({});
        expect(trace.conditionObject).toEqual({ '==': ['38', 38] });
    });

    it('fails closed when the rule cannot be applied', () => {
        const trace = evaluator.evaluate({ ...request, expression: '{"is_admin_of":[{"var":"user_group"}]}' });

        expect(trace.result).toBe(false);
        expect(trace.error).toBe("JsonLogic evaluation failed in section 'hero': Unrecognized operation is_admin_of");
        expect(trace.variables).toEqual({ user_group: ['editors'] });
    });

    it('treats an empty array result as false', () => {
        const trace = evaluator.evaluate({ ...request, expression: '{"filter":[[],{"var":""}]}' });
        expect(trace.result).toBe(false);
    });
});

describe('evaluateSectionCondition', () => {
    it('passes sections without a condition and returns no trace', async () => {
        const evaluator = new JsonLogicConditionEvaluator();
        expect(await evaluateSectionCondition(evaluator, null, request)).toEqual({ passes: true, trace: null });
        expect(await evaluateSectionCondition(evaluator, '  ', request)).toEqual({ passes: true, trace: null });
    });

    it('hides the section when the evaluator throws and keeps the error', async () => {
        const throwing: ConditionEvaluator = {
            evaluate: () => {
                throw new Error('engine down');
            },
        };

        const outcome = await evaluateSectionCondition(throwing, '{"==":[1,1]}', request);

        expect(outcome).toEqual({
            passes: false,
            trace: {
                result: false,
                error: "Condition evaluation failed in section 'hero': engine down",
                variables: {},
                conditionObject: '{"==":[1,1]}',
            },
        });
    });

    it('hides the section when the rule uses an unknown operator', async () => {
        const outcome = await evaluateSectionCondition(new JsonLogicConditionEvaluator(), '{"is_admin_of":[{"var":"user_group"}]}', request);
        expect(outcome.passes).toBe(false);
        expect(outcome.trace?.error).toBe("JsonLogic evaluation failed in section 'hero': Unrecognized operation is_admin_of");
    });

    it('awaits asynchronous evaluators', async () => {
        const denying: ConditionEvaluator = {
            evaluate: async () => ({ result: false, error: null, variables: {}, conditionObject: null }),
        };
        expect((await evaluateSectionCondition(denying, 'x', request)).passes).toBe(false);
    });
});

describe('createConditionEvaluator', () => {
    it('builds the requested evaluator', () => {
        expect(createConditionEvaluator('json_logic')).toBeInstanceOf(JsonLogicConditionEvaluator);
        expect(createConditionEvaluator('always_pass')).toBeInstanceOf(AlwaysPassConditionEvaluator);
    });

    it('always_pass ignores the rule', async () => {
        const outcome = await evaluateSectionCondition(createConditionEvaluator('always_pass'), 'false', request);
        expect(outcome.passes).toBe(true);
    });
});
