/**
 * Filter expressions for data_config declarations.
 *
 * A filter is a conjunction of comparisons, optionally prefixed with AND:
 *
 *     AND status = 'open' AND score >= 10 AND archived_at IS NULL
 *
 * Field names address keys of a record's values, plus the reserved columns
 * `record_id`, `user_id` and `created_at`. Values are single-quoted strings
 * (with '' as an escaped quote) or numbers. Everything is bound as a
 * parameter; the expression text never reaches SQL directly.
 */

import { and, sql, type SQL } from 'drizzle-orm';
import { dataRecords } from './schema';

export type FilterOperator = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'LIKE' | 'IS NULL' | 'IS NOT NULL';

export type FilterCondition =
    | { field: string; operator: Exclude<FilterOperator, 'IS NULL' | 'IS NOT NULL'>; value: string | number }
    | { field: string; operator: 'IS NULL' }
    | { field: string; operator: 'IS NOT NULL' };

export class RecordFilterError extends Error {
    constructor(message: string, readonly filter: string) {
        super(`Invalid filter "${filter}": ${message}`);
        this.name = 'RecordFilterError';
    }
}

type Token =
    | { kind: 'word'; text: string }
    | { kind: 'op'; text: string }
    | { kind: 'string'; text: string }
    | { kind: 'number'; value: number };

const WORD = /^[A-Za-z_][A-Za-z0-9_]*/;
const NUMBER = /^-?\d+(\.\d+)?/;
const OPERATOR = /^(<=|>=|!=|<>|=|<|>)/;

function tokenize(filter: string): Token[] {
    const tokens: Token[] = [];
    let rest = filter;

    while (rest.length > 0) {
        const trimmed = rest.replace(/^\s+/, '');
        if (trimmed.length === 0) break;
        rest = trimmed;

        if (rest[0] === "'") {
            let value = '';
            let i = 1;
            for (; i < rest.length; i++) {
                if (rest[i] === "'") {
                    if (rest[i + 1] === "'") {
                        value += "'";
                        i++;
                        continue;
                    }
                    break;
                }
                value += rest[i];
            }
            if (i >= rest.length) throw new RecordFilterError('unterminated string', filter);
            tokens.push({ kind: 'string', text: value });
            rest = rest.slice(i + 1);
            continue;
        }

        const op = OPERATOR.exec(rest);
        if (op) {
            tokens.push({ kind: 'op', text: op[0] === '<>' ? '!=' : op[0] });
            rest = rest.slice(op[0].length);
            continue;
        }

        const number = NUMBER.exec(rest);
        if (number) {
            tokens.push({ kind: 'number', value: Number(number[0]) });
            rest = rest.slice(number[0].length);
            continue;
        }

        const word = WORD.exec(rest);
        if (word) {
            tokens.push({ kind: 'word', text: word[0] });
            rest = rest.slice(word[0].length);
            continue;
        }

        throw new RecordFilterError(`unexpected character '${rest[0]}'`, filter);
    }

    return tokens;
}

function isKeyword(token: Token | undefined, keyword: string): boolean {
    return token?.kind === 'word' && token.text.toUpperCase() === keyword;
}

export function parseRecordFilter(filter: string): FilterCondition[] {
    const tokens = tokenize(filter);
    const conditions: FilterCondition[] = [];
    let pos = 0;

    if (isKeyword(tokens[pos], 'AND')) pos++;

    while (pos < tokens.length) {
        const field = tokens[pos];
        if (field?.kind !== 'word') throw new RecordFilterError('expected a field name', filter);
        pos++;

        if (isKeyword(tokens[pos], 'IS')) {
            pos++;
            const negated = isKeyword(tokens[pos], 'NOT');
            if (negated) pos++;
            if (!isKeyword(tokens[pos], 'NULL')) throw new RecordFilterError('expected NULL after IS', filter);
            pos++;
            conditions.push({ field: field.text, operator: negated ? 'IS NOT NULL' : 'IS NULL' });
        } else {
            const operatorToken = tokens[pos];
            let operator: Exclude<FilterOperator, 'IS NULL' | 'IS NOT NULL'>;
            if (isKeyword(operatorToken, 'LIKE')) {
                operator = 'LIKE';
            } else if (operatorToken?.kind === 'op') {
                operator = toComparison(operatorToken.text, filter);
            } else {
                throw new RecordFilterError(`expected an operator after ${field.text}`, filter);
            }
            pos++;

            const valueToken = tokens[pos];
            if (valueToken?.kind === 'string') {
                conditions.push({ field: field.text, operator, value: valueToken.text });
            } else if (valueToken?.kind === 'number') {
                conditions.push({ field: field.text, operator, value: valueToken.value });
            } else {
                throw new RecordFilterError(`expected a value after ${field.text} ${operator}`, filter);
            }
            pos++;
        }

        if (pos < tokens.length) {
            if (!isKeyword(tokens[pos], 'AND')) throw new RecordFilterError('conditions must be joined with AND', filter);
            pos++;
            if (pos >= tokens.length) throw new RecordFilterError('dangling AND', filter);
        }
    }

    return conditions;
}

function toComparison(text: string, filter: string): Exclude<FilterOperator, 'IS NULL' | 'IS NOT NULL' | 'LIKE'> {
    switch (text) {
        case '=':
        case '!=':
        case '<':
        case '<=':
        case '>':
        case '>=':
            return text;
        default:
            throw new RecordFilterError(`unknown operator ${text}`, filter);
    }
}

function columnFor(field: string, numeric: boolean): SQL {
    switch (field) {
        case 'record_id':
            return sql`${dataRecords.id}`;
        case 'user_id':
            return sql`${dataRecords.userId}`;
        case 'created_at':
            return sql`${dataRecords.createdAt}`;
        default:
            return numeric
                ? sql`(${dataRecords.values} ->> ${field})::numeric`
                : sql`${dataRecords.values} ->> ${field}`;
    }
}

function conditionToSql(condition: FilterCondition): SQL {
    if (condition.operator === 'IS NULL') return sql`${columnFor(condition.field, false)} IS NULL`;
    if (condition.operator === 'IS NOT NULL') return sql`${columnFor(condition.field, false)} IS NOT NULL`;

    const column = columnFor(condition.field, typeof condition.value === 'number');
    return sql`${column} ${sql.raw(condition.operator)} ${condition.value}`;
}

/** Parameterised WHERE fragment for a filter; undefined when it is empty. */
export function recordFilterToSql(filter: string): SQL | undefined {
    const conditions = parseRecordFilter(filter);
    if (conditions.length === 0) return undefined;
    return and(...conditions.map(conditionToSql));
}
