/**
 * Variable Scope Store.
 *
 * A scope maps namespaces to values. `system` and `globals` are seeded at the
 * root; every other namespace comes from a section's data-source declarations
 * and is visible to that section's descendants only.
 */

import { isJsonObject, type JsonObject, type JsonValue, type RequestContext, type ScopeStore } from './types';

export const SYSTEM_NAMESPACE = 'system';
export const GLOBALS_NAMESPACE = 'globals';

function datePart(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
    return parts.find((part) => part.type === type)?.value ?? '';
}

/** Calendar date and wall-clock time of `now` in `timeZone`. */
export function formatClock(now: Date, timeZone: string): { date: string; time: string } {
    const parts = new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(now);

    return {
        date: `${datePart(parts, 'year')}-${datePart(parts, 'month')}-${datePart(parts, 'day')}`,
        time: `${datePart(parts, 'hour')}:${datePart(parts, 'minute')}`,
    };
}

export function buildSystemScope(ctx: RequestContext, languageId: number): JsonObject {
    const clock = formatClock(ctx.now, ctx.timezone);
    return {
        user_id: ctx.userId,
        user_name: ctx.userName,
        user_email: ctx.userEmail,
        user_code: ctx.userCode,
        user_group: [...ctx.userGroups],
        language: languageId,
        last_login: ctx.lastLogin ?? '',
        page_keyword: ctx.pageKeyword,
        platform: ctx.platform,
        project_name: ctx.projectName,
        current_date: clock.date,
        current_datetime: `${clock.date} ${clock.time}`,
        current_time: clock.time,
    };
}

export function createRootScope(system: JsonObject, globals: Record<string, string>): ScopeStore {
    return Object.freeze({
        [SYSTEM_NAMESPACE]: system,
        [GLOBALS_NAMESPACE]: { ...globals },
    });
}

/** Inherited namespaces stay visible; a namespace the node produces replaces the inherited one. */
export function mergeScopes(inherited: ScopeStore, local: ScopeStore): ScopeStore {
    return Object.freeze({ ...inherited, ...local });
}

const MISSING: unique symbol = Symbol('missing');

/**
 * Follow a dot path (`namespace.key.nested`) through the scope. Array elements
 * are addressed by index. Returns `undefined` when any segment is absent, and
 * the stored value (including `null`) otherwise.
 */
export function lookupScopePath(scope: ScopeStore, path: string): JsonValue | undefined {
    const segments = path.split('.');
    let current: JsonValue | typeof MISSING = MISSING;

    for (const [i, segment] of segments.entries()) {
        if (i === 0) {
            current = Object.prototype.hasOwnProperty.call(scope, segment) ? scope[segment] : MISSING;
        } else if (current === MISSING) {
            break;
        } else if (Array.isArray(current)) {
            const idx = /^\d+$/.test(segment) ? Number(segment) : -1;
            current = idx >= 0 && idx < current.length ? current[idx] : MISSING;
        } else if (isJsonObject(current)) {
            current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : MISSING;
        } else {
            current = MISSING;
        }
        if (current === MISSING) break;
    }

    return current === MISSING ? undefined : current;
}
