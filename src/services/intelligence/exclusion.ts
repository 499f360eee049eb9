import { UnparsedFragment } from '../../models/intelligence';
import { OperationCancelledError } from '../../utils/errors';
import { containsQuerySyntax } from '../filterCompiler';
import { BoundedMatcher } from '../inputGuard';
import { ComponentParse, ComponentParser } from './components';
import { EntityResolver } from './entityResolver';

const EXCLUSION_TRIGGER = /\b(?:exclud(?:e|es|ing)|without|except|not)\s+(?:the\s+)?(caller|reporter|assignee|user)s?\b/gi;

const FIELD_MAPPING: Readonly<Record<string, string>> = {
    caller: 'caller_id',
    reporter: 'caller_id',
    user: 'caller_id',
    assignee: 'assigned_to'
};

// A value list ends at the first of these words.
const VALUE_TERMINATORS = new Set([
    'from', 'in', 'on', 'incidents', 'incident', 'tickets', 'ticket', 'and', 'or',
    'between', 'created', 'with', 'excluding', 'exclude', 'without', 'except', 'not'
]);

function stripQuotes(value: string): string {
    return [...value].filter(ch => ch !== '"' && ch !== '\'').join('').trim();
}

/**
 * Values after a trigger phrase, cut at the first terminator word and
 * split on commas.
 */
export function exclusionValues(tail: string): string[] {
    const kept: string[] = [];
    for (const token of tail.trim().split(' ')) {
        const bare = token.endsWith(',') ? token.slice(0, -1) : token;
        if (VALUE_TERMINATORS.has(bare.toLowerCase())) {
            break;
        }
        if (token) {
            kept.push(token);
        }
    }
    return kept
        .join(' ')
        .split(',')
        .map(stripQuotes)
        .filter(value => value.length > 0);
}

function isIdentifierCharacter(ch: string): boolean {
    return (ch >= '0' && ch <= '9') || (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z')
        || ch === '_' || ch === '.' || ch === '-';
}

/**
 * True for values that already look like identifiers: letters, digits and
 * `_.-` only, with at least one digit or underscore (a hex sys_id qualifies).
 */
export function isIdentifierShaped(value: string): boolean {
    const chars = [...value];
    return chars.length > 0
        && chars.every(isIdentifierCharacter)
        && chars.some(ch => (ch >= '0' && ch <= '9') || ch === '_');
}

/**
 * `excluding caller <names>` and similar phrasings. Each name is resolved
 * through the EntityResolver; names it cannot resolve are reported as
 * unparsed rather than sent as literal values.
 */
export class ExclusionComponent implements ComponentParser {
    public readonly component = 'exclusion';
    public readonly weight = 0.2;

    constructor(
        private readonly matcher: BoundedMatcher,
        private readonly resolver: EntityResolver
    ) { }

    public async parse(text: string, signal?: AbortSignal): Promise<ComponentParse | null> {
        const triggers = this.matcher.matchAll(EXCLUSION_TRIGGER, text);
        if (triggers.length === 0) {
            return null;
        }

        const excluded = new Map<string, string[]>();
        const unparsed: UnparsedFragment[] = [];

        for (const trigger of triggers) {
            const role = (trigger.groups[0] ?? '').toLowerCase();
            const field = FIELD_MAPPING[role] ?? 'caller_id';
            const values = exclusionValues(text.slice(trigger.index + trigger.match.length));

            // "without assignee" on its own is an assignment phrase.
            if (values.length === 0) {
                continue;
            }

            for (const value of values) {
                if (signal?.aborted) {
                    throw new OperationCancelledError('exclusion.resolve');
                }
                if (containsQuerySyntax(value)) {
                    unparsed.push({ component: this.component, fragment: value, detail: 'contains query operators' });
                    continue;
                }
                const id = isIdentifierShaped(value) ? value : await this.resolver.resolve(value, field, signal);
                if (!id) {
                    unparsed.push({ component: this.component, fragment: value, detail: `no ${role} matches this name` });
                    continue;
                }
                const ids = excluded.get(field) ?? [];
                if (!ids.includes(id)) {
                    ids.push(id);
                }
                excluded.set(field, ids);
            }
        }

        if (excluded.size === 0 && unparsed.length === 0) {
            return null;
        }

        const filters: ComponentParse['filters'] = {};
        const descriptions: string[] = [];
        for (const [field, ids] of excluded) {
            filters[field] = { exclude: ids };
            descriptions.push(`Excluding ${ids.length} ${field === 'assigned_to' ? 'assignee' : 'caller'} value(s)`);
        }

        return { component: this.component, filters, description: descriptions.join(', '), unparsed };
    }
}
