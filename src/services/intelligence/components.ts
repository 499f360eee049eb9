import { FilterValue } from '../../models/filter';
import { ComponentName, UnparsedFragment } from '../../models/intelligence';
import { containsPhrase, normalizePhrase, words } from '../../utils/text';
import { PRIORITY_NAMES } from '../filterCompiler';
import { BoundedMatcher } from '../inputGuard';
import { DateParser } from './dateParser';

export interface ComponentParse {
    component: ComponentName;
    filters: Record<string, FilterValue>;
    description: string;
    unparsed: UnparsedFragment[];
}

/**
 * One independent slice of query understanding. `parse` returns null when
 * the text does not mention the component at all.
 */
export interface ComponentParser {
    readonly component: ComponentName;
    readonly weight: number;
    parse(text: string, signal?: AbortSignal): Promise<ComponentParse | null>;
}

export const RESOLVED_STATES: readonly string[] = ['6', '7', '8'];
export const CURRENT_USER = 'javascript:gs.getUserID()';

export class DateComponent implements ComponentParser {
    public readonly component = 'date';
    public readonly weight = 0.3;

    constructor(
        private readonly dateParser: DateParser,
        private readonly field: string = 'sys_created_on'
    ) { }

    public async parse(text: string): Promise<ComponentParse | null> {
        const outcome = this.dateParser.parse(text);
        if (!outcome) {
            return null;
        }
        if (outcome.kind === 'invalid') {
            return {
                component: this.component,
                filters: {},
                description: '',
                unparsed: [{ component: this.component, fragment: outcome.fragment, detail: outcome.detail }]
            };
        }
        return {
            component: this.component,
            filters: { [this.field]: outcome.range },
            description: outcome.description,
            unparsed: []
        };
    }
}

const LETTER_LEVEL = /\bp(\d{1,2})\b/gi;
const NUMERIC_LEVELS = /\bpriority\s*(?:level\s*)?[:=]?\s*(\d{1,2}(?:\s*(?:,|\/|&|and|or)\s*\d{1,2})*)/gi;
const MIN_LEVEL = 1;
const MAX_LEVEL = 5;

function digitRuns(text: string): string[] {
    const runs: string[] = [];
    let current = '';
    for (const ch of text) {
        if (ch >= '0' && ch <= '9') {
            current += ch;
        } else if (current) {
            runs.push(current);
            current = '';
        }
    }
    if (current) {
        runs.push(current);
    }
    return runs;
}

/**
 * Priority levels from `p1`, `priority 1,2`, descriptive names and the
 * phrase `high priority` (levels 1 and 2).
 */
export class PriorityComponent implements ComponentParser {
    public readonly component = 'priority';
    public readonly weight = 0.3;

    constructor(private readonly matcher: BoundedMatcher) { }

    public async parse(text: string): Promise<ComponentParse | null> {
        const levels = new Set<number>();
        const unparsed: UnparsedFragment[] = [];
        let mentioned = false;

        const accept = (raw: string, fragment: string): void => {
            mentioned = true;
            const level = Number(raw);
            if (level >= MIN_LEVEL && level <= MAX_LEVEL) {
                levels.add(level);
            } else {
                unparsed.push({
                    component: this.component,
                    fragment,
                    detail: `priority level ${raw} is outside ${MIN_LEVEL}-${MAX_LEVEL}`
                });
            }
        };

        for (const found of this.matcher.matchAll(LETTER_LEVEL, text)) {
            accept(found.groups[0] ?? '', found.match);
        }
        for (const found of this.matcher.matchAll(NUMERIC_LEVELS, text)) {
            for (const run of digitRuns(found.groups[0] ?? '')) {
                accept(run, found.match);
            }
        }

        const tokens = words(text);
        tokens.forEach((token, index) => {
            if (token === 'high' && tokens[index + 1] === 'priority') {
                mentioned = true;
                levels.add(1);
                levels.add(2);
                return;
            }
            const level = token === 'urgent' ? '1' : PRIORITY_NAMES[token];
            if (level) {
                mentioned = true;
                levels.add(Number(level));
            }
        });

        if (!mentioned) {
            return null;
        }

        const sorted = [...levels].sort((a, b) => a - b).map(String);
        if (sorted.length === 0) {
            return { component: this.component, filters: {}, description: '', unparsed };
        }
        return {
            component: this.component,
            filters: { priority: sorted },
            description: sorted.length > 1 ? `Priority levels: ${sorted.join(', ')}` : `Priority: ${sorted.join('')}`,
            unparsed
        };
    }
}

interface PhraseRule {
    phrases: string[];
    value: string;
    label: string;
}

const STATE_RULES: PhraseRule[] = [
    { phrases: ['new'], value: '1', label: 'New' },
    { phrases: ['in progress', 'work in progress'], value: '2', label: 'In Progress' },
    { phrases: ['on hold', 'pending', 'waiting'], value: '3', label: 'On Hold' },
    { phrases: ['resolved'], value: '6', label: 'Resolved' },
    { phrases: ['closed'], value: '7', label: 'Closed' },
    { phrases: ['cancelled', 'canceled'], value: '8', label: 'Cancelled' }
];

const ACTIVE_PHRASES = ['active', 'open', 'unresolved', 'outstanding'];

/**
 * Record state. Named states win over the broad `active` / `open` wording,
 * which only excludes resolved, closed and cancelled records.
 */
export class StateComponent implements ComponentParser {
    public readonly component = 'state';
    public readonly weight = 0.2;

    public async parse(text: string): Promise<ComponentParse | null> {
        const normalized = normalizePhrase(text);
        const matched = STATE_RULES.filter(rule => rule.phrases.some(p => containsPhrase(normalized, p)));

        if (matched.length > 0) {
            const values = matched.map(rule => rule.value);
            return {
                component: this.component,
                filters: { state: values.length > 1 ? values : values.join('') },
                description: `State: ${matched.map(rule => rule.label).join(' or ')}`,
                unparsed: []
            };
        }

        if (ACTIVE_PHRASES.some(p => containsPhrase(normalized, p))) {
            return {
                component: this.component,
                filters: { state: { exclude: RESOLVED_STATES } },
                description: 'Excluding resolved/closed records',
                unparsed: []
            };
        }

        return null;
    }
}

const UNASSIGNED_PHRASES = ['unassigned', 'not assigned', 'no assignee', 'without assignee'];
const MINE_PHRASES = ['assigned to me', 'my tickets', 'my incidents', 'my records', 'my tasks'];

export class AssignmentComponent implements ComponentParser {
    public readonly component = 'assignment';
    public readonly weight = 0.2;

    public async parse(text: string): Promise<ComponentParse | null> {
        const normalized = normalizePhrase(text);
        if (UNASSIGNED_PHRASES.some(p => containsPhrase(normalized, p))) {
            return {
                component: this.component,
                filters: { assigned_to: 'ISEMPTY' },
                description: 'Unassigned records',
                unparsed: []
            };
        }
        if (MINE_PHRASES.some(p => containsPhrase(normalized, p))) {
            return {
                component: this.component,
                filters: { assigned_to: CURRENT_USER },
                description: 'Assigned to the current user',
                unparsed: []
            };
        }
        return null;
    }
}
