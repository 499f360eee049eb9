import {
    COMPLETE_QUERY_KEY,
    DateRange,
    FilterSpec,
    FilterValue,
    isDateRange,
    isExclusion,
    isStringList
} from '../models/filter';
import { ValidationError } from '../utils/errors';
import { DateParser, isIsoDate, isIsoDateTime } from './intelligence/dateParser';

export const PRIORITY_NAMES: Readonly<Record<string, string>> = {
    critical: '1',
    high: '2',
    moderate: '3',
    medium: '3',
    low: '4',
    planning: '5'
};

const DATE_FIELDS = new Set([
    'sys_created_on',
    'sys_updated_on',
    'opened_at',
    'resolved_at',
    'closed_at',
    'due_date',
    'start_date',
    'end_date'
]);

const PRIORITY_FIELDS = new Set(['priority', 'impact', 'urgency']);

const FIELD_SUFFIX_OPERATORS: ReadonlyArray<[string, string]> = [
    ['_gte', '>='],
    ['_lte', '<='],
    ['_gt', '>'],
    ['_lt', '<'],
    ['_ne', '!=']
];

const VALUE_OPERATORS = ['>=', '<=', '!=', '>', '<'];
const WORD_OPERATORS = ['LIKE', 'NOTLIKE', 'STARTSWITH', 'ENDSWITH'];
const UNARY_OPERATORS: Readonly<Record<string, string>> = {
    ISEMPTY: 'ISEMPTY',
    ISNOTEMPTY: 'ISNOTEMPTY',
    NULL: 'ISEMPTY'
};

// Left unescaped by encodeQuery: unreserved URL characters plus the
// punctuation the query dialect depends on.
const PROTECTED_CHARACTERS = new Set([...'-_.~=^@()!<>:\',*']);

// Characters that carry meaning in the query dialect; never valid inside a single value.
const QUERY_SYNTAX = new Set([...'^=!<>@']);

/**
 * True when a value would change the structure of a compiled query rather
 * than be matched as data.
 */
export function containsQuerySyntax(value: string): boolean {
    return [...value].some(ch => QUERY_SYNTAX.has(ch));
}

export function isDateField(field: string): boolean {
    return DATE_FIELDS.has(field);
}

export function isPriorityField(field: string): boolean {
    return PRIORITY_FIELDS.has(field);
}

/**
 * Percent-encodes a compiled query for transport, leaving operator
 * punctuation intact.
 */
export function encodeQuery(query: string): string {
    let encoded = '';
    for (const ch of query) {
        const code = ch.charCodeAt(0);
        const alphanumeric = (code >= 48 && code <= 57) || (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
        encoded += alphanumeric || PROTECTED_CHARACTERS.has(ch) ? ch : encodeURIComponent(ch);
    }
    return encoded;
}

/**
 * Maps a single priority token (`1`, `P2`, `high`) to its canonical level.
 * Unknown tokens are returned trimmed and unchanged.
 */
export function normalizePriority(value: string): string {
    const token = value.trim().toLowerCase();
    const digit = token.charAt(1);
    if (token.length === 2 && token.startsWith('p') && digit >= '0' && digit <= '9') {
        return digit;
    }
    return PRIORITY_NAMES[token] ?? value.trim();
}

function splitList(value: string): string[] {
    const cleaned = [...value].filter(ch => ch !== '[' && ch !== ']' && ch !== '"' && ch !== '\'').join('');
    return cleaned
        .split(',')
        .flatMap(part => part.trim().split(' '))
        .map(part => part.trim())
        .filter(part => part.length > 0 && part.toLowerCase() !== 'and' && part.toLowerCase() !== 'or');
}

function dedupe(values: readonly string[]): string[] {
    return [...new Set(values)];
}

export interface FilterCompilerOptions {
    dateParser?: DateParser;
}

/**
 * Turns FilterSpecs into the vendor's encoded-query dialect. Every builder is
 * idempotent: feeding it its own output returns that output unchanged.
 */
export class FilterCompiler {
    private readonly dateParser: DateParser;

    constructor(options: FilterCompilerOptions = {}) {
        this.dateParser = options.dateParser ?? new DateParser();
    }

    public compile(filters: FilterSpec): string {
        const clauses: string[] = [];
        for (const [field, value] of Object.entries(filters)) {
            const clause = this.compileClause(field, value);
            if (clause) {
                clauses.push(clause);
            }
        }
        return clauses.join('^');
    }

    public compileClause(field: string, value: FilterValue): string {
        if (isExclusion(value)) {
            return this.buildExclusionChain(value.exclude, field);
        }
        if (isDateRange(value)) {
            return this.buildDateRange(value, field);
        }
        if (isStringList(value)) {
            return isPriorityField(field) ? this.buildPriorityChain(value, field) : this.buildOrChain(value, field);
        }
        return this.compileScalar(field, value);
    }

    /**
     * `field=v1^ORfield=v2…`. Accepts a list or a raw string such as
     * `"1,2"`, `"P1,P2"` or `'["1","2"]'`.
     */
    public buildPriorityChain(priorities: string | readonly string[], field: string = 'priority'): string {
        if (typeof priorities === 'string') {
            const trimmed = priorities.trim();
            if (this.isCompiledFor(field, trimmed)) {
                return trimmed;
            }
            return this.buildOrChain(splitList(trimmed).map(normalizePriority), field);
        }
        return this.buildOrChain(priorities.map(normalizePriority), field);
    }

    public buildOrChain(values: readonly string[], field: string): string {
        return dedupe(values.map(v => v.trim()).filter(v => v.length > 0))
            .map(value => {
                if (value.includes('^')) {
                    throw new ValidationError(`List value contains a query separator: ${value}`, field, value);
                }
                return `${field}=${value}`;
            })
            .join('^OR');
    }

    /**
     * `fieldBETWEEN<lower>@<upper>`. Plain dates get day-boundary times,
     * date function calls pass through untouched. A range with only one
     * bound becomes a single comparison.
     */
    public buildDateRange(range: DateRange | string, field: string = 'sys_created_on'): string {
        if (typeof range === 'string') {
            const trimmed = range.trim();
            if (this.isCompiledFor(field, trimmed)) {
                return trimmed;
            }
            const parsed = this.dateParser.parse(trimmed);
            if (!parsed || parsed.kind === 'invalid') {
                throw new ValidationError(`Unrecognized date range: ${trimmed}`, field, trimmed);
            }
            return this.buildDateRange(parsed.range, field);
        }

        const start = range.start.trim();
        const end = range.end.trim();
        if (!start && !end) {
            throw new ValidationError('Date range needs at least one bound', field, range);
        }
        if (!end) {
            return `${field}>=${this.dateBound(start, 'start', field)}`;
        }
        if (!start) {
            return `${field}<=${this.dateBound(end, 'end', field)}`;
        }
        return `${field}BETWEEN${this.dateBound(start, 'start', field)}@${this.dateBound(end, 'end', field)}`;
    }

    public buildExclusionChain(values: readonly string[], field: string = 'caller_id'): string {
        const prefix = `${field}!=`;
        return dedupe(values.map(v => v.trim()).filter(v => v.length > 0))
            .map(value => {
                const id = value.startsWith(prefix) ? value.slice(prefix.length) : value;
                if (!id || containsQuerySyntax(id)) {
                    throw new ValidationError(`Exclusion value must be a plain identifier: ${value}`, field, value);
                }
                return `${prefix}${id}`;
            })
            .join('^');
    }

    private compileScalar(field: string, rawValue: string): string {
        const value = rawValue.trim();
        if (!value) {
            return '';
        }
        if (field === COMPLETE_QUERY_KEY || this.isCompiledFor(field, value)) {
            return value;
        }

        const unary = UNARY_OPERATORS[value.toUpperCase()];
        if (unary) {
            return `${field}${unary}`;
        }

        for (const [suffix, operator] of FIELD_SUFFIX_OPERATORS) {
            if (field.endsWith(suffix) && field.length > suffix.length) {
                return `${field.slice(0, -suffix.length)}${operator}${value}`;
            }
        }

        if (VALUE_OPERATORS.some(op => value.startsWith(op))) {
            return `${field}${value}`;
        }
        if (WORD_OPERATORS.some(op => value.startsWith(op))) {
            return `${field}${value}`;
        }

        if (isPriorityField(field) && (value.includes(',') || normalizePriority(value) !== value)) {
            return this.buildPriorityChain(value, field);
        }

        if (isDateField(field)) {
            if (isIsoDate(value)) {
                return this.buildDateRange({ start: value, end: value }, field);
            }
            const parsed = this.dateParser.parse(value);
            if (parsed && parsed.kind === 'range') {
                return this.buildDateRange(parsed.range, field);
            }
        }

        return `${field}=${value}`;
    }

    /**
     * True when the value is already a compiled clause for this field, or a
     * compound clause (OR-chain, BETWEEN) that must not be rewritten.
     */
    private isCompiledFor(field: string, value: string): boolean {
        if (value.includes('^OR') || value.includes('BETWEEN') || value.includes('ONLast')) {
            return true;
        }
        if (!value.startsWith(field)) {
            return false;
        }
        const rest = value.slice(field.length);
        return rest.startsWith('=') || rest.startsWith('!=') || rest.startsWith('>') || rest.startsWith('<')
            || WORD_OPERATORS.some(op => rest.startsWith(op)) || rest.startsWith('IS');
    }

    private dateBound(bound: string, side: 'start' | 'end', field: string): string {
        if (bound.startsWith('javascript:')) {
            return bound;
        }
        if (isIsoDate(bound)) {
            return `javascript:gs.dateGenerate('${bound}','${side === 'start' ? '00:00:00' : '23:59:59'}')`;
        }
        if (isIsoDateTime(bound)) {
            return `javascript:gs.dateGenerate('${bound.slice(0, 10)}','${bound.slice(11)}')`;
        }
        throw new ValidationError(`Invalid date bound: ${bound}`, field, bound);
    }
}
