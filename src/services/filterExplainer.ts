import { COMPLETE_QUERY_KEY, FilterSpec, FilterValue, isDateRange, isExclusion, isStringList } from '../models/filter';
import { FilterCompiler, isDateField, isPriorityField } from './filterCompiler';
import { FilterValidator } from './filterValidator';

export interface FilterExplanation {
    explanation: string;
    declarativeEquivalent: string;
    potentialIssues: string[];
    suggestions: string[];
    estimatedResultSize: string;
}

// Longest first, so ISNOTEMPTY is tried before ISEMPTY and >= before >.
const CLAUSE_OPERATORS = [
    'ISNOTEMPTY', 'ISEMPTY', 'BETWEEN', 'NOTLIKE', 'STARTSWITH', 'ENDSWITH', 'LIKE',
    '>=', '<=', '!=', '=', '>', '<'
];

const RELATIVE_DESCRIPTIONS: Readonly<Record<string, string>> = {
    'javascript:gs.beginningOfToday()': 'today',
    'javascript:gs.beginningOfYesterday()': 'yesterday',
    'javascript:gs.beginningOfThisWeek()': 'this week',
    'javascript:gs.beginningOfLastWeek()': 'last week',
    'javascript:gs.beginningOfThisMonth()': 'this month',
    'javascript:gs.beginningOfLastMonth()': 'last month'
};

function quote(value: string): string {
    return `'${value.split('\'').join('\'\'')}'`;
}

function isFieldCharacter(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= '0' && ch <= '9') || ch === '_' || ch === '.';
}

function daysAgo(value: string): number | null {
    const marker = 'daysAgoStart(';
    const at = value.indexOf(marker);
    if (at < 0) {
        return null;
    }
    const close = value.indexOf(')', at);
    const days = Number(value.slice(at + marker.length, close));
    return Number.isInteger(days) ? days : null;
}

/**
 * Renders one compiled condition (`field<op>value`) as a SQL-like predicate.
 */
export function conditionToDeclarative(condition: string): string {
    let end = 0;
    while (end < condition.length && isFieldCharacter(condition.charAt(end))) {
        end++;
    }
    const field = condition.slice(0, end);
    const rest = condition.slice(end);
    const operator = CLAUSE_OPERATORS.find(op => rest.startsWith(op));
    if (!field || !operator) {
        return `(${condition})`;
    }

    const value = rest.slice(operator.length);
    switch (operator) {
        case 'ISEMPTY':
            return `${field} IS NULL`;
        case 'ISNOTEMPTY':
            return `${field} IS NOT NULL`;
        case 'BETWEEN': {
            const [lower = '', upper = ''] = value.split('@');
            return `${field} BETWEEN ${quote(lower)} AND ${quote(upper)}`;
        }
        case 'LIKE':
            return `${field} LIKE ${quote(`%${value}%`)}`;
        case 'NOTLIKE':
            return `${field} NOT LIKE ${quote(`%${value}%`)}`;
        case 'STARTSWITH':
            return `${field} LIKE ${quote(`${value}%`)}`;
        case 'ENDSWITH':
            return `${field} LIKE ${quote(`%${value}`)}`;
        default:
            return `${field} ${operator} ${quote(value)}`;
    }
}

/**
 * Renders a compiled query as a non-executed SQL-like statement. `^OR`
 * clauses group with the clause before them.
 */
export function toDeclarative(query: string, table: string): string {
    if (!query) {
        return `SELECT * FROM ${table}`;
    }

    const groups: string[][] = [];
    for (const part of query.split('^')) {
        const current = groups[groups.length - 1];
        if (part.startsWith('OR') && current) {
            current.push(part.slice(2));
        } else {
            groups.push([part]);
        }
    }

    const where = groups
        .map(group => {
            const predicates = group.map(conditionToDeclarative);
            return predicates.length > 1 ? `(${predicates.join(' OR ')})` : predicates.join('');
        })
        .join(' AND ');
    return `SELECT * FROM ${table} WHERE ${where}`;
}

export class QueryExplainer {
    constructor(
        private readonly compiler: FilterCompiler = new FilterCompiler(),
        private readonly validator: FilterValidator = new FilterValidator()
    ) { }

    public explain(filters: FilterSpec, table: string): FilterExplanation {
        const report = this.validator.validate(filters);
        return {
            explanation: this.describe(filters, table),
            declarativeEquivalent: toDeclarative(this.compiler.compile(filters), table),
            potentialIssues: report.warnings,
            suggestions: report.suggestions,
            estimatedResultSize: this.estimateResultSize(filters)
        };
    }

    public describe(filters: FilterSpec, table: string): string {
        const entries = Object.entries(filters);
        if (entries.length === 0) {
            return `No filters applied - will return all ${table} records`;
        }
        const parts = entries.map(([field, value]) => this.describeField(field, value));
        return `Will find ${table} records where: ${parts.join(' AND ')}`;
    }

    /**
     * Rough size bucket from how selective the priority and date filters
     * are.
     */
    public estimateResultSize(filters: FilterSpec): string {
        if (Object.keys(filters).length === 0) {
            return 'Large (all records)';
        }

        let factor = 0;
        const priority = filters['priority'];
        if (priority !== undefined) {
            const compiled = this.compiler.compileClause('priority', priority);
            if (compiled.includes('priority=1')) {
                factor += 1;
            }
            if (compiled.includes('^OR')) {
                factor -= 0.5;
            }
        }

        const created = filters['sys_created_on'];
        if (created !== undefined) {
            const compiled = this.compiler.compileClause('sys_created_on', created);
            const days = daysAgo(compiled);
            if (compiled.includes('beginningOfToday') || days === 1) {
                factor += 2;
            } else if (compiled.includes('ThisWeek') || compiled.includes('LastWeek') || (days !== null && days <= 7)) {
                factor += 1;
            }
        }

        if (factor >= 2) {
            return 'Small (< 50 records)';
        }
        if (factor >= 1) {
            return 'Medium (50-200 records)';
        }
        return 'Large (> 200 records)';
    }

    private describeField(field: string, value: FilterValue): string {
        if (field === COMPLETE_QUERY_KEY) {
            return `Custom query: ${this.compiler.compileClause(field, value)}`;
        }
        if (isPriorityField(field)) {
            return this.describePriority(field, value);
        }
        if (isDateField(field)) {
            return this.describeDate(field, value);
        }
        if (isExclusion(value)) {
            if (field === 'state') {
                return `State is not ${value.exclude.join(', ')} (excludes resolved/closed records)`;
            }
            return `${field} is not ${value.exclude.join(', ')}`;
        }
        if (isStringList(value)) {
            return `${field} is one of ${value.join(', ')}`;
        }
        if (isDateRange(value)) {
            return `${field} between ${value.start} and ${value.end}`;
        }
        if (field === 'assigned_to') {
            const upper = value.toUpperCase();
            if (upper === 'ISEMPTY' || upper === 'NULL') {
                return 'Unassigned records';
            }
            if (value.includes('gs.getUserID()')) {
                return 'Assigned to the current user';
            }
        }
        return `${field}: ${value}`;
    }

    private describePriority(field: string, value: FilterValue): string {
        const compiled = this.compiler.compileClause(field, value);
        const levels = compiled.split('^OR').map(clause => clause.slice(clause.indexOf('=') + 1));
        const label = field === 'priority' ? 'Priority' : field;
        return levels.length > 1 ? `${label} levels: ${levels.join(', ')}` : `${label}: ${levels.join('')}`;
    }

    private describeDate(field: string, value: FilterValue): string {
        const label = field === 'sys_created_on' ? 'Created' : field;
        if (isDateRange(value)) {
            const relative = RELATIVE_DESCRIPTIONS[value.start];
            if (relative) {
                return `${label} ${relative}`;
            }
            const days = daysAgo(value.start);
            if (days !== null) {
                return `${label} in the last ${days} days`;
            }
            return value.end ? `${label} between ${value.start} and ${value.end}` : `${label} on or after ${value.start}`;
        }
        if (typeof value === 'string') {
            const days = daysAgo(value);
            if (days !== null) {
                return `${label} in the last ${days} days`;
            }
            return `${label}: ${value}`;
        }
        return `${field}: ${this.compiler.compileClause(field, value)}`;
    }
}
