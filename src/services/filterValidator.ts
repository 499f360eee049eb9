import { COMPLETE_QUERY_KEY, FilterSpec, FilterValue, isDateRange, isExclusion, isStringList } from '../models/filter';
import { PRIORITY_NAMES, isDateField, isPriorityField } from './filterCompiler';

export interface ValidationReport {
    /** Warnings never block compilation; `isValid` is false only for an empty filter. */
    isValid: boolean;
    warnings: string[];
    suggestions: string[];
}

export interface QueryAnalysis {
    queryLength: number;
    conditionCount: number;
    components: string[];
    potentialIssues: string[];
    recommendations: string[];
    originalFilterCount?: number;
    originalFields?: string[];
}

const MAX_RECOMMENDED_CONDITIONS = 5;
const LARGE_RESULT_COUNT = 1000;
const MIN_HIGH_PRIORITY_INCIDENTS = 2;

function hasDigit(value: string): boolean {
    return [...value].some(ch => ch >= '0' && ch <= '9');
}

function scalarText(value: FilterValue): string | null {
    return typeof value === 'string' ? value : null;
}

/**
 * Flags filter shapes that compile but probably do not mean what the caller
 * intended. Nothing here throws.
 */
export class FilterValidator {
    public validate(filters: FilterSpec): ValidationReport {
        const report: ValidationReport = { isValid: Object.keys(filters).length > 0, warnings: [], suggestions: [] };

        for (const [field, value] of Object.entries(filters)) {
            if (isPriorityField(field)) {
                this.checkPriority(field, value, report);
            }
            if (isDateField(field)) {
                this.checkDate(field, value, report);
            }
            this.checkSqlKeywords(field, value, report);
        }

        return report;
    }

    /**
     * Breaks a compiled query into recognizable components and lists
     * construction problems.
     */
    public analyzeQuery(query: string, originalFilters?: FilterSpec): QueryAnalysis {
        const analysis: QueryAnalysis = {
            queryLength: query.length,
            conditionCount: query ? query.split('^').length : 0,
            components: [],
            potentialIssues: [],
            recommendations: []
        };

        if (query.includes('sys_created_on')) {
            analysis.components.push('Date filtering');
            if (query.includes('BETWEEN')) {
                analysis.components.push('BETWEEN range');
            } else if (query.includes('>=') || query.includes('<=')) {
                analysis.potentialIssues.push('Date filter uses a single comparison instead of a range');
                analysis.recommendations.push('Use a BETWEEN range with both bounds');
            }
        }

        if (query.includes('priority=')) {
            analysis.components.push('Priority filtering');
            if (query.includes('^ORpriority=')) {
                analysis.components.push('OR logic');
            }
        }

        if (query.includes('caller_id!=')) {
            analysis.components.push('Caller exclusion');
            analysis.components.push(`${query.split('caller_id!=').length - 1} caller(s) excluded`);
        }

        if (query.includes('javascript:gs.')) {
            analysis.components.push('Date functions');
            if (query.includes('BETWEEN') && !query.includes('@')) {
                analysis.potentialIssues.push('Missing date range separator (@)');
            }
        }

        if (query.includes(' ')) {
            analysis.potentialIssues.push('Unencoded spaces in query');
            analysis.recommendations.push('Encode the query before sending it');
        }

        if (analysis.conditionCount > MAX_RECOMMENDED_CONDITIONS) {
            analysis.recommendations.push(
                `Query has ${analysis.conditionCount} conditions; consider a template or fewer filters`
            );
        }

        if (originalFilters) {
            const fields = Object.keys(originalFilters);
            analysis.originalFilterCount = fields.length;
            analysis.originalFields = fields;
            if (COMPLETE_QUERY_KEY in originalFilters) {
                analysis.components.push('Pre-compiled clause');
            }
            for (const [field, value] of Object.entries(originalFilters)) {
                const text = scalarText(value);
                if (text && text.includes(',') && !text.includes('^OR')) {
                    analysis.potentialIssues.push(`Field '${field}' may use comma syntax instead of OR`);
                }
            }
        }

        return analysis;
    }

    public validateResultCount(table: string, filters: FilterSpec, resultCount: number): ValidationReport {
        const report: ValidationReport = { isValid: true, warnings: [], suggestions: [] };
        if (table !== 'incident' || !('priority' in filters)) {
            return report;
        }

        const priority = filters['priority'];
        const levels = priority === undefined ? '' : isStringList(priority) ? priority.join(',') : scalarText(priority) ?? '';
        const highPriority = levels.includes('1') || levels.includes('2');
        if (highPriority && resultCount < MIN_HIGH_PRIORITY_INCIDENTS) {
            report.warnings.push(`Low P1/P2 incident count (${resultCount}) - verify completeness`);
            report.suggestions.push('Cross-check with individual record lookups or a broader query');
        }
        return report;
    }

    public suggestImprovements(filters: FilterSpec, resultCount: number): string[] {
        const suggestions: string[] = [];

        if (resultCount === 0) {
            suggestions.push('Try a broader date range or check the filter syntax');
            suggestions.push('Verify field names match the table schema');
            suggestions.push('Check that dates use YYYY-MM-DD');
            suggestions.push('Verify caller exclusions are not too restrictive');
        }

        if ('priority' in filters && resultCount < 3) {
            suggestions.push("Use OR syntax for several levels: 'priority=1^ORpriority=2'");
            suggestions.push("Check that priority values are numeric (1, 2) rather than labels ('1 - Critical')");
        }

        if (resultCount > LARGE_RESULT_COUNT) {
            suggestions.push('Add more specific filters to reduce the result set');
            suggestions.push('Add a date range or caller exclusions to narrow results');
        }

        return suggestions;
    }

    private checkPriority(field: string, value: FilterValue, report: ValidationReport): void {
        const text = scalarText(value);
        if (text === null) {
            return;
        }

        const hasOr = text.includes('^OR');
        if (text.includes(',') && !hasOr && hasDigit(text)) {
            report.warnings.push(`Priority filter '${text}' uses comma syntax instead of OR`);
            report.suggestions.push(`For several levels use '${field}=1^OR${field}=2' instead of a comma list`);
        }
        if (hasOr && !text.startsWith(`${field}=`)) {
            report.warnings.push(`OR syntax detected but missing '${field}=' prefix: ${text}`);
            report.suggestions.push(`Start each OR clause with the field name: '${field}=1^OR${field}=2'`);
        }

        const lower = text.toLowerCase();
        const usesNames = Object.keys(PRIORITY_NAMES).some(name => lower.includes(name));
        if (usesNames && !hasDigit(text)) {
            report.suggestions.push('Use numeric priority levels (1, 2, 3) rather than names');
        }
    }

    private checkDate(field: string, value: FilterValue, report: ValidationReport): void {
        if (isDateRange(value)) {
            if (!value.end.trim()) {
                report.warnings.push(`Date range on '${field}' has no end bound - may return more results than expected`);
                report.suggestions.push('Add an end date for a complete range');
            }
            return;
        }

        const text = scalarText(value);
        if (text === null) {
            return;
        }

        const hasBetween = text.includes('BETWEEN');
        if (!hasBetween && text.includes('>=') && !text.includes('<=')) {
            report.warnings.push(`Date filter on '${field}' has no end bound - may return more results than expected`);
            report.suggestions.push('Add an end date for a complete range');
        }
        if (hasBetween && !text.includes('@')) {
            report.warnings.push("BETWEEN range is missing the '@' separator between its bounds");
            report.suggestions.push("Separate the bounds with '@': 'BETWEEN<start>@<end>'");
        }
        if (hasBetween && !text.includes('javascript:')) {
            report.warnings.push('BETWEEN range does not use date functions');
            report.suggestions.push("Use date functions such as javascript:gs.dateGenerate('2025-01-01','00:00:00')");
        }
    }

    private checkSqlKeywords(field: string, value: FilterValue, report: ValidationReport): void {
        const texts = isStringList(value) ? [...value] : isExclusion(value) ? [...value.exclude] : [scalarText(value) ?? ''];
        if (texts.some(text => text.includes(' OR ') || text.includes(' AND '))) {
            report.warnings.push(`Field '${field}' uses SQL-style OR/AND; use '^OR' and '^' instead`);
        }
    }
}
