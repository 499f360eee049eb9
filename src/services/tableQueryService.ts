import { SystemConfig } from '../models/config';
import { DateRange, FilterSpec, FilterValue, createFilterSpec } from '../models/filter';
import { IntelligenceResult } from '../models/intelligence';
import { RecordSource, ResultSet, TableRecord, fieldText } from '../models/record';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { FilterCompiler } from './filterCompiler';
import { FilterExplanation, QueryExplainer } from './filterExplainer';
import { FilterValidator, QueryAnalysis, ValidationReport } from './filterValidator';
import { InputGuard } from './inputGuard';
import { AnalyzeOptions, QueryContext, QueryIntelligenceEngine } from './intelligence/queryIntelligence';
import { KeywordExtractor } from './keywordExtractor';
import { TableCatalog } from './tableCatalog';

export const NO_RECORDS_FOUND = 'No records found.';

export type QueryStatus = 'success' | 'no_records' | 'partial' | 'rejected';

export interface QueryResponse {
    status: QueryStatus;
    message: string;
    table: string;
    query: string;
    records: TableRecord[];
    count: number;
    complete: boolean;
    truncated: boolean;
    warnings: string[];
    suggestions: string[];
}

export interface TextSearchResponse extends QueryResponse {
    /** The keyword or record identifier that produced the records. */
    keyword?: string;
}

export interface IntelligentSearchResponse extends QueryResponse {
    intelligence: IntelligenceResult;
    fallbackUsed: boolean;
}

export interface SmartFilter {
    intelligence: IntelligenceResult;
    validation: ValidationReport;
    analysis: QueryAnalysis;
}

export interface FilterTemplateInfo {
    name: string;
    description: string;
    filters: FilterSpec;
    compiledQuery: string;
}

export interface QueryExample {
    template: string;
    description: string;
    /** A phrasing that selects the template. */
    query: string;
}

export interface QueryExamples {
    examples: QueryExample[];
    tips: string[];
    tables: string[];
}

const QUERY_TIPS = [
    'Name a time period such as "last week", "yesterday" or "this month"',
    'Include priority levels such as P1, P2, critical or low',
    'Mention a state such as active, resolved or pending',
    'Use "unassigned" to find records without an assignee',
    'Exclude callers with "excluding caller <name>"'
];

export interface CallOptions {
    detailed?: boolean;
    signal?: AbortSignal;
}

export interface RecordQueryParams extends CallOptions {
    filters?: FilterSpec;
    priorities?: string | readonly string[];
    dateRange?: DateRange;
    excludeCallers?: string | readonly string[];
    maxRecords?: number;
}

export interface QueryServiceDependencies {
    source: RecordSource;
    engine?: QueryIntelligenceEngine;
    guard?: InputGuard;
    extractor?: KeywordExtractor;
    compiler?: FilterCompiler;
    validator?: FilterValidator;
    catalog?: TableCatalog;
}

function isTableName(table: string): boolean {
    const first = table.charAt(0);
    return first >= 'a' && first <= 'z'
        && [...table].every(ch => (ch >= 'a' && ch <= 'z') || (ch >= '0' && ch <= '9') || ch === '_');
}

/**
 * The inbound operations: text search, filtered queries, intelligent
 * search and the filter tooling around them.
 */
export class TableQueryService {
    private readonly source: RecordSource;
    private readonly engine: QueryIntelligenceEngine;
    private readonly guard: InputGuard;
    private readonly extractor: KeywordExtractor;
    private readonly compiler: FilterCompiler;
    private readonly validator: FilterValidator;
    private readonly explainer: QueryExplainer;
    private readonly catalog: TableCatalog;

    constructor(private readonly config: SystemConfig, dependencies: QueryServiceDependencies) {
        this.source = dependencies.source;
        this.guard = dependencies.guard ?? new InputGuard(config.safety);
        this.extractor = dependencies.extractor ?? new KeywordExtractor({ matcher: this.guard.matcher });
        this.compiler = dependencies.compiler ?? new FilterCompiler();
        this.validator = dependencies.validator ?? new FilterValidator();
        this.explainer = new QueryExplainer(this.compiler, this.validator);
        this.catalog = dependencies.catalog ?? new TableCatalog();
        this.engine = dependencies.engine ?? new QueryIntelligenceEngine(config, {
            guard: this.guard,
            compiler: this.compiler,
            validator: this.validator,
            extractor: this.extractor
        });
    }

    /**
     * Tries each candidate filter in keyword priority order and returns the
     * first one that finds anything.
     */
    public async searchByText(table: string, text: string, options: CallOptions = {}): Promise<TextSearchResponse> {
        this.assertTable(table);
        const verdict = this.guard.check(text);
        if (!verdict.ok) {
            return this.rejectedResponse(table, verdict.message);
        }

        const fields = this.catalog.fields(table, options.detailed);
        let lastQuery = '';
        for (const candidate of this.extractor.candidateFilters(text)) {
            lastQuery = candidate.query;
            const resultSet = await this.source.fetchAll({
                table,
                query: candidate.query,
                fields,
                mode: this.config.pagination.fetchMode,
                signal: options.signal
            });
            if (resultSet.records.length > 0) {
                return { ...this.toResponse(resultSet), keyword: candidate.keyword };
            }
        }

        logger.debug('Text search found nothing', { operation: 'tableQueryService.searchByText', table });
        return this.emptyResponse(table, lastQuery);
    }

    public async queryRecords(table: string, params: RecordQueryParams = {}): Promise<QueryResponse> {
        this.assertTable(table);
        const filters = this.buildFilterSpec(params);
        const report = this.validator.validate(filters);
        const query = this.compiler.compile(filters);

        const resultSet = await this.source.fetchAll({
            table,
            query,
            fields: this.catalog.fields(table, params.detailed),
            maxRecords: params.maxRecords,
            mode: this.config.pagination.fetchMode,
            signal: params.signal
        });

        const count = resultSet.records.length;
        const countReport = this.validator.validateResultCount(table, filters, count);
        const response = this.toResponse(resultSet);
        response.warnings.push(...report.warnings, ...countReport.warnings);
        response.suggestions.push(
            ...report.suggestions,
            ...countReport.suggestions,
            ...this.validator.suggestImprovements(filters, count)
        );
        return response;
    }

    public async queryByPriority(
        table: string,
        priorities: string | readonly string[],
        additionalFilters: FilterSpec = {},
        options: CallOptions = {}
    ): Promise<QueryResponse> {
        return this.queryRecords(table, { ...options, filters: additionalFilters, priorities });
    }

    /**
     * Runs the intelligence engine and executes what it compiled. Falls back
     * to a text search when nothing compiled or confidence is too low.
     */
    public async intelligentSearch(
        table: string,
        query: string,
        context: QueryContext = {},
        options: AnalyzeOptions & CallOptions = {}
    ): Promise<IntelligentSearchResponse> {
        this.assertTable(table);
        const intelligence = (await this.engine.analyze(query, table, context, options)).toJSON();

        if (intelligence.rejection) {
            return { ...this.rejectedResponse(table, intelligence.rejection.message), intelligence, fallbackUsed: false };
        }

        if (!intelligence.compiledQuery || intelligence.confidenceScore < this.config.intelligence.fallbackConfidence) {
            logger.info('Low confidence query; falling back to text search', {
                operation: 'tableQueryService.intelligentSearch',
                table,
                confidence: intelligence.confidenceScore
            });
            const fallback = await this.searchByText(table, query, options);
            return {
                ...fallback,
                suggestions: [...fallback.suggestions, ...intelligence.suggestions],
                intelligence,
                fallbackUsed: true
            };
        }

        const resultSet = await this.source.fetchAll({
            table,
            query: intelligence.compiledQuery,
            fields: this.catalog.fields(table, options.detailed),
            mode: this.config.pagination.fetchMode,
            signal: options.signal
        });
        const response = this.toResponse(resultSet);
        response.suggestions.push(...intelligence.suggestions);
        return { ...response, intelligence, fallbackUsed: false };
    }

    /**
     * The engine's filter plus validation, without executing it.
     */
    public async buildSmartFilter(table: string, query: string, context: QueryContext = {}): Promise<SmartFilter> {
        this.assertTable(table);
        const intelligence = (await this.engine.analyze(query, table, context)).toJSON();
        return {
            intelligence,
            validation: this.validator.validate(intelligence.filters),
            analysis: this.validator.analyzeQuery(intelligence.compiledQuery, intelligence.filters)
        };
    }

    public explainFilter(table: string, filters: FilterSpec): FilterExplanation {
        this.assertTable(table);
        return this.explainer.explain(filters, table);
    }

    public async getRecordDetails(table: string, number: string, options: CallOptions = {}): Promise<QueryResponse> {
        return this.lookupRecord(table, number, this.catalog.fields(table, true), options.signal);
    }

    public async getRecordDescription(table: string, number: string, options: CallOptions = {}): Promise<QueryResponse> {
        return this.lookupRecord(table, number, ['short_description'], options.signal);
    }

    /**
     * Text-searches with the record's own short description and drops the
     * record itself from the matches.
     */
    public async findSimilarRecords(table: string, number: string, options: CallOptions = {}): Promise<TextSearchResponse> {
        const original = await this.lookupRecord(table, number, ['number', 'short_description'], options.signal);
        const [record] = original.records;
        const description = record ? fieldText(record, 'short_description') : '';
        if (!record || !description) {
            return this.emptyResponse(table, original.query);
        }

        const similar = await this.searchByText(table, description, options);
        const recordNumber = fieldText(record, 'number').toUpperCase();
        const records = similar.records.filter(r => fieldText(r, 'number').toUpperCase() !== recordNumber);
        if (records.length === 0) {
            return this.emptyResponse(table, similar.query);
        }
        return { ...similar, records, count: records.length };
    }

    public getFilterTemplates(): FilterTemplateInfo[] {
        return this.engine.getTemplates().map(template => ({
            name: template.name,
            description: template.description,
            filters: template.filters,
            compiledQuery: this.compiler.compile(template.filters)
        }));
    }

    /**
     * One example phrasing per template, built from the first synonym of
     * each of its groups, plus general tips and the known tables.
     */
    public getQueryExamples(): QueryExamples {
        return {
            examples: this.engine.getTemplates().map(template => ({
                template: template.name,
                description: template.description,
                query: template.synonyms.map(group => group[0] ?? '').filter(phrase => phrase.length > 0).join(' ')
            })),
            tips: [...QUERY_TIPS],
            tables: this.catalog.tableNames()
        };
    }

    private async lookupRecord(
        table: string,
        number: string,
        fields: readonly string[],
        signal?: AbortSignal
    ): Promise<QueryResponse> {
        this.assertTable(table);
        const recordNumber = this.guard.assertSafe(number).trim().toUpperCase();
        if (!recordNumber || [...recordNumber].some(ch => ch === '^' || ch === '=')) {
            throw new ValidationError('Record number must be a plain identifier', 'number', number);
        }

        const resultSet = await this.source.fetchAll({
            table,
            query: `number=${recordNumber}`,
            fields,
            pageSize: 1,
            maxRecords: 1,
            mode: 'strict',
            signal
        });
        return this.toResponse(resultSet);
    }

    private buildFilterSpec(params: RecordQueryParams): FilterSpec {
        const extra: Record<string, FilterValue> = {};
        if (params.priorities !== undefined) {
            extra['priority'] = params.priorities;
        }
        if (params.dateRange) {
            extra['sys_created_on'] = params.dateRange;
        }
        if (params.excludeCallers !== undefined) {
            const callers = typeof params.excludeCallers === 'string'
                ? params.excludeCallers.split(',')
                : params.excludeCallers;
            extra['caller_id'] = { exclude: callers.map(c => c.trim()).filter(c => c.length > 0) };
        }

        return createFilterSpec(params.filters ?? {}, extra);
    }

    private assertTable(table: string): void {
        if (!isTableName(table)) {
            throw new ValidationError(`Invalid table name: ${table}`, 'table', table);
        }
    }

    private toResponse(resultSet: ResultSet): QueryResponse {
        const count = resultSet.records.length;
        if (count === 0 && !resultSet.error) {
            return this.emptyResponse(resultSet.table, resultSet.query);
        }

        const partial = resultSet.error !== undefined;
        return {
            status: partial ? 'partial' : 'success',
            message: partial
                ? `Returned ${count} records before page ${resultSet.error?.pageIndex} failed: ${resultSet.error?.message}`
                : `Found ${count} records`,
            table: resultSet.table,
            query: resultSet.query,
            records: resultSet.records,
            count,
            complete: resultSet.complete,
            truncated: resultSet.truncated,
            warnings: resultSet.truncated ? [`Result was truncated at ${count} records`] : [],
            suggestions: []
        };
    }

    private emptyResponse(table: string, query: string): QueryResponse {
        return {
            status: 'no_records',
            message: NO_RECORDS_FOUND,
            table,
            query,
            records: [],
            count: 0,
            complete: true,
            truncated: false,
            warnings: [],
            suggestions: []
        };
    }

    private rejectedResponse(table: string, message: string): QueryResponse {
        return {
            status: 'rejected',
            message,
            table,
            query: '',
            records: [],
            count: 0,
            complete: false,
            truncated: false,
            warnings: [],
            suggestions: []
        };
    }
}
