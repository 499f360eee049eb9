import { IntelligenceConfig, SafetyConfig } from '../../models/config';
import { DateRange, FilterSpec, FilterValue, createFilterSpec, isExclusion } from '../../models/filter';
import {
    ComponentSummary,
    IntelligenceResultModel,
    Rejection,
    UnparsedFragment
} from '../../models/intelligence';
import {
    OperationCancelledError,
    PatternTimeoutError,
    UnparseableComponentError
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { FilterCompiler, isDateField } from '../filterCompiler';
import { QueryExplainer, toDeclarative } from '../filterExplainer';
import { FilterValidator } from '../filterValidator';
import { InputGuard } from '../inputGuard';
import { KeywordExtractor } from '../keywordExtractor';
import {
    AssignmentComponent,
    ComponentParse,
    ComponentParser,
    CURRENT_USER,
    DateComponent,
    PriorityComponent,
    RESOLVED_STATES,
    StateComponent
} from './components';
import { DateParser } from './dateParser';
import { EntityResolver, StaticEntityResolver } from './entityResolver';
import { ExclusionComponent } from './exclusion';
import { FilterTemplate, TemplateRegistry } from './templates';

export interface QueryContext {
    dateRange?: DateRange;
    excludeCallers?: string | readonly string[];
    excludeResolved?: boolean;
    assignedToMe?: boolean;
}

export interface AnalyzeOptions {
    /** Throw on rejected input and on unparseable components instead of degrading. */
    strict?: boolean;
    signal?: AbortSignal;
}

export interface QueryIntelligenceDependencies {
    guard?: InputGuard;
    compiler?: FilterCompiler;
    validator?: FilterValidator;
    extractor?: KeywordExtractor;
    templates?: TemplateRegistry;
    resolver?: EntityResolver;
}

export const UNPARSED_PENALTY = 0.1;
export const KEYWORD_FALLBACK_CONFIDENCE = 0.25;

interface Decomposition {
    filters: Record<string, FilterValue>;
    confidence: number;
    components: ComponentSummary[];
    unparsed: UnparsedFragment[];
    template?: FilterTemplate;
    explanation: string[];
}

function throwIfAborted(signal: AbortSignal | undefined, step: string): void {
    if (signal?.aborted) {
        throw new OperationCancelledError(`queryIntelligence.${step}`);
    }
}

function hasDateFilter(filters: FilterSpec): boolean {
    return Object.keys(filters).some(isDateField);
}

/**
 * Turns a free-text query into a compiled filter with a confidence score,
 * an explanation and improvement suggestions.
 */
export class QueryIntelligenceEngine {
    private readonly guard: InputGuard;
    private readonly compiler: FilterCompiler;
    private readonly validator: FilterValidator;
    private readonly explainer: QueryExplainer;
    private readonly extractor: KeywordExtractor;
    private readonly templates: TemplateRegistry;
    private readonly parsers: ComponentParser[];
    private readonly dateComponent: DateComponent;
    private readonly exclusionComponent: ExclusionComponent;

    constructor(
        private readonly config: { safety: SafetyConfig; intelligence: IntelligenceConfig },
        dependencies: QueryIntelligenceDependencies = {}
    ) {
        this.guard = dependencies.guard ?? new InputGuard(config.safety);
        const matcher = this.guard.matcher;
        const dateParser = new DateParser({ matcher, maxLength: config.safety.maxInputLength });

        this.compiler = dependencies.compiler ?? new FilterCompiler({ dateParser });
        this.validator = dependencies.validator ?? new FilterValidator();
        this.explainer = new QueryExplainer(this.compiler, this.validator);
        this.extractor = dependencies.extractor ?? new KeywordExtractor({ matcher });
        this.templates = dependencies.templates ?? new TemplateRegistry();

        const resolver = dependencies.resolver ?? new StaticEntityResolver(config.intelligence.knownEntities);
        this.dateComponent = new DateComponent(dateParser);
        this.exclusionComponent = new ExclusionComponent(matcher, resolver);
        this.parsers = [
            this.dateComponent,
            new PriorityComponent(matcher),
            this.exclusionComponent,
            new StateComponent(),
            new AssignmentComponent()
        ];
    }

    public getTemplates(): readonly FilterTemplate[] {
        return this.templates.list();
    }

    public async analyze(
        query: string,
        table: string,
        context: QueryContext = {},
        options: AnalyzeOptions = {}
    ): Promise<IntelligenceResultModel> {
        const startTime = Date.now();
        const verdict = this.guard.check(query);
        if (!verdict.ok) {
            if (options.strict) {
                this.guard.assertSafe(query);
            }
            return this.rejected(query, table, { reason: verdict.reason, message: verdict.message });
        }

        let decomposition: Decomposition;
        try {
            decomposition = await this.decompose(query, options);
        } catch (error) {
            if (error instanceof PatternTimeoutError && !options.strict) {
                return this.rejected(query, table, { reason: 'TIMEOUT_EXCEEDED', message: error.message });
            }
            throw error;
        }

        throwIfAborted(options.signal, 'context');
        const contextFilters = this.contextFilters(context, decomposition.filters);
        if (Object.keys(contextFilters).length > 0) {
            decomposition.components.push({
                component: 'context',
                description: `Context filters: ${Object.keys(contextFilters).join(', ')}`,
                weight: 0
            });
        }

        const filters = createFilterSpec(decomposition.filters, contextFilters);
        const compiledQuery = this.compiler.compile(filters);
        const description = this.explainer.describe(filters, table);

        const result = new IntelligenceResultModel({
            query,
            table,
            compiledQuery,
            confidenceScore: decomposition.confidence,
            explanation: [...decomposition.explanation, description].join(' | '),
            declarativeEquivalent: toDeclarative(compiledQuery, table),
            suggestions: this.suggestions(filters, decomposition),
            templateUsed: decomposition.template?.name,
            filters,
            components: decomposition.components,
            unparsed: decomposition.unparsed
        });

        logger.collectDiagnosticInfo('queryIntelligence.analyze', Date.now() - startTime, true, {
            table,
            confidence: result.confidenceScore,
            templateUsed: result.templateUsed,
            unparsedCount: result.unparsed.length
        });
        return result;
    }

    private async decompose(query: string, options: AnalyzeOptions): Promise<Decomposition> {
        throwIfAborted(options.signal, 'template');
        const match = this.templates.match(query, this.config.intelligence.templateThreshold);

        const decomposition: Decomposition = {
            filters: {},
            confidence: 0,
            components: [],
            unparsed: [],
            explanation: []
        };

        let parsers: ComponentParser[] = this.parsers;
        if (match) {
            decomposition.template = match.template;
            decomposition.filters = { ...match.template.filters };
            decomposition.confidence = match.score;
            decomposition.components.push({
                component: 'template',
                description: match.template.description,
                weight: match.score
            });
            decomposition.explanation.push(`Used predefined template: ${match.template.name}`);
            // Templates fix priority and state; exclusions and a missing date still come from the text.
            parsers = hasDateFilter(match.template.filters)
                ? [this.exclusionComponent]
                : [this.dateComponent, this.exclusionComponent];
        }

        for (const parser of parsers) {
            throwIfAborted(options.signal, parser.component);
            const parsed = await parser.parse(query, options.signal);
            if (parsed) {
                this.absorb(decomposition, parser, parsed, match !== null, options);
            }
        }

        if (Object.keys(decomposition.filters).length === 0) {
            this.keywordFallback(query, decomposition);
        }

        decomposition.confidence = Math.max(0, Math.min(1, decomposition.confidence));
        return decomposition;
    }

    private absorb(
        decomposition: Decomposition,
        parser: ComponentParser,
        parsed: ComponentParse,
        fromTemplate: boolean,
        options: AnalyzeOptions
    ): void {
        for (const fragment of parsed.unparsed) {
            if (options.strict) {
                throw new UnparseableComponentError(fragment.component, fragment.fragment, fragment.detail);
            }
            logger.debug('Skipping unparseable query component', {
                operation: 'queryIntelligence.decompose',
                component: fragment.component,
                detail: fragment.detail
            });
            decomposition.unparsed.push(fragment);
            decomposition.confidence -= UNPARSED_PENALTY;
        }

        if (Object.keys(parsed.filters).length === 0) {
            return;
        }

        Object.assign(decomposition.filters, parsed.filters);
        // A template already accounts for the confidence of the text it matched.
        const weight = fromTemplate ? 0 : parser.weight;
        decomposition.confidence += weight;
        decomposition.components.push({ component: parsed.component, description: parsed.description, weight });
        if (parsed.description) {
            decomposition.explanation.push(parsed.description);
        }
    }

    private keywordFallback(query: string, decomposition: Decomposition): void {
        const recordId = this.extractor.findRecordId(query);
        const keyword = recordId ? null : this.extractor.keywordList(query)[0];

        if (recordId) {
            decomposition.filters['number'] = recordId;
        } else if (keyword) {
            decomposition.filters['short_description'] = `LIKE${keyword}`;
        } else {
            decomposition.confidence = 0;
            return;
        }

        decomposition.confidence = KEYWORD_FALLBACK_CONFIDENCE - UNPARSED_PENALTY * decomposition.unparsed.length;
        decomposition.components.push({
            component: 'keyword',
            description: recordId ? `Record ${recordId}` : `Text search for "${keyword}"`,
            weight: KEYWORD_FALLBACK_CONFIDENCE
        });
        decomposition.explanation.push('No structured filters recognized; falling back to a keyword search');
    }

    private contextFilters(context: QueryContext, parsed: Readonly<Record<string, FilterValue>>): Record<string, FilterValue> {
        const filters: Record<string, FilterValue> = {};

        if (context.dateRange) {
            filters['sys_created_on'] = context.dateRange;
        }

        if (context.excludeCallers !== undefined) {
            const callers = typeof context.excludeCallers === 'string' ? [context.excludeCallers] : [...context.excludeCallers];
            const existing = parsed['caller_id'];
            const already = existing !== undefined && isExclusion(existing) ? existing.exclude : [];
            const merged = [...new Set([...already, ...callers.map(c => c.trim()).filter(c => c.length > 0)])];
            if (merged.length > 0) {
                filters['caller_id'] = { exclude: merged };
            }
        }

        if (context.excludeResolved) {
            filters['state'] = { exclude: RESOLVED_STATES };
        }

        if (context.assignedToMe) {
            filters['assigned_to'] = CURRENT_USER;
        }

        return filters;
    }

    private suggestions(filters: FilterSpec, decomposition: Decomposition): string[] {
        const suggestions: string[] = [];

        if (!('state' in filters)) {
            suggestions.push('Add a state such as "active" to leave out resolved and closed records');
        }
        if (!hasDateFilter(filters)) {
            suggestions.push('Add a time period such as "last week" or "last 30 days" to narrow the results');
        }

        suggestions.push(...this.validator.validate(filters).warnings);

        for (const fragment of decomposition.unparsed) {
            suggestions.push(`Could not interpret ${fragment.component} "${fragment.fragment}": ${fragment.detail}`);
        }

        return suggestions;
    }

    private rejected(query: string, table: string, rejection: Rejection): IntelligenceResultModel {
        return new IntelligenceResultModel({
            query: typeof query === 'string' ? query : '',
            table,
            compiledQuery: '',
            confidenceScore: 0,
            explanation: rejection.message,
            declarativeEquivalent: '',
            suggestions: ['Shorten the query and remove unusual punctuation'],
            filters: {},
            components: [],
            unparsed: [],
            rejection
        });
    }
}
