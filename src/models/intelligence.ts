import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import { RejectionReason, ValidationError } from '../utils/errors';
import { FilterSpec, createFilterSpec } from './filter';

export type ComponentName = 'template' | 'date' | 'priority' | 'exclusion' | 'state' | 'assignment' | 'keyword' | 'context';

export interface ComponentSummary {
    component: ComponentName;
    description: string;
    weight: number;
}

export interface UnparsedFragment {
    component: ComponentName;
    fragment: string;
    detail: string;
}

export interface Rejection {
    reason: RejectionReason;
    message: string;
}

export interface IntelligenceResult {
    id: string;
    query: string;
    table: string;
    compiledQuery: string;
    confidenceScore: number;
    explanation: string;
    declarativeEquivalent: string;
    suggestions: string[];
    templateUsed?: string;
    filters: FilterSpec;
    components: ComponentSummary[];
    unparsed: UnparsedFragment[];
    rejection?: Rejection;
}

const COMPONENT_NAMES: ComponentName[] = ['template', 'date', 'priority', 'exclusion', 'state', 'assignment', 'keyword', 'context'];

const filterValueSchema = Joi.alternatives().try(
    Joi.string().allow(''),
    Joi.array().items(Joi.string()),
    Joi.object({ start: Joi.string().allow('').required(), end: Joi.string().allow('').required() }),
    Joi.object({ exclude: Joi.array().items(Joi.string()).required() })
);

const intelligenceResultSchema = Joi.object({
    id: Joi.string().uuid().required(),
    query: Joi.string().allow('').required(),
    table: Joi.string().required(),
    compiledQuery: Joi.string().allow('').required(),
    confidenceScore: Joi.number().min(0).max(1).required(),
    explanation: Joi.string().required(),
    declarativeEquivalent: Joi.string().allow('').required(),
    suggestions: Joi.array().items(Joi.string()).required(),
    templateUsed: Joi.string().optional(),
    filters: Joi.object().pattern(Joi.string(), filterValueSchema).required(),
    components: Joi.array().items(Joi.object({
        component: Joi.string().valid(...COMPONENT_NAMES).required(),
        description: Joi.string().allow('').required(),
        weight: Joi.number().min(0).max(1).required()
    })).required(),
    unparsed: Joi.array().items(Joi.object({
        component: Joi.string().valid(...COMPONENT_NAMES).required(),
        fragment: Joi.string().allow('').required(),
        detail: Joi.string().required()
    })).required(),
    rejection: Joi.object({
        reason: Joi.string().valid('INPUT_TOO_LONG', 'SUSPICIOUS_PATTERN', 'TIMEOUT_EXCEEDED').required(),
        message: Joi.string().required()
    }).optional()
});

/**
 * Validated, immutable outcome of turning a free-text query into filters.
 */
export class IntelligenceResultModel implements IntelligenceResult {
    public readonly id: string;
    public readonly query: string;
    public readonly table: string;
    public readonly compiledQuery: string;
    public readonly confidenceScore: number;
    public readonly explanation: string;
    public readonly declarativeEquivalent: string;
    public readonly suggestions: string[];
    public readonly templateUsed?: string;
    public readonly filters: FilterSpec;
    public readonly components: ComponentSummary[];
    public readonly unparsed: UnparsedFragment[];
    public readonly rejection?: Rejection;

    constructor(data: Partial<IntelligenceResult>) {
        const validatedData = this.validate(this.sanitize(data));

        this.id = validatedData.id;
        this.query = validatedData.query;
        this.table = validatedData.table;
        this.compiledQuery = validatedData.compiledQuery;
        this.confidenceScore = validatedData.confidenceScore;
        this.explanation = validatedData.explanation;
        this.declarativeEquivalent = validatedData.declarativeEquivalent;
        this.suggestions = validatedData.suggestions;
        this.templateUsed = validatedData.templateUsed;
        this.filters = createFilterSpec(validatedData.filters);
        this.components = validatedData.components;
        this.unparsed = validatedData.unparsed;
        this.rejection = validatedData.rejection;
        Object.freeze(this);
    }

    private sanitize(data: Partial<IntelligenceResult>): Partial<IntelligenceResult> {
        return {
            ...data,
            id: data.id || uuidv4(),
            confidenceScore: typeof data.confidenceScore === 'number'
                ? Math.max(0, Math.min(1, data.confidenceScore))
                : data.confidenceScore,
            suggestions: [...new Set(data.suggestions ?? [])],
            filters: data.filters ?? {},
            components: data.components ?? [],
            unparsed: data.unparsed ?? []
        };
    }

    private validate(data: Partial<IntelligenceResult>): IntelligenceResult {
        const { error, value } = intelligenceResultSchema.validate(data, { abortEarly: false });
        if (error) {
            throw new ValidationError(
                `IntelligenceResult validation failed: ${error.details.map(d => d.message).join(', ')}`
            );
        }
        return value as IntelligenceResult;
    }

    public toJSON(): IntelligenceResult {
        const json: IntelligenceResult = {
            id: this.id,
            query: this.query,
            table: this.table,
            compiledQuery: this.compiledQuery,
            confidenceScore: this.confidenceScore,
            explanation: this.explanation,
            declarativeEquivalent: this.declarativeEquivalent,
            suggestions: this.suggestions,
            filters: this.filters,
            components: this.components,
            unparsed: this.unparsed
        };
        if (this.templateUsed !== undefined) {
            json.templateUsed = this.templateUsed;
        }
        if (this.rejection !== undefined) {
            json.rejection = this.rejection;
        }
        return json;
    }
}
