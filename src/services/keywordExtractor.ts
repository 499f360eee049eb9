import keywordData from '../resources/keywords.json';
import { words } from '../utils/text';
import { BoundedMatcher } from './inputGuard';

export interface KeywordExtractorOptions {
    maxKeywords?: number;
    minLength?: number;
    stopWords?: Iterable<string>;
    /** Terms that outrank ordinary tokens, most important first. */
    priorityTerms?: readonly string[];
    recordPrefixes?: readonly string[];
    matcher?: BoundedMatcher;
}

export interface CandidateFilter {
    keyword: string;
    query: string;
    isRecordId: boolean;
}

/**
 * Pulls a small, ordered set of search terms out of free text. A record
 * identifier anywhere in the text short-circuits to that identifier alone.
 */
export class KeywordExtractor {
    private readonly maxKeywords: number;
    private readonly minLength: number;
    private readonly stopWords: Set<string>;
    private readonly priorityTerms: readonly string[];
    private readonly recordIdPattern: RegExp;
    private readonly matcher: BoundedMatcher;

    constructor(options: KeywordExtractorOptions = {}) {
        this.maxKeywords = options.maxKeywords ?? 3;
        this.minLength = options.minLength ?? 4;
        this.stopWords = new Set(options.stopWords ?? keywordData.stopWords);
        this.priorityTerms = options.priorityTerms ?? keywordData.priorityTerms;
        this.matcher = options.matcher ?? new BoundedMatcher();

        const prefixes = options.recordPrefixes ?? keywordData.recordPrefixes;
        this.recordIdPattern = new RegExp(`\\b(?:${prefixes.join('|')})\\d{5,10}\\b`, 'i');
    }

    /**
     * Returns the first record identifier in the text, upper-cased, or null.
     */
    public findRecordId(text: string): string | null {
        const found = this.matcher.match(this.recordIdPattern, text);
        return found ? found.match.toUpperCase() : null;
    }

    /**
     * Yields keywords in priority order. An empty sequence means the text has
     * nothing searchable.
     */
    public *extract(text: string): Generator<string, void, undefined> {
        const recordId = this.findRecordId(text);
        if (recordId) {
            yield recordId.toLowerCase();
            return;
        }

        const seen = new Set<string>();
        const prioritized: string[] = [];
        const ordinary: string[] = [];

        for (const token of words(text)) {
            if (token.length < this.minLength || this.stopWords.has(token) || seen.has(token)) {
                continue;
            }
            seen.add(token);
            (this.priorityTerms.includes(token) ? prioritized : ordinary).push(token);
        }

        prioritized.sort((a, b) => this.priorityTerms.indexOf(a) - this.priorityTerms.indexOf(b));
        yield* [...prioritized, ...ordinary].slice(0, this.maxKeywords);
    }

    public keywordList(text: string): string[] {
        return [...this.extract(text)];
    }

    /**
     * Candidate filters in the order a text search should try them. The
     * returned iterable re-runs extraction each time it is iterated.
     */
    public candidateFilters(text: string): Iterable<CandidateFilter> {
        const extractor = this;
        return {
            *[Symbol.iterator](): Generator<CandidateFilter, void, undefined> {
                const recordId = extractor.findRecordId(text);
                if (recordId) {
                    yield { keyword: recordId.toLowerCase(), query: `number=${recordId}`, isRecordId: true };
                    return;
                }
                for (const keyword of extractor.extract(text)) {
                    yield { keyword, query: `short_descriptionLIKE${keyword}`, isRecordId: false };
                }
            }
        };
    }
}
