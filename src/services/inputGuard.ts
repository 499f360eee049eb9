import vm from 'vm';
import { SafetyConfig } from '../models/config';
import {
    InputTooLongError,
    PatternTimeoutError,
    RejectionReason,
    SuspiciousPatternError
} from '../utils/errors';
import { logger } from '../utils/logger';

export type SafetyVerdict =
    | { ok: true }
    | { ok: false; reason: RejectionReason; message: string; rule?: string };

export interface RegexMatch {
    match: string;
    index: number;
    /** Capture groups in order; a group that did not participate is undefined. */
    groups: Array<string | undefined>;
}

type MatchMode = 'test' | 'match' | 'all';

interface SerializedMatch {
    match: string;
    index: number;
    groups: Array<string | null>;
}

const GROUPING_METACHARACTERS = new Set(['(', ')', '[', ']', '{', '}', '*', '+', '?', '|']);
const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

const MATCHER_SOURCE = `(function () {
    var input = JSON.parse(__boundedInput);
    var flags = input.mode === 'all' && input.flags.indexOf('g') === -1 ? input.flags + 'g' : input.flags;
    var re = new RegExp(input.source, flags);
    function shape(m) {
        return {
            match: m[0],
            index: m.index,
            groups: Array.prototype.slice.call(m, 1).map(function (g) { return g === undefined ? null : g; })
        };
    }
    if (input.mode === 'test') {
        return JSON.stringify(re.test(input.text));
    }
    if (input.mode === 'match') {
        var first = re.exec(input.text);
        return JSON.stringify(first ? shape(first) : null);
    }
    var out = [];
    var m;
    while ((m = re.exec(input.text)) !== null) {
        out.push(shape(m));
        if (m[0] === '') {
            re.lastIndex++;
        }
    }
    return JSON.stringify(out);
})()`;

function isSerializedMatch(value: unknown): value is SerializedMatch {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return 'match' in value && typeof value.match === 'string'
        && 'index' in value && typeof value.index === 'number'
        && 'groups' in value && Array.isArray(value.groups)
        && value.groups.every((g: unknown) => g === null || typeof g === 'string');
}

function toRegexMatch(serialized: SerializedMatch): RegexMatch {
    return {
        match: serialized.match,
        index: serialized.index,
        groups: serialized.groups.map(group => group ?? undefined)
    };
}

function isTimeout(error: unknown): boolean {
    return typeof error === 'object' && error !== null
        && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

/**
 * Evaluates regular expressions against untrusted text inside an isolated
 * vm context with a hard wall-clock limit. Every pattern the parsers run on
 * user input goes through here.
 */
export class BoundedMatcher {
    private readonly context: vm.Context;
    private readonly script: vm.Script;

    constructor(private readonly timeoutMs: number = 100) {
        this.context = vm.createContext({ __boundedInput: '' });
        this.script = new vm.Script(MATCHER_SOURCE, { filename: 'bounded-matcher.js' });
    }

    public test(pattern: RegExp, text: string): boolean {
        return this.run(pattern, text, 'test') === true;
    }

    public match(pattern: RegExp, text: string): RegexMatch | null {
        const result = this.run(pattern, text, 'match');
        return isSerializedMatch(result) ? toRegexMatch(result) : null;
    }

    public matchAll(pattern: RegExp, text: string): RegexMatch[] {
        const result = this.run(pattern, text, 'all');
        if (!Array.isArray(result)) {
            return [];
        }
        return result.filter(isSerializedMatch).map(toRegexMatch);
    }

    private run(pattern: RegExp, text: string, mode: MatchMode): unknown {
        this.context.__boundedInput = JSON.stringify({
            source: pattern.source,
            flags: pattern.flags,
            text,
            mode
        });

        let raw: unknown;
        try {
            raw = this.script.runInContext(this.context, { timeout: this.timeoutMs });
        } catch (error) {
            if (isTimeout(error)) {
                throw new PatternTimeoutError(this.timeoutMs, { pattern: pattern.source, inputLength: text.length });
            }
            throw error;
        } finally {
            this.context.__boundedInput = '';
        }

        return typeof raw === 'string' ? JSON.parse(raw) : null;
    }
}

/**
 * Length and structural checks that gate every free-text input before any
 * parsing or I/O happens.
 */
export class InputGuard {
    public readonly matcher: BoundedMatcher;

    constructor(private readonly config: SafetyConfig) {
        this.matcher = new BoundedMatcher(config.regexTimeoutMs);
    }

    public check(text: unknown): SafetyVerdict {
        const verdict = this.evaluate(text);
        if (!verdict.ok) {
            logger.warn('Input rejected by safety checks', {
                operation: 'inputGuard.check',
                reason: verdict.reason,
                rule: verdict.rule,
                inputLength: typeof text === 'string' ? text.length : undefined
            });
        }
        return verdict;
    }

    /**
     * Same checks as `check`, raising the matching error instead of
     * returning a verdict.
     */
    public assertSafe(text: unknown): string {
        if (typeof text !== 'string') {
            throw new SuspiciousPatternError('Input must be a string', 'type');
        }
        if (text.length > this.config.maxInputLength) {
            throw new InputTooLongError(text.length, this.config.maxInputLength);
        }
        const verdict = this.scanStructure(text);
        if (!verdict.ok) {
            throw new SuspiciousPatternError(verdict.message, verdict.rule ?? 'structure');
        }
        return text;
    }

    private evaluate(text: unknown): SafetyVerdict {
        if (typeof text !== 'string') {
            return { ok: false, reason: 'SUSPICIOUS_PATTERN', rule: 'type', message: 'Input must be a string' };
        }
        if (text.length > this.config.maxInputLength) {
            return {
                ok: false,
                reason: 'INPUT_TOO_LONG',
                message: `Input is ${text.length} characters long; the maximum is ${this.config.maxInputLength}`
            };
        }
        return this.scanStructure(text);
    }

    // Plain character counting; no regex touches the input here.
    private scanStructure(text: string): SafetyVerdict {
        let metacharacters = 0;
        let whitespace = 0;
        let dashes = 0;
        let depth = 0;
        let maxDepth = 0;

        for (const ch of text) {
            if (GROUPING_METACHARACTERS.has(ch)) {
                metacharacters++;
            }
            if (OPENERS.has(ch)) {
                depth++;
                maxDepth = Math.max(maxDepth, depth);
            } else if (CLOSERS.has(ch)) {
                depth = Math.max(0, depth - 1);
            } else if (ch === '-') {
                dashes++;
            } else if (ch.trim() === '') {
                whitespace++;
            }
        }

        if (metacharacters > this.config.maxMetacharacters) {
            return this.suspicious('metacharacters', `Input contains ${metacharacters} grouping or quantifier characters`);
        }
        if (maxDepth > this.config.maxNestingDepth) {
            return this.suspicious('nesting', `Input nests brackets ${maxDepth} levels deep`);
        }
        if (whitespace > this.config.maxWhitespace) {
            return this.suspicious('whitespace', `Input contains ${whitespace} whitespace characters`);
        }
        if (dashes > this.config.maxDashes) {
            return this.suspicious('dashes', `Input contains ${dashes} dashes`);
        }
        return { ok: true };
    }

    private suspicious(rule: string, message: string): SafetyVerdict {
        return { ok: false, reason: 'SUSPICIOUS_PATTERN', rule, message };
    }
}
