import { FilterCompiler, encodeQuery, normalizePriority } from '../../services/filterCompiler';
import { ValidationError } from '../../utils/errors';

jest.mock('../../utils/logger');

const LAST_WEEK = 'sys_created_onBETWEENjavascript:gs.beginningOfLastWeek()@javascript:gs.endOfLastWeek()';
const WEEK_35 = "sys_created_onBETWEENjavascript:gs.dateGenerate('2025-08-25','00:00:00')@javascript:gs.dateGenerate('2025-08-31','23:59:59')";

describe('FilterCompiler', () => {
    const compiler = new FilterCompiler();

    describe('buildPriorityChain', () => {
        it('should build an OR chain from a list', () => {
            expect(compiler.buildPriorityChain(['1', '2'])).toBe('priority=1^ORpriority=2');
        });

        it('should accept comma, P-notation and bracketed strings', () => {
            expect(compiler.buildPriorityChain('1,2')).toBe('priority=1^ORpriority=2');
            expect(compiler.buildPriorityChain('P1,P2')).toBe('priority=1^ORpriority=2');
            expect(compiler.buildPriorityChain('["1","2"]')).toBe('priority=1^ORpriority=2');
        });

        it('should map priority names and drop connectives', () => {
            expect(compiler.buildPriorityChain('critical and high')).toBe('priority=1^ORpriority=2');
        });

        it('should return a compiled chain unchanged', () => {
            expect(compiler.buildPriorityChain('priority=1^ORpriority=2')).toBe('priority=1^ORpriority=2');
        });

        it('should drop duplicates', () => {
            expect(compiler.buildPriorityChain(['1', 'P1', 'critical'])).toBe('priority=1');
        });
    });

    describe('buildOrChain', () => {
        it('should reject a value containing a separator', () => {
            expect(() => compiler.buildOrChain(['network^NQactive=true'], 'category'))
                .toThrow('List value contains a query separator: network^NQactive=true');
        });


        it('should chain trimmed, non-empty, unique values', () => {
            expect(compiler.buildOrChain(['network', ' database ', 'network', ' '], 'category'))
                .toBe('category=network^ORcategory=database');
        });
    });

    describe('buildDateRange', () => {
        it('should give calendar dates day-boundary times', () => {
            expect(compiler.buildDateRange({ start: '2025-08-25', end: '2025-08-31' })).toBe(WEEK_35);
        });

        it('should pass date functions through', () => {
            const range = { start: 'javascript:gs.beginningOfLastWeek()', end: 'javascript:gs.endOfLastWeek()' };

            expect(compiler.buildDateRange(range)).toBe(LAST_WEEK);
        });

        it('should keep explicit times', () => {
            expect(compiler.buildDateRange({ start: '2025-08-01 08:30:00', end: '2025-08-01 17:00:00' }, 'opened_at'))
                .toBe("opened_atBETWEENjavascript:gs.dateGenerate('2025-08-01','08:30:00')@javascript:gs.dateGenerate('2025-08-01','17:00:00')");
        });

        it('should build a single comparison for a one-sided range', () => {
            expect(compiler.buildDateRange({ start: '2025-08-01', end: '' }))
                .toBe("sys_created_on>=javascript:gs.dateGenerate('2025-08-01','00:00:00')");
            expect(compiler.buildDateRange({ start: '', end: '2025-08-31' }))
                .toBe("sys_created_on<=javascript:gs.dateGenerate('2025-08-31','23:59:59')");
        });

        it('should parse a natural-language range', () => {
            expect(compiler.buildDateRange('last week')).toBe(LAST_WEEK);
            expect(compiler.buildDateRange('week 35 2025')).toBe(WEEK_35);
        });

        it('should return a compiled range unchanged', () => {
            expect(compiler.buildDateRange(WEEK_35)).toBe(WEEK_35);
        });

        it('should reject a range without bounds', () => {
            expect(() => compiler.buildDateRange({ start: ' ', end: '' })).toThrow(ValidationError);
        });

        it('should reject an unreadable bound', () => {
            expect(() => compiler.buildDateRange({ start: 'soon', end: '2025-08-31' })).toThrow('Invalid date bound: soon');
        });

        it('should reject unrecognized text', () => {
            expect(() => compiler.buildDateRange('whenever')).toThrow('Unrecognized date range: whenever');
        });
    });

    describe('buildExclusionChain', () => {
        it('should AND together not-equals clauses', () => {
            expect(compiler.buildExclusionChain(['abc', 'def', 'abc'])).toBe('caller_id!=abc^caller_id!=def');
        });

        it('should not prefix clauses twice', () => {
            expect(compiler.buildExclusionChain(['caller_id!=abc', 'def'])).toBe('caller_id!=abc^caller_id!=def');
        });

        it('should reject values that would add clauses', () => {
            expect(() => compiler.buildExclusionChain(['abc^NQactive=true']))
                .toThrow('Exclusion value must be a plain identifier: abc^NQactive=true');
            expect(() => compiler.buildExclusionChain(['caller_id!=x=y'])).toThrow(ValidationError);
            expect(() => compiler.buildExclusionChain(['caller_id!='])).toThrow(ValidationError);
        });
    });

    describe('compile', () => {
        it('should compile every filter shape in key order', () => {
            const query = compiler.compile({
                priority: ['1', '2'],
                sys_created_on: { start: 'javascript:gs.beginningOfLastWeek()', end: 'javascript:gs.endOfLastWeek()' },
                caller_id: { exclude: ['u1', 'u2'] }
            });

            expect(query).toBe(`priority=1^ORpriority=2^${LAST_WEEK}^caller_id!=u1^caller_id!=u2`);
        });

        it('should be idempotent for its own output', () => {
            const filters = { priority: ['1', '2'], state: { exclude: ['6', '7', '8'] } };
            const query = compiler.compile(filters);

            expect(compiler.compile({ _complete_query: query })).toBe(query);
            expect(compiler.compile({ priority: 'priority=1^ORpriority=2' })).toBe('priority=1^ORpriority=2');
            expect(compiler.compile({ state: 'state!=6' })).toBe('state!=6');
        });

        it('should map empty-value keywords', () => {
            expect(compiler.compile({ assigned_to: 'ISEMPTY' })).toBe('assigned_toISEMPTY');
            expect(compiler.compile({ assigned_to: 'null' })).toBe('assigned_toISEMPTY');
            expect(compiler.compile({ resolved_at: 'ISNOTEMPTY' })).toBe('resolved_atISNOTEMPTY');
        });

        it('should turn field suffixes into operators', () => {
            expect(compiler.compile({ priority_gte: '2' })).toBe('priority>=2');
            expect(compiler.compile({ state_ne: '6' })).toBe('state!=6');
        });

        it('should keep operators already on the value', () => {
            expect(compiler.compile({ sys_updated_on: '>=javascript:gs.daysAgoStart(7)' }))
                .toBe('sys_updated_on>=javascript:gs.daysAgoStart(7)');
            expect(compiler.compile({ short_description: 'LIKEemail' })).toBe('short_descriptionLIKEemail');
        });

        it('should normalize scalar priorities', () => {
            expect(compiler.compile({ priority: 'P1' })).toBe('priority=1');
            expect(compiler.compile({ priority: 'high' })).toBe('priority=2');
            expect(compiler.compile({ priority: '1,2' })).toBe('priority=1^ORpriority=2');
        });

        it('should expand scalar dates on date fields', () => {
            expect(compiler.compile({ sys_created_on: '2025-08-25' }))
                .toBe("sys_created_onBETWEENjavascript:gs.dateGenerate('2025-08-25','00:00:00')@javascript:gs.dateGenerate('2025-08-25','23:59:59')");
            expect(compiler.compile({ sys_created_on: 'last 7 days' }))
                .toBe('sys_created_onBETWEENjavascript:gs.daysAgoStart(7)@javascript:gs.endOfToday()');
        });

        it('should skip empty values', () => {
            expect(compiler.compile({ category: '  ', state: '2' })).toBe('state=2');
        });

        it('should compile an empty filter to an empty query', () => {
            expect(compiler.compile({})).toBe('');
        });
    });
});

describe('normalizePriority', () => {
    it('should map P-notation and names', () => {
        expect(normalizePriority(' p3 ')).toBe('3');
        expect(normalizePriority('Planning')).toBe('5');
    });

    it('should leave unknown tokens trimmed', () => {
        expect(normalizePriority(' Unknown ')).toBe('Unknown');
    });
});

describe('encodeQuery', () => {
    it('should leave query punctuation alone', () => {
        const query = "priority=1^ORpriority=2^sys_created_on>=javascript:gs.dateGenerate('2025-08-01','00:00:00')";

        expect(encodeQuery(query)).toBe(query);
    });

    it('should escape spaces and reserved characters', () => {
        expect(encodeQuery('short_descriptionLIKEemail server & vpn#2'))
            .toBe('short_descriptionLIKEemail%20server%20%26%20vpn%232');
    });
});
