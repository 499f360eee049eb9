import { defaultConfig } from '../../config/defaults';
import { SystemConfig } from '../../models/config';
import { FetchRequest, RecordSource, ResultSet, TableRecord } from '../../models/record';
import { NO_RECORDS_FOUND, TableQueryService } from '../../services/tableQueryService';
import { FetchError, InputTooLongError, ValidationError } from '../../utils/errors';

jest.mock('../../utils/logger');

const LAST_WEEK = 'sys_created_onBETWEENjavascript:gs.beginningOfLastWeek()@javascript:gs.endOfLastWeek()';
const ADD_STATE = 'Add a state such as "active" to leave out resolved and closed records';
const ADD_PERIOD = 'Add a time period such as "last week" or "last 30 days" to narrow the results';
const INCIDENT_FIELDS = ['number', 'short_description', 'priority', 'state'];

type Responder = (request: FetchRequest) => TableRecord[] | ResultSet;

function resultSet(request: FetchRequest, records: TableRecord[], extra: Partial<ResultSet> = {}): ResultSet {
    return {
        table: request.table,
        query: request.query,
        records,
        pagesFetched: 1,
        complete: true,
        truncated: false,
        ...extra
    };
}

class FakeSource implements RecordSource {
    public readonly requests: FetchRequest[] = [];

    constructor(private readonly respond: Responder = () => []) { }

    public async fetchAll(request: FetchRequest): Promise<ResultSet> {
        this.requests.push(request);
        const answer = this.respond(request);
        return Array.isArray(answer) ? resultSet(request, answer) : answer;
    }

    public queries(): string[] {
        return this.requests.map(request => request.query);
    }
}

const config: SystemConfig = {
    ...defaultConfig,
    instance: {
        url: 'https://example.service-now.com',
        authType: 'oauth',
        clientId: 'test-client',
        clientSecret: 'test-secret'
    }
};

function createService(respond?: Responder): { service: TableQueryService; source: FakeSource } {
    const source = new FakeSource(respond);
    return { service: new TableQueryService(config, { source }), source };
}

describe('TableQueryService', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('table names', () => {
        it.each(['Incident', '1incident', 'incident; drop', ''])('should reject the table name "%s"', async (table) => {
            const { service, source } = createService();

            await expect(service.searchByText(table, 'printer')).rejects.toThrow(ValidationError);
            await expect(service.queryRecords(table)).rejects.toThrow(`Invalid table name: ${table}`);
            expect(source.requests).toHaveLength(0);
        });

        it('should reject an invalid table before explaining', () => {
            const { service } = createService();

            expect(() => service.explainFilter('Bad Table', {})).toThrow('Invalid table name: Bad Table');
        });
    });

    describe('searchByText', () => {
        it('should reject over-long input without fetching', async () => {
            const { service, source } = createService(() => [{ number: 'INC0000001' }]);

            const response = await service.searchByText('incident', 'a'.repeat(201));

            expect(source.requests).toHaveLength(0);
            expect(response).toEqual({
                status: 'rejected',
                message: 'Input is 201 characters long; the maximum is 200',
                table: 'incident',
                query: '',
                records: [],
                count: 0,
                complete: false,
                truncated: false,
                warnings: [],
                suggestions: []
            });
        });

        it('should try candidates in keyword order until one matches', async () => {
            const { service, source } = createService(request =>
                request.query === 'short_descriptionLIKEremote' ? [{ number: 'INC0000007' }] : []
            );

            const response = await service.searchByText('incident', 'vpn outage for remote users');

            expect(source.queries()).toEqual(['short_descriptionLIKEoutage', 'short_descriptionLIKEremote']);
            expect(response.status).toBe('success');
            expect(response.message).toBe('Found 1 records');
            expect(response.keyword).toBe('remote');
            expect(response.query).toBe('short_descriptionLIKEremote');
            expect(response.records).toEqual([{ number: 'INC0000007' }]);
        });

        it('should pass the table projection and fetch mode', async () => {
            const { service, source } = createService(() => [{ number: 'INC0000001' }]);

            await service.searchByText('incident', 'printer');

            expect(source.requests[0]).toEqual({
                table: 'incident',
                query: 'short_descriptionLIKEprinter',
                fields: INCIDENT_FIELDS,
                mode: 'strict',
                signal: undefined
            });
        });

        it('should use detailed and fallback projections', async () => {
            const { service, source } = createService(() => [{ number: 'KB0010001' }]);

            await service.searchByText('kb_knowledge', 'printer', { detailed: true });
            await service.searchByText('x_custom_table', 'printer');

            expect(source.requests[0]?.fields).toEqual([
                'number', 'short_description', 'kb_category', 'state', 'sys_created_on', 'assigned_to'
            ]);
            expect(source.requests[1]?.fields).toEqual(['number', 'short_description']);
        });

        it('should look up a record identifier directly', async () => {
            const { service, source } = createService(() => [{ number: 'INC0012345' }]);

            const response = await service.searchByText('incident', 'status of inc0012345 please');

            expect(source.queries()).toEqual(['number=INC0012345']);
            expect(response.keyword).toBe('inc0012345');
        });

        it('should report no records after every candidate misses', async () => {
            const { service, source } = createService();

            const response = await service.searchByText('incident', 'vpn outage for remote users');

            expect(source.requests).toHaveLength(3);
            expect(response.status).toBe('no_records');
            expect(response.message).toBe(NO_RECORDS_FOUND);
            expect(response.query).toBe('short_descriptionLIKEusers');
            expect(response.complete).toBe(true);
        });

        it('should not fetch when nothing is searchable', async () => {
            const { service, source } = createService();

            const response = await service.searchByText('incident', 'show me the list');

            expect(source.requests).toHaveLength(0);
            expect(response.status).toBe('no_records');
            expect(response.query).toBe('');
        });
    });

    describe('queryRecords', () => {
        it('should compile parameters and report a thin high-priority result', async () => {
            const { service, source } = createService(() => [{ number: 'INC0000001' }]);

            const response = await service.queryRecords('incident', {
                priorities: ['1', '2'],
                excludeCallers: 'svc_a, svc_b',
                maxRecords: 50
            });

            expect(source.requests[0]).toEqual({
                table: 'incident',
                query: 'priority=1^ORpriority=2^caller_id!=svc_a^caller_id!=svc_b',
                fields: INCIDENT_FIELDS,
                maxRecords: 50,
                mode: 'strict',
                signal: undefined
            });
            expect(response.warnings).toEqual(['Low P1/P2 incident count (1) - verify completeness']);
            expect(response.suggestions).toEqual([
                'Cross-check with individual record lookups or a broader query',
                "Use OR syntax for several levels: 'priority=1^ORpriority=2'",
                "Check that priority values are numeric (1, 2) rather than labels ('1 - Critical')"
            ]);
        });

        it('should reject exclusions and priorities that would add clauses', async () => {
            const { service, source } = createService();

            await expect(service.queryRecords('incident', { excludeCallers: 'svc_a^NQactive=true' }))
                .rejects.toThrow(ValidationError);
            await expect(service.queryRecords('incident', { priorities: 'P1^NQactive=true' }))
                .rejects.toThrow(ValidationError);
            expect(source.requests).toHaveLength(0);
        });

        it('should warn about a truncated result', async () => {
            const records = [{ number: 'CHG0000001' }, { number: 'CHG0000002' }, { number: 'CHG0000003' }];
            const { service } = createService(request =>
                resultSet(request, records, { complete: false, truncated: true })
            );

            const response = await service.queryRecords('change_request', { filters: { assignment_group: 'Network' } });

            expect(response.query).toBe('assignment_group=Network');
            expect(response.truncated).toBe(true);
            expect(response.warnings).toEqual(['Result was truncated at 3 records']);
            expect(response.suggestions).toEqual([]);
        });

        it('should report a partial result', async () => {
            const error = new FetchError('Request failed with status 503', 1, true, 503);
            const { service } = createService(request =>
                resultSet(request, [{ number: 'INC0000001' }, { number: 'INC0000002' }], { complete: false, error })
            );

            const response = await service.queryRecords('incident', { filters: { state: '2' } });

            expect(response.status).toBe('partial');
            expect(response.message).toBe('Returned 2 records before page 1 failed: Request failed with status 503');
            expect(response.count).toBe(2);
        });

        it('should suggest broader filters when nothing matches', async () => {
            const { service } = createService();

            const response = await service.queryRecords('kb_knowledge', { filters: { kb_category: 'Email' } });

            expect(response.status).toBe('no_records');
            expect(response.suggestions).toEqual([
                'Try a broader date range or check the filter syntax',
                'Verify field names match the table schema',
                'Check that dates use YYYY-MM-DD',
                'Verify caller exclusions are not too restrictive'
            ]);
        });
    });

    describe('queryByPriority', () => {
        it('should add the priority chain after the other filters', async () => {
            const records = [{ number: 'INC0000001' }, { number: 'INC0000002' }, { number: 'INC0000003' }];
            const { service, source } = createService(() => records);

            const response = await service.queryByPriority('incident', 'P1,P2', { assignment_group: 'Network' });

            expect(source.queries()).toEqual(['assignment_group=Network^priority=1^ORpriority=2']);
            expect(response.warnings).toEqual(["Priority filter 'P1,P2' uses comma syntax instead of OR"]);
            expect(response.suggestions).toEqual([
                "For several levels use 'priority=1^ORpriority=2' instead of a comma list"
            ]);
        });
    });

    describe('intelligentSearch', () => {
        it('should execute a confident compiled query', async () => {
            const { service, source } = createService(() => [{ number: 'INC0000001' }, { number: 'INC0000002' }]);

            const response = await service.intelligentSearch('incident', 'Show me P1 and P2 incidents from last week');

            expect(source.queries()).toEqual([`priority=1^ORpriority=2^${LAST_WEEK}`]);
            expect(response.fallbackUsed).toBe(false);
            expect(response.status).toBe('success');
            expect(response.count).toBe(2);
            expect(response.intelligence.templateUsed).toBe('high_priority_last_week');
            expect(response.suggestions).toEqual([ADD_STATE]);
        });

        it('should fall back to text search on low confidence', async () => {
            const { service, source } = createService(() => [{ number: 'INC0000009' }]);

            const response = await service.intelligentSearch('incident', 'database connection timeout');

            expect(source.queries()).toEqual(['short_descriptionLIKEdatabase']);
            expect(response.fallbackUsed).toBe(true);
            expect(response.intelligence.confidenceScore).toBe(0.25);
            expect(response.suggestions).toEqual([ADD_STATE, ADD_PERIOD]);
        });

        it('should fall back when nothing compiled', async () => {
            const { service, source } = createService();

            const response = await service.intelligentSearch('incident', 'show me the list');

            expect(source.requests).toHaveLength(0);
            expect(response.fallbackUsed).toBe(true);
            expect(response.status).toBe('no_records');
        });

        it('should return a rejection without fetching', async () => {
            const { service, source } = createService(() => [{ number: 'INC0000001' }]);

            const response = await service.intelligentSearch('incident', 'a'.repeat(201));

            expect(source.requests).toHaveLength(0);
            expect(response.status).toBe('rejected');
            expect(response.fallbackUsed).toBe(false);
            expect(response.intelligence.rejection?.reason).toBe('INPUT_TOO_LONG');
        });
    });

    describe('filter tooling', () => {
        it('should build and analyze a smart filter without fetching', async () => {
            const { service, source } = createService();

            const smart = await service.buildSmartFilter('incident', 'Show me P1 and P2 incidents from last week');

            expect(source.requests).toHaveLength(0);
            expect(smart.validation.isValid).toBe(true);
            expect(smart.analysis.conditionCount).toBe(3);
            expect(smart.analysis.components).toEqual([
                'Date filtering',
                'BETWEEN range',
                'Priority filtering',
                'OR logic',
                'Date functions'
            ]);
            expect(smart.analysis.potentialIssues).toEqual([]);
        });

        it('should explain a filter', () => {
            const { service } = createService();

            const explanation = service.explainFilter('incident', { priority: ['1', '2'] });

            expect(explanation.declarativeEquivalent).toBe(
                "SELECT * FROM incident WHERE (priority = '1' OR priority = '2')"
            );
        });

        it('should list templates with their compiled queries', () => {
            const { service } = createService();

            const templates = service.getFilterTemplates();

            expect(templates).toHaveLength(6);
            expect(templates[0]?.name).toBe('high_priority_last_week');
            expect(templates[0]?.compiledQuery).toBe(`priority=1^ORpriority=2^${LAST_WEEK}`);
        });
    });

    describe('getQueryExamples', () => {
        it('should phrase one example per template', () => {
            const { service } = createService();

            const { examples, tables } = service.getQueryExamples();

            expect(examples.map(example => example.query)).toEqual([
                'high priority last week',
                'critical recent',
                'unassigned recent',
                'resolved this month',
                'active high priority',
                'p1 and p2'
            ]);
            expect(examples[0]).toEqual({
                template: 'high_priority_last_week',
                description: 'Priority 1 and 2 records created last week',
                query: 'high priority last week'
            });
            expect(tables).toEqual(['incident', 'change_request', 'universal_request', 'kb_knowledge', 'vtb_task']);
        });

        it('should give examples that select their own template', async () => {
            const { service, source } = createService();

            for (const example of service.getQueryExamples().examples) {
                const smart = await service.buildSmartFilter('incident', example.query);
                expect(smart.intelligence.templateUsed).toBe(example.template);
            }
            expect(source.requests).toHaveLength(0);
        });
    });

    describe('record lookups', () => {
        it('should fetch one record by its number', async () => {
            const { service, source } = createService(() => [{ number: 'INC0012345' }]);

            const response = await service.getRecordDetails('incident', ' inc0012345 ');

            expect(source.requests[0]).toEqual({
                table: 'incident',
                query: 'number=INC0012345',
                fields: ['number', 'short_description', 'priority', 'state', 'sys_created_on', 'assigned_to', 'assignment_group'],
                pageSize: 1,
                maxRecords: 1,
                mode: 'strict',
                signal: undefined
            });
            expect(response.status).toBe('success');
        });

        it('should fetch only the description', async () => {
            const { service, source } = createService(() => [{ short_description: 'Printer jammed' }]);

            await service.getRecordDescription('incident', 'INC0012345');

            expect(source.requests[0]?.fields).toEqual(['short_description']);
        });

        it('should reject a number carrying query syntax', async () => {
            const { service, source } = createService();

            await expect(service.getRecordDetails('incident', 'INC001=1'))
                .rejects.toThrow('Record number must be a plain identifier');
            expect(source.requests).toHaveLength(0);
        });

        it('should reject an over-long number', async () => {
            const { service } = createService();

            await expect(service.getRecordDetails('incident', 'I'.repeat(201))).rejects.toThrow(InputTooLongError);
        });
    });

    describe('findSimilarRecords', () => {
        const original = { number: 'INC0000001', short_description: 'printer jammed upstairs' };
        const sibling = { number: 'INC0000002', short_description: 'printer offline' };

        it('should search by description and drop the record itself', async () => {
            const { service, source } = createService(request =>
                request.query === 'number=INC0000001' ? [original] : [original, sibling]
            );

            const response = await service.findSimilarRecords('incident', 'inc0000001');

            expect(source.queries()).toEqual(['number=INC0000001', 'short_descriptionLIKEprinter']);
            expect(response.records).toEqual([sibling]);
            expect(response.count).toBe(1);
            expect(response.keyword).toBe('printer');
        });

        it('should report no records when only the record itself matches', async () => {
            const { service } = createService(() => [original]);

            const response = await service.findSimilarRecords('incident', 'INC0000001');

            expect(response.status).toBe('no_records');
            expect(response.query).toBe('short_descriptionLIKEprinter');
        });

        it('should report no records for an unknown number', async () => {
            const { service, source } = createService();

            const response = await service.findSimilarRecords('incident', 'INC0000404');

            expect(source.requests).toHaveLength(1);
            expect(response.status).toBe('no_records');
            expect(response.query).toBe('number=INC0000404');
        });
    });
});
