import { BoundedMatcher } from '../../../services/inputGuard';
import { StaticEntityResolver } from '../../../services/intelligence/entityResolver';
import { ExclusionComponent, exclusionValues, isIdentifierShaped } from '../../../services/intelligence/exclusion';
import { OperationCancelledError } from '../../../utils/errors';

jest.mock('../../../utils/logger');

const MONITOR_ID = 'a1b2c3d4e5f60718293a4b5c6d7e8f90';

describe('exclusionValues', () => {
    it('should stop at the first terminator word', () => {
        expect(exclusionValues(' logicmonitor from last week')).toEqual(['logicmonitor']);
    });

    it('should split on commas and strip quotes', () => {
        expect(exclusionValues(' logicmonitor, "Jane Doe" from last week')).toEqual(['logicmonitor', 'Jane Doe']);
    });

    it('should return nothing when a terminator comes first', () => {
        expect(exclusionValues(' and p1')).toEqual([]);
    });
});

describe('isIdentifierShaped', () => {
    it('should recognize identifiers', () => {
        expect(isIdentifierShaped(MONITOR_ID)).toBe(true);
        expect(isIdentifierShaped('svc_monitor')).toBe(true);
        expect(isIdentifierShaped('user42')).toBe(true);
    });

    it('should treat plain names as names', () => {
        expect(isIdentifierShaped('logicmonitor')).toBe(false);
        expect(isIdentifierShaped('Jane Doe')).toBe(false);
    });

    it('should reject values with characters outside identifiers', () => {
        expect(isIdentifierShaped('abc1^NQactive=true')).toBe(false);
        expect(isIdentifierShaped('user_1@example.com')).toBe(false);
        expect(isIdentifierShaped('first.last-2')).toBe(true);
    });
});

describe('ExclusionComponent', () => {
    const matcher = new BoundedMatcher();
    const resolver = new StaticEntityResolver({ LogicMonitor: MONITOR_ID });
    const component = new ExclusionComponent(matcher, resolver);

    it('should resolve a named caller', async () => {
        expect(await component.parse('P1 incidents excluding caller logicmonitor from last week')).toEqual({
            component: 'exclusion',
            filters: { caller_id: { exclude: [MONITOR_ID] } },
            description: 'Excluding 1 caller value(s)',
            unparsed: []
        });
    });

    it('should keep identifier-shaped values without resolving them', async () => {
        const resolve = jest.spyOn(resolver, 'resolve');
        const parsed = await component.parse('tickets not assignee svc_bot');

        expect(parsed?.filters).toEqual({ assigned_to: { exclude: ['svc_bot'] } });
        expect(parsed?.description).toBe('Excluding 1 assignee value(s)');
        expect(resolve).not.toHaveBeenCalled();
        resolve.mockRestore();
    });

    it('should report names that do not resolve', async () => {
        expect(await component.parse('incidents excluding caller nobody')).toEqual({
            component: 'exclusion',
            filters: {},
            description: '',
            unparsed: [{ component: 'exclusion', fragment: 'nobody', detail: 'no caller matches this name' }]
        });
    });

    it('should report values carrying query operators without resolving them', async () => {
        const resolve = jest.spyOn(resolver, 'resolve');

        expect(await component.parse('incidents excluding caller abc1^NQactive=true')).toEqual({
            component: 'exclusion',
            filters: {},
            description: '',
            unparsed: [{ component: 'exclusion', fragment: 'abc1^NQactive=true', detail: 'contains query operators' }]
        });
        expect(resolve).not.toHaveBeenCalled();
        resolve.mockRestore();
    });

    it('should merge several values for one field', async () => {
        const parsed = await component.parse('excluding callers logicmonitor, svc_backup');

        expect(parsed?.filters).toEqual({ caller_id: { exclude: [MONITOR_ID, 'svc_backup'] } });
        expect(parsed?.description).toBe('Excluding 2 caller value(s)');
    });

    it('should ignore a trigger without values', async () => {
        expect(await component.parse('tickets without assignee')).toBeNull();
    });

    it('should return null without a trigger', async () => {
        expect(await component.parse('printer jam')).toBeNull();
    });

    it('should stop when the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(component.parse('excluding caller logicmonitor', controller.signal))
            .rejects.toThrow(OperationCancelledError);
    });
});
