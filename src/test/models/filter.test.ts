import { createFilterSpec, isDateRange, isExclusion, isFilterValue, isStringList } from '../../models/filter';

describe('Filter model', () => {
    describe('type guards', () => {
        it('should tell filter value shapes apart', () => {
            expect(isStringList(['1', '2'])).toBe(true);
            expect(isStringList(['1', 2])).toBe(false);
            expect(isDateRange({ start: '2025-08-01', end: '2025-08-31' })).toBe(true);
            expect(isDateRange(['start', 'end'])).toBe(false);
            expect(isExclusion({ exclude: ['6'] })).toBe(true);
            expect(isExclusion('exclude')).toBe(false);
        });

        it('should validate unknown values', () => {
            expect(isFilterValue('1')).toBe(true);
            expect(isFilterValue({ exclude: ['a'] })).toBe(true);
            expect(isFilterValue({ exclude: [1] })).toBe(false);
            expect(isFilterValue({ start: '2025-08-01', end: 5 })).toBe(false);
            expect(isFilterValue(null)).toBe(false);
            expect(isFilterValue(42)).toBe(false);
        });
    });

    describe('createFilterSpec', () => {
        it('should merge sources with later ones winning', () => {
            const spec = createFilterSpec({ priority: '1', state: '2' }, { priority: ['1', '2'] });

            expect(spec).toEqual({ priority: ['1', '2'], state: '2' });
            expect(Object.keys(spec)).toEqual(['priority', 'state']);
        });

        it('should return a frozen filter with copied lists', () => {
            const priorities = ['1'];
            const spec = createFilterSpec({ priority: priorities });
            priorities.push('2');

            expect(Object.isFrozen(spec)).toBe(true);
            expect(spec['priority']).toEqual(['1']);
        });
    });
});
