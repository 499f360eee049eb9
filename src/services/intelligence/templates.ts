import { FilterSpec, createFilterSpec } from '../../models/filter';
import { containsPhrase, normalizePhrase } from '../../utils/text';
import { RESOLVED_STATES } from './components';

export interface FilterTemplate {
    name: string;
    description: string;
    /** Each group is a set of synonyms; a group matches when any of them occurs. */
    synonyms: readonly (readonly string[])[];
    filters: FilterSpec;
}

export interface TemplateMatch {
    template: FilterTemplate;
    score: number;
}

const HIGH_PRIORITY = ['high priority', 'critical', 'p1', 'p2', 'p1 p2', 'p1 and p2'];
const RECENT = ['recent', 'recently', 'latest', 'newest'];

export const DEFAULT_TEMPLATES: readonly FilterTemplate[] = [
    {
        name: 'high_priority_last_week',
        description: 'Priority 1 and 2 records created last week',
        synonyms: [HIGH_PRIORITY, ['last week', 'past week', 'previous week']],
        filters: createFilterSpec({
            priority: ['1', '2'],
            sys_created_on: {
                start: 'javascript:gs.beginningOfLastWeek()',
                end: 'javascript:gs.endOfLastWeek()'
            }
        })
    },
    {
        name: 'critical_recent',
        description: 'Critical records created in the last 7 days',
        synonyms: [['critical', 'p1', 'urgent'], RECENT],
        filters: createFilterSpec({
            priority: '1',
            sys_created_on: '>=javascript:gs.daysAgoStart(7)'
        })
    },
    {
        name: 'unassigned_recent',
        description: 'Unassigned records created in the last 3 days',
        synonyms: [['unassigned', 'not assigned', 'no assignee'], RECENT],
        filters: createFilterSpec({
            assigned_to: 'ISEMPTY',
            sys_created_on: '>=javascript:gs.daysAgoStart(3)'
        })
    },
    {
        name: 'resolved_this_month',
        description: 'Records resolved this month',
        synonyms: [['resolved', 'closed'], ['this month', 'current month']],
        filters: createFilterSpec({
            state: '6',
            sys_created_on: '>=javascript:gs.beginningOfThisMonth()'
        })
    },
    {
        name: 'active_p1_p2',
        description: 'Open priority 1 and 2 records',
        synonyms: [['active', 'open'], HIGH_PRIORITY],
        filters: createFilterSpec({
            priority: ['1', '2'],
            state: { exclude: RESOLVED_STATES }
        })
    },
    {
        name: 'p1_p2_all_states',
        description: 'Priority 1 and 2 records in any state',
        synonyms: [['p1 and p2', 'p1 p2', 'p1 or p2']],
        filters: createFilterSpec({
            priority: ['1', '2']
        })
    }
];

/**
 * Named, pre-built FilterSpecs matched against queries by synonym groups.
 */
export class TemplateRegistry {
    private readonly templates: FilterTemplate[];

    constructor(templates: readonly FilterTemplate[] = DEFAULT_TEMPLATES) {
        this.templates = [...templates];
    }

    public list(): readonly FilterTemplate[] {
        return this.templates;
    }

    public get(name: string): FilterTemplate | undefined {
        return this.templates.find(template => template.name === name);
    }

    public register(template: FilterTemplate): void {
        const existing = this.templates.findIndex(t => t.name === template.name);
        if (existing >= 0) {
            this.templates[existing] = template;
        } else {
            this.templates.push(template);
        }
    }

    public score(template: FilterTemplate, query: string): number {
        if (template.synonyms.length === 0) {
            return 0;
        }
        const normalized = normalizePhrase(query);
        const matched = template.synonyms.filter(group => group.some(phrase => containsPhrase(normalized, phrase)));
        return matched.length / template.synonyms.length;
    }

    /**
     * Best template scoring at least `threshold`. Ties go to the template
     * with more synonym groups, then to the one registered first.
     */
    public match(query: string, threshold: number): TemplateMatch | null {
        let best: TemplateMatch | null = null;
        for (const template of this.templates) {
            const score = this.score(template, query);
            if (score < threshold) {
                continue;
            }
            if (!best || score > best.score
                || (score === best.score && template.synonyms.length > best.template.synonyms.length)) {
                best = { template, score };
            }
        }
        return best;
    }
}
