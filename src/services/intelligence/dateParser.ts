import { DateRange } from '../../models/filter';
import { containsPhrase, normalizePhrase } from '../../utils/text';
import { BoundedMatcher, RegexMatch } from '../inputGuard';

export type DateParseOutcome =
    | { kind: 'range'; range: DateRange; fragment: string; description: string; relative: boolean }
    | { kind: 'invalid'; fragment: string; detail: string };

export interface DateParserOptions {
    matcher?: BoundedMatcher;
    /** Texts longer than this are not parsed at all. */
    maxLength?: number;
}

const MONTHS: Record<string, number> = {
    january: 1, jan: 1,
    february: 2, feb: 2,
    march: 3, mar: 3,
    april: 4, apr: 4,
    may: 5,
    june: 6, jun: 6,
    july: 7, jul: 7,
    august: 8, aug: 8,
    september: 9, sept: 9, sep: 9,
    october: 10, oct: 10,
    november: 11, nov: 11,
    december: 12, dec: 12
};

const MONTH = '(january|february|march|april|may|june|july|august|september|october|november|december|jan|feb|mar|apr|jun|jul|aug|sept|sep|oct|nov|dec)';
const DAY = '(\\d{1,2})';
const YEAR = '(\\d{4})';
const RANGE_WORD = '(?:to|through|until|thru)';

const PATTERNS = {
    isoWeek: new RegExp(`\\bweek\\s+(\\d{1,2})\\s+(?:of\\s+)?${YEAR}\\b`, 'i'),
    isoRange: new RegExp(`\\b(\\d{4})-(\\d{2})-(\\d{2})\\s+(?:${RANGE_WORD}|-|and)\\s+(\\d{4})-(\\d{2})-(\\d{2})\\b`, 'i'),
    between: new RegExp(`\\bbetween\\s+${MONTH}\\s+${DAY},?\\s+${YEAR}\\s+and\\s+${MONTH}\\s+${DAY},?\\s+${YEAR}\\b`, 'i'),
    crossMonth: new RegExp(`\\b(?:from\\s+)?${MONTH}\\s+${DAY},?\\s+${YEAR}\\s+${RANGE_WORD}\\s+${MONTH}\\s+${DAY},?\\s+${YEAR}\\b`, 'i'),
    yearAtEnd: new RegExp(`\\b(?:from\\s+)?${MONTH}\\s+${DAY}\\s+${RANGE_WORD}\\s+${MONTH}\\s+${DAY},?\\s+${YEAR}\\b`, 'i'),
    monthRange: new RegExp(`\\b${MONTH}\\s+${DAY}\\s*-\\s*${DAY},?\\s+${YEAR}\\b`, 'i'),
    lastDays: /\b(?:last|past)\s+(\d{1,3})\s+days?\b/i
};

interface RelativePeriod {
    phrases: string[];
    start: string;
    end: string;
    description: string;
}

const RELATIVE_PERIODS: RelativePeriod[] = [
    {
        phrases: ['today'],
        start: 'javascript:gs.beginningOfToday()',
        end: 'javascript:gs.endOfToday()',
        description: 'Created today'
    },
    {
        phrases: ['yesterday'],
        start: 'javascript:gs.beginningOfYesterday()',
        end: 'javascript:gs.endOfYesterday()',
        description: 'Created yesterday'
    },
    {
        phrases: ['this week', 'current week'],
        start: 'javascript:gs.beginningOfThisWeek()',
        end: 'javascript:gs.endOfThisWeek()',
        description: 'Created this week'
    },
    {
        phrases: ['last week', 'past week', 'previous week'],
        start: 'javascript:gs.beginningOfLastWeek()',
        end: 'javascript:gs.endOfLastWeek()',
        description: 'Created last week'
    },
    {
        phrases: ['this month', 'current month'],
        start: 'javascript:gs.beginningOfThisMonth()',
        end: 'javascript:gs.endOfThisMonth()',
        description: 'Created this month'
    },
    {
        phrases: ['last month', 'past month', 'previous month'],
        start: 'javascript:gs.beginningOfLastMonth()',
        end: 'javascript:gs.endOfLastMonth()',
        description: 'Created last month'
    }
];

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

export function formatDate(year: number, month: number, day: number): string {
    return `${year}-${pad(month)}-${pad(day)}`;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
    if (month < 1 || month > 12 || day < 1) {
        return false;
    }
    const date = new Date(Date.UTC(year, month - 1, day));
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function isDigits(text: string): boolean {
    return text.length > 0 && [...text].every(ch => ch >= '0' && ch <= '9');
}

/**
 * True for `YYYY-MM-DD` strings naming a real calendar day.
 */
export function isIsoDate(text: string): boolean {
    if (text.length !== 10 || text[4] !== '-' || text[7] !== '-') {
        return false;
    }
    const [year, month, day] = [text.slice(0, 4), text.slice(5, 7), text.slice(8, 10)];
    if (!isDigits(year) || !isDigits(month) || !isDigits(day)) {
        return false;
    }
    return isValidCalendarDate(Number(year), Number(month), Number(day));
}

/**
 * True for `YYYY-MM-DD HH:MM:SS` strings.
 */
export function isIsoDateTime(text: string): boolean {
    if (text.length !== 19 || text[10] !== ' ' || !isIsoDate(text.slice(0, 10))) {
        return false;
    }
    const time = text.slice(11);
    if (time[2] !== ':' || time[5] !== ':') {
        return false;
    }
    const [hours, minutes, seconds] = [time.slice(0, 2), time.slice(3, 5), time.slice(6, 8)];
    return isDigits(hours) && isDigits(minutes) && isDigits(seconds)
        && Number(hours) < 24 && Number(minutes) < 60 && Number(seconds) < 60;
}

/**
 * Monday to Sunday of an ISO-8601 week, or null when the year has no such
 * week.
 */
export function isoWeekRange(week: number, year: number): DateRange | null {
    if (week < 1 || week > 53) {
        return null;
    }
    const jan4 = Date.UTC(year, 0, 4);
    const jan4Weekday = (new Date(jan4).getUTCDay() + 6) % 7;
    const dayMs = 24 * 60 * 60 * 1000;
    const monday = new Date(jan4 - jan4Weekday * dayMs + (week - 1) * 7 * dayMs);
    const thursday = new Date(monday.getTime() + 3 * dayMs);
    if (thursday.getUTCFullYear() !== year) {
        return null;
    }
    const sunday = new Date(monday.getTime() + 6 * dayMs);
    return {
        start: formatDate(monday.getUTCFullYear(), monday.getUTCMonth() + 1, monday.getUTCDate()),
        end: formatDate(sunday.getUTCFullYear(), sunday.getUTCMonth() + 1, sunday.getUTCDate())
    };
}

/**
 * Recognizes explicit calendar ranges and relative periods in free text.
 * Explicit ranges resolve to two calendar dates; relative periods resolve
 * to date function calls evaluated by the remote service.
 */
export class DateParser {
    private readonly matcher: BoundedMatcher;
    private readonly maxLength: number;

    constructor(options: DateParserOptions = {}) {
        this.matcher = options.matcher ?? new BoundedMatcher();
        this.maxLength = options.maxLength ?? 200;
    }

    public parse(text: string): DateParseOutcome | null {
        if (text.length > this.maxLength) {
            return null;
        }
        return this.parseExplicit(text) ?? this.parseRelative(text);
    }

    public parseExplicit(text: string): DateParseOutcome | null {
        if (text.length > this.maxLength) {
            return null;
        }

        const week = this.matcher.match(PATTERNS.isoWeek, text);
        if (week) {
            const weekNo = this.group(week, 0);
            const year = this.group(week, 1);
            const range = isoWeekRange(weekNo, year);
            return range
                ? this.explicit(range, week.match)
                : { kind: 'invalid', fragment: week.match, detail: `${year} has no week ${weekNo}` };
        }

        const iso = this.matcher.match(PATTERNS.isoRange, text);
        if (iso) {
            return this.calendarRange(
                iso.match,
                [this.group(iso, 0), this.group(iso, 1), this.group(iso, 2)],
                [this.group(iso, 3), this.group(iso, 4), this.group(iso, 5)]
            );
        }

        const between = this.matcher.match(PATTERNS.between, text)
            ?? this.matcher.match(PATTERNS.crossMonth, text);
        if (between) {
            const [month1, day1, year1, month2, day2, year2] = between.groups;
            return this.calendarRange(
                between.match,
                [Number(year1), this.month(month1), Number(day1)],
                [Number(year2), this.month(month2), Number(day2)]
            );
        }

        const yearAtEnd = this.matcher.match(PATTERNS.yearAtEnd, text);
        if (yearAtEnd) {
            const [month1, day1, month2, day2, year] = yearAtEnd.groups;
            return this.calendarRange(
                yearAtEnd.match,
                [Number(year), this.month(month1), Number(day1)],
                [Number(year), this.month(month2), Number(day2)]
            );
        }

        const monthRange = this.matcher.match(PATTERNS.monthRange, text);
        if (monthRange) {
            const [month, day1, day2, year] = monthRange.groups;
            return this.calendarRange(
                monthRange.match,
                [Number(year), this.month(month), Number(day1)],
                [Number(year), this.month(month), Number(day2)]
            );
        }

        return null;
    }

    public parseRelative(text: string): DateParseOutcome | null {
        if (text.length > this.maxLength) {
            return null;
        }

        const lastDays = this.matcher.match(PATTERNS.lastDays, text);
        if (lastDays) {
            const days = this.group(lastDays, 0);
            if (days < 1) {
                return { kind: 'invalid', fragment: lastDays.match, detail: 'the number of days must be positive' };
            }
            return {
                kind: 'range',
                range: { start: `javascript:gs.daysAgoStart(${days})`, end: 'javascript:gs.endOfToday()' },
                fragment: lastDays.match,
                description: `Created in the last ${days} days`,
                relative: true
            };
        }

        const normalized = normalizePhrase(text);
        for (const period of RELATIVE_PERIODS) {
            const phrase = period.phrases.find(p => containsPhrase(normalized, p));
            if (phrase) {
                return {
                    kind: 'range',
                    range: { start: period.start, end: period.end },
                    fragment: phrase,
                    description: period.description,
                    relative: true
                };
            }
        }

        return null;
    }

    private explicit(range: DateRange, fragment: string): DateParseOutcome {
        return {
            kind: 'range',
            range,
            fragment,
            description: `Created between ${range.start} and ${range.end}`,
            relative: false
        };
    }

    private calendarRange(fragment: string, start: [number, number, number], end: [number, number, number]): DateParseOutcome {
        if (!isValidCalendarDate(...start)) {
            return { kind: 'invalid', fragment, detail: `${formatDate(...start)} is not a calendar date` };
        }
        if (!isValidCalendarDate(...end)) {
            return { kind: 'invalid', fragment, detail: `${formatDate(...end)} is not a calendar date` };
        }
        const range = { start: formatDate(...start), end: formatDate(...end) };
        if (range.start > range.end) {
            return { kind: 'invalid', fragment, detail: 'the range ends before it starts' };
        }
        return this.explicit(range, fragment);
    }

    private month(name: string | undefined): number {
        return name ? MONTHS[name.toLowerCase()] ?? 0 : 0;
    }

    private group(match: RegexMatch, index: number): number {
        return Number(match.groups[index] ?? NaN);
    }
}
