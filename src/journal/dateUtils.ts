/**
 * Calendar helpers for selecting journal days.
 *
 * Dates are carried as `YYYY-MM-DD` strings, which are also the keys of
 * the journal store. Arithmetic goes through UTC so that no local timezone
 * or DST change can shift a day.
 */

import { MONTH_ABBREVIATIONS } from '../core/constants';
import { UsageError } from '../core/ConversionErrorHandler';

/** A calendar date in `YYYY-MM-DD` form */
export type JournalDate = string;

/** Calendar commands understood by the command line */
export type DateCommand = 'today' | 'yesterday' | 'week' | 'range';

export const DATE_COMMANDS: readonly DateCommand[] = ['today', 'yesterday', 'week', 'range'];

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

interface DateParts {
	year: number;
	month: number;
	day: number;
}

function pad(value: number, width: number): string {
	return String(value).padStart(width, '0');
}

/**
 * Build a journal date from its parts (month and day are 1-based).
 */
export function toJournalDate(year: number, month: number, day: number): JournalDate {
	return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

function parts(date: JournalDate): DateParts | undefined {
	const match = date.match(ISO_DATE_PATTERN);
	if (!match) {
		return undefined;
	}
	const [year, month, day] = [match[1], match[2], match[3]].map(Number);
	const utc = new Date(Date.UTC(year, month - 1, day));
	if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
		return undefined;
	}
	return { year, month, day };
}

/**
 * Check that `date` is `YYYY-MM-DD` and names a real calendar day.
 */
export function isValidDate(date: string): boolean {
	return parts(date) !== undefined;
}

/**
 * Validate user input as a journal date.
 *
 * @throws {UsageError} When `value` is not a valid `YYYY-MM-DD` date
 */
export function parseJournalDate(value: string): JournalDate {
	const trimmed = value.trim();
	if (!isValidDate(trimmed)) {
		throw new UsageError(`Not a valid date: '${value}'.`);
	}
	return trimmed;
}

function toUtcMs(date: JournalDate): number {
	const p = parts(date);
	if (!p) {
		throw new UsageError(`Not a valid date: '${date}'.`);
	}
	return Date.UTC(p.year, p.month - 1, p.day);
}

function fromUtcMs(ms: number): JournalDate {
	const d = new Date(ms);
	return toJournalDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
}

/**
 * Shift `date` by `days` (negative to go back).
 */
export function addDays(date: JournalDate, days: number): JournalDate {
	return fromUtcMs(toUtcMs(date) + days * DAY_MS);
}

/**
 * Day of week with Monday as 0 and Sunday as 6.
 */
export function weekday(date: JournalDate): number {
	return (new Date(toUtcMs(date)).getUTCDay() + 6) % 7;
}

/**
 * The local calendar date of `now`.
 */
export function todayDate(now: Date = new Date()): JournalDate {
	return toJournalDate(now.getFullYear(), now.getMonth() + 1, now.getDate());
}

/**
 * Every date from `beg` to `end`, both included. Empty when `end` precedes `beg`.
 */
export function expandDateRange(beg: JournalDate, end: JournalDate): JournalDate[] {
	const dates: JournalDate[] = [];
	const last = toUtcMs(end);
	for (let ms = toUtcMs(beg); ms <= last; ms += DAY_MS) {
		dates.push(fromUtcMs(ms));
	}
	return dates;
}

/**
 * The previous working day: Friday when `today` is a weekend day or a Monday.
 */
export function previousWorkday(today: JournalDate): JournalDate {
	const day = weekday(today);
	if (day === 0) {
		return addDays(today, -3);
	}
	if (day === 6) {
		return addDays(today, -2);
	}
	return addDays(today, -1);
}

/**
 * Monday to Sunday of the week containing `today`.
 */
export function currentWeek(today: JournalDate): JournalDate[] {
	const start = addDays(today, -weekday(today));
	return expandDateRange(start, addDays(start, 6));
}

/**
 * Resolve a calendar command to the list of dates it covers.
 *
 * @throws {UsageError} When `range` is missing a bound
 */
export function datesForCommand(
	command: DateCommand,
	today: JournalDate,
	range: { start?: JournalDate; end?: JournalDate } = {}
): JournalDate[] {
	switch (command) {
		case 'today':
			return [today];
		case 'yesterday':
			return [previousWorkday(today)];
		case 'week':
			return currentWeek(today);
		case 'range': {
			if (!range.start || !range.end) {
				throw new UsageError('The range command needs both --start and --end.');
			}
			return expandDateRange(range.start, range.end);
		}
	}
}

/**
 * Find `YYYY-MM-DD` dates in free text and pair them up in order.
 *
 * Each pair is returned earliest first. An unpaired final date is ignored.
 *
 * @throws {UsageError} When a date-shaped token is not a real date
 *
 * @example
 * ```typescript
 * parseDateRanges('2024-01-09 2024-01-02\n2024-02-01 2024-02-03');
 * // [['2024-01-02', '2024-01-09'], ['2024-02-01', '2024-02-03']]
 * ```
 */
export function parseDateRanges(text: string): Array<[JournalDate, JournalDate]> {
	const dates = Array.from(text.matchAll(/\d{4}-\d{2}-\d{2}/g), match => parseJournalDate(match[0]));

	const ranges: Array<[JournalDate, JournalDate]> = [];
	for (let i = 0; i + 1 < dates.length; i += 2) {
		const [beg, end] = [dates[i], dates[i + 1]].sort();
		ranges.push([beg, end]);
	}
	return ranges;
}

/**
 * Heading text for a day: `Jan 05, 2024`.
 */
export function formatDayHeading(date: JournalDate): string {
	const p = parts(date);
	if (!p) {
		return date;
	}
	return `${MONTH_ABBREVIATIONS[p.month - 1]} ${pad(p.day, 2)}, ${p.year}`;
}
