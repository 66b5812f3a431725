/**
 * Renders journal days as Markdown day-blocks.
 *
 * A day-block is the heading line `# Jan 05, 2024` followed by the
 * converted entry. Each day gets its own converter, so list numbering and
 * the first-line header start fresh every day.
 */

import { DEFAULT_SETTINGS, Rn2mdSettings } from '../core/settings';
import { OUTPUT_CONSTANTS } from '../core/constants';
import { RednotebookConverter } from '../converters/RednotebookConverter';
import { JournalDate, formatDayHeading } from './dateUtils';
import { JournalStore } from './JournalStore';

export type FormatSettings = Pick<Rn2mdSettings, 'headerPadding' | 'firstLineAsHeader' | 'escapeUnderscores' | 'daySeparator'>;

/**
 * Format one day's entry.
 *
 * @example
 * ```typescript
 * formatDay('2024-01-05', '=Plans=\n+ write');
 * // '# Jan 05, 2024\n## Plans\n1. write'
 * ```
 */
export function formatDay(date: JournalDate, text: string, settings: Partial<FormatSettings> = {}): string {
	const converter = new RednotebookConverter({
		headerPadding: settings.headerPadding,
		firstLineAsHeader: settings.firstLineAsHeader,
		escapeUnderscores: settings.escapeUnderscores
	});

	const heading = OUTPUT_CONSTANTS.DAY_HEADING_PREFIX + formatDayHeading(date);
	const body = converter.convertText(text);
	return body ? `${heading}\n${body}` : heading;
}

/**
 * Format every date that has an entry, in the given order, separated by
 * the day separator. Dates without an entry are left out.
 */
export function formatDays(
	dates: JournalDate[],
	journal: JournalStore,
	settings: Partial<FormatSettings> = {}
): string {
	const separator = settings.daySeparator ?? DEFAULT_SETTINGS.daySeparator;
	const blocks: string[] = [];

	for (const date of dates) {
		const text = journal.get(date);
		if (text !== undefined) {
			blocks.push(formatDay(date, text, settings));
		}
	}

	return blocks.join(separator);
}
