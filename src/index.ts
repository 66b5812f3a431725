// Conversion core
export { RednotebookConverter, createDefaultRules } from './converters/RednotebookConverter';
export type { ConverterOptions } from './converters/RednotebookConverter';
export {
	Rule,
	morphSpans,
	ItalicsRule,
	StrikethroughRule,
	HeaderRule,
	ListRule,
	LinkRule,
	ImageRule,
	BacktickRule,
	EscapeUnderscoreRule,
	FirstLineHeaderRule
} from './converters/rules';
export { rangesIntersect, wholeSpan } from './converters/spanUtils';
export type { Span } from './converters/spanUtils';
export { occursInUrl, occursInBacktick } from './converters/contextGuards';

// Journal
export { JournalStore, parseMonthArchive } from './journal/JournalStore';
export { formatDay, formatDays } from './journal/DayFormatter';
export {
	datesForCommand,
	expandDateRange,
	formatDayHeading,
	parseDateRanges
} from './journal/dateUtils';
export type { JournalDate, DateCommand } from './journal/dateUtils';

// Settings and errors
export { DEFAULT_SETTINGS, resolveSettings } from './core/settings';
export type { Rn2mdSettings } from './core/settings';
export { ConversionErrorHandler, UsageError } from './core/ConversionErrorHandler';
