/**
 * Command line handling for rn2md.
 *
 * Parses arguments, resolves the dates to print, loads the journal and
 * writes the rendered Markdown. All process access goes through
 * `CliEnvironment` so the runner can be driven from tests.
 */

import { parseArgs } from 'node:util';
import { EXIT_CODES } from '../core/constants';
import { ConversionErrorHandler, UsageError } from '../core/ConversionErrorHandler';
import { Rn2mdSettings, parseHeaderPadding, resolveSettings } from '../core/settings';
import { formatDays } from '../journal/DayFormatter';
import { JournalStore } from '../journal/JournalStore';
import {
	DATE_COMMANDS,
	DateCommand,
	JournalDate,
	datesForCommand,
	expandDateRange,
	parseDateRanges,
	parseJournalDate,
	todayDate
} from '../journal/dateUtils';

export const USAGE = `
Usage:
  rn2md [today]                        Print today's entry
  rn2md yesterday                      Print the previous workday's entry
  rn2md week                           Print this week's entries
  rn2md range -f YYYY-MM-DD -t YYYY-MM-DD
                                       Print entries within the date range
  rn2md ranges                         Read date pairs from stdin, print each range

Options:
  -f, --start <date>     First day of 'range'
  -t, --end <date>       Last day of 'range'
  --data-dir <dir>       RedNotebook data directory (default: ~/.rednotebook/data)
  --padding <n>          Extra '#' added to converted headers (default: 1)
  --first-line-header    Turn the first line of each entry into a header
  --no-escape            Do not escape underscores inside words
  --verbose              Log progress to stderr
  -h, --help             Show this help
`.trim();

/**
 * Everything the runner needs from the outside world.
 */
export interface CliEnvironment {
	env: NodeJS.ProcessEnv;
	now: () => Date;
	write: (text: string) => void;
	readStdin: () => Promise<string>;
	loadJournal: (dataDir: string) => Promise<JournalStore>;
}

/**
 * Parsed command line.
 */
export interface CliOptions {
	command: DateCommand | 'ranges';
	start?: JournalDate;
	end?: JournalDate;
	help: boolean;
	verbose: boolean;
	settings: Partial<Rn2mdSettings>;
}

function isCommand(value: string): value is CliOptions['command'] {
	return value === 'ranges' || DATE_COMMANDS.some(command => command === value);
}

function readArgs(argv: string[]) {
	try {
		return parseArgs({
			args: argv,
			allowPositionals: true,
			options: {
				start: { type: 'string', short: 'f' },
				end: { type: 'string', short: 't' },
				'data-dir': { type: 'string' },
				padding: { type: 'string' },
				'first-line-header': { type: 'boolean', default: false },
				'no-escape': { type: 'boolean', default: false },
				verbose: { type: 'boolean', default: false },
				help: { type: 'boolean', short: 'h', default: false }
			}
		});
	} catch (error) {
		// parseArgs throws TypeErrors for unknown options and missing values
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}
}

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws {UsageError} On unknown commands or options, or invalid values
 */
export function parseCliArgs(argv: string[]): CliOptions {
	const { values, positionals } = readArgs(argv);
	if (positionals.length > 1) {
		throw new UsageError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
	}

	const command = positionals[0] ?? 'today';
	if (!isCommand(command)) {
		throw new UsageError(`Unknown command: ${command}`);
	}

	const settings: Partial<Rn2mdSettings> = {};
	if (values['data-dir'] !== undefined) {
		settings.dataDir = values['data-dir'];
	}
	if (values.padding !== undefined) {
		const padding = parseHeaderPadding(values.padding);
		if (padding === undefined) {
			throw new UsageError(`Invalid padding: ${values.padding}`);
		}
		settings.headerPadding = padding;
	}
	if (values['first-line-header']) {
		settings.firstLineAsHeader = true;
	}
	if (values['no-escape']) {
		settings.escapeUnderscores = false;
	}

	return {
		command,
		start: values.start === undefined ? undefined : parseJournalDate(values.start),
		end: values.end === undefined ? undefined : parseJournalDate(values.end),
		help: values.help === true,
		verbose: values.verbose === true,
		settings
	};
}

/**
 * Runs one invocation of the command line tool.
 *
 * @example
 * ```typescript
 * const runner = new CommandRunner(nodeEnvironment());
 * process.exitCode = await runner.run(process.argv.slice(2));
 * ```
 */
export class CommandRunner {
	constructor(private readonly io: CliEnvironment) {}

	/**
	 * @returns The process exit code
	 */
	async run(argv: string[]): Promise<number> {
		try {
			const options = parseCliArgs(argv);
			if (options.help) {
				this.io.write(USAGE);
				return EXIT_CODES.SUCCESS;
			}
			await this.execute(options);
			return EXIT_CODES.SUCCESS;
		} catch (error) {
			if (error instanceof UsageError) {
				console.error(`rn2md: ${error.message}`);
				console.error(USAGE);
				return EXIT_CODES.USAGE;
			}
			ConversionErrorHandler.handleError({ operation: 'rn2md', error });
			return EXIT_CODES.FAILURE;
		}
	}

	private async execute(options: CliOptions): Promise<void> {
		const settings = resolveSettings(this.io.env, options.settings);
		const journal = await this.io.loadJournal(settings.dataDir);
		if (options.verbose) {
			console.info(`rn2md: loaded ${journal.size} entries from ${settings.dataDir}`);
		}

		for (const dates of await this.resolveDateGroups(options)) {
			const document = formatDays(dates, journal, settings);
			if (document) {
				this.io.write(document);
			} else if (options.verbose && dates.length > 0) {
				console.info(`rn2md: no entries between ${dates[0]} and ${dates[dates.length - 1]}`);
			}
		}
	}

	/**
	 * Each group of dates is printed as one document.
	 */
	private async resolveDateGroups(options: CliOptions): Promise<JournalDate[][]> {
		if (options.command === 'ranges') {
			const ranges = parseDateRanges(await this.io.readStdin());
			return ranges.map(([beg, end]) => expandDateRange(beg, end));
		}

		const today = todayDate(this.io.now());
		return [datesForCommand(options.command, today, { start: options.start, end: options.end })];
	}
}
