/**
 * Loads RedNotebook month archives into a date → entry text map.
 *
 * RedNotebook stores each month as `YYYY-MM.txt` in its data directory. The
 * file is YAML mapping day numbers to day records:
 * ```yaml
 * 5: {text: "=Plans=\n+ write //report//"}
 * 6: {text: "Quiet day."}
 * ```
 * Records may carry other keys (categories and so on); only `text` is read.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { load as loadYaml } from 'js-yaml';
import { JOURNAL_CONSTANTS } from '../core/constants';
import { ConversionErrorHandler } from '../core/ConversionErrorHandler';
import { JournalDate, toJournalDate } from './dateUtils';

/**
 * A month archive found in the data directory.
 */
export interface MonthArchive {
	filePath: string;
	year: number;
	month: number;
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(dirPath: string, homeDir: string = os.homedir()): string {
	if (dirPath === '~') {
		return homeDir;
	}
	if (dirPath.startsWith('~/')) {
		return path.join(homeDir, dirPath.slice(2));
	}
	return dirPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * List the month archives in `dataDir`, oldest first.
 *
 * Files that do not look like `YYYY-MM.txt`, or that name a month outside
 * 1-12, are skipped.
 */
export async function findMonthArchives(dataDir: string): Promise<MonthArchive[]> {
	const archives: MonthArchive[] = [];
	const fileNames = await fs.readdir(dataDir);

	for (const fileName of fileNames.sort()) {
		const match = fileName.match(JOURNAL_CONSTANTS.MONTH_FILE_PATTERN);
		if (!match) {
			continue;
		}
		const year = Number(match[1]);
		const month = Number(match[2]);
		if (month < 1 || month > 12) {
			console.warn(`Journal: skipping ${fileName}, month ${match[2]} is out of range`);
			continue;
		}
		archives.push({ filePath: path.join(dataDir, fileName), year, month });
	}

	return archives;
}

/**
 * Parse the YAML content of one month archive.
 *
 * Days that are out of range for the month or that have no string `text`
 * are skipped with a warning.
 *
 * @throws {Error} When the content is not valid YAML or not a mapping
 */
export function parseMonthArchive(content: string, year: number, month: number): Map<JournalDate, string> {
	const days = new Map<JournalDate, string>();
	const parsed: unknown = loadYaml(content);

	if (parsed === undefined || parsed === null) {
		return days;
	}
	if (!isRecord(parsed)) {
		throw new Error('month archive is not a mapping of days');
	}

	const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
	for (const [key, record] of Object.entries(parsed)) {
		const day = Number(key);
		if (!Number.isInteger(day) || day < 1 || day > daysInMonth) {
			console.warn(`Journal: skipping day '${key}' of ${toJournalDate(year, month, 1).slice(0, 7)}`);
			continue;
		}
		if (!isRecord(record) || typeof record.text !== 'string') {
			console.warn(`Journal: ${toJournalDate(year, month, day)} has no text`);
			continue;
		}
		days.set(toJournalDate(year, month, day), record.text);
	}

	return days;
}

/**
 * Read-only view of the journal: raw entry text by date.
 *
 * @example
 * ```typescript
 * const journal = await JournalStore.load('~/.rednotebook/data');
 * if (journal.has('2024-01-05')) {
 *   console.log(journal.get('2024-01-05'));
 * }
 * ```
 */
export class JournalStore {
	private readonly entries: Map<JournalDate, string>;

	constructor(entries: Map<JournalDate, string> | Record<JournalDate, string> = new Map()) {
		this.entries = entries instanceof Map ? new Map(entries) : new Map(Object.entries(entries));
	}

	/**
	 * Load every month archive in `dataDir`.
	 *
	 * A file that cannot be read or parsed is reported and skipped; the rest
	 * still load.
	 *
	 * @throws {Error} When `dataDir` itself cannot be listed
	 */
	static async load(dataDir: string): Promise<JournalStore> {
		const resolvedDir = expandHome(dataDir);
		const entries = new Map<JournalDate, string>();
		const batch = ConversionErrorHandler.createBatchTracker();

		for (const archive of await findMonthArchives(resolvedDir)) {
			try {
				const content = await fs.readFile(archive.filePath, 'utf-8');
				for (const [date, text] of parseMonthArchive(content, archive.year, archive.month)) {
					entries.set(date, text);
				}
				batch.recordSuccess();
			} catch (error) {
				batch.recordError(path.basename(archive.filePath), error);
			}
		}

		ConversionErrorHandler.handleBatchResult(batch.getResult(), 'Journal: loading month archives');
		return new JournalStore(entries);
	}

	has(date: JournalDate): boolean {
		return this.entries.has(date);
	}

	get(date: JournalDate): string | undefined {
		return this.entries.get(date);
	}

	/** All dates with an entry, sorted */
	dates(): JournalDate[] {
		return Array.from(this.entries.keys()).sort();
	}

	get size(): number {
		return this.entries.size;
	}
}
