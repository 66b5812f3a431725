/**
 * Settings and configuration schema for rn2md.
 *
 * Settings are resolved in three layers, later layers winning:
 * 1. DEFAULT_SETTINGS
 * 2. Environment variables (see ENV_VARS)
 * 3. Explicit overrides, usually parsed from the command line
 *
 * Invalid values from the environment are reported and replaced by the
 * default rather than aborting the run.
 */

import { ENV_VARS, JOURNAL_CONSTANTS, OUTPUT_CONSTANTS } from './constants';

/**
 * Complete rn2md settings.
 *
 * @example
 * ```typescript
 * const settings = resolveSettings(process.env, { firstLineAsHeader: true });
 * const converter = new RednotebookConverter(settings);
 * ```
 */
export interface Rn2mdSettings {
	/**
	 * Directory holding the RedNotebook month archives.
	 * A leading `~` is expanded to the user's home directory.
	 */
	dataDir: string;

	/**
	 * Extra depth added to converted `=Header=` lines.
	 *
	 * With the default of 1, `=Title=` becomes `## Title`, leaving `#` to
	 * the day heading.
	 */
	headerPadding: number;

	/** Turn the first line of every entry into a `#` header */
	firstLineAsHeader: boolean;

	/** Escape underscores inside words */
	escapeUnderscores: boolean;

	/** Text placed between two rendered days */
	daySeparator: string;
}

export const DEFAULT_SETTINGS: Rn2mdSettings = {
	dataDir: JOURNAL_CONSTANTS.DEFAULT_DATA_DIR,
	headerPadding: OUTPUT_CONSTANTS.DEFAULT_HEADER_PADDING,
	firstLineAsHeader: false,
	escapeUnderscores: true,
	daySeparator: OUTPUT_CONSTANTS.DAY_SEPARATOR
};

/**
 * Parse a header padding value, accepting non-negative integers only.
 *
 * @returns The padding, or undefined when `value` is not a valid padding
 */
export function parseHeaderPadding(value: string): number | undefined {
	if (!/^\d+$/.test(value.trim())) {
		return undefined;
	}
	return Number.parseInt(value.trim(), 10);
}

/**
 * Read settings from environment variables.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<Rn2mdSettings> {
	const settings: Partial<Rn2mdSettings> = {};

	const dataDir = env[ENV_VARS.DATA_DIR];
	if (dataDir && dataDir.trim()) {
		settings.dataDir = dataDir.trim();
	}

	const padding = env[ENV_VARS.HEADER_PADDING];
	if (padding !== undefined && padding !== '') {
		const parsed = parseHeaderPadding(padding);
		if (parsed === undefined) {
			console.warn(`Invalid ${ENV_VARS.HEADER_PADDING}: ${padding}. Using default: ${DEFAULT_SETTINGS.headerPadding}`);
		} else {
			settings.headerPadding = parsed;
		}
	}

	return settings;
}

/**
 * Merge defaults, environment and explicit overrides into complete settings.
 */
export function resolveSettings(
	env: NodeJS.ProcessEnv = {},
	overrides: Partial<Rn2mdSettings> = {}
): Rn2mdSettings {
	return {
		...DEFAULT_SETTINGS,
		...settingsFromEnv(env),
		...overrides
	};
}
