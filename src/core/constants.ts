/**
 * Global constants for rn2md.
 *
 * This module defines the fixed values used across the converter and the
 * journal tooling:
 * - Where RedNotebook keeps its month archives and how they are named
 * - How day-blocks are headed and separated in the output
 * - Environment variables read by the settings layer
 *
 * All constants are declared `as const` so their literal types flow into
 * the code that uses them.
 */

/**
 * RedNotebook journal storage layout.
 *
 * RedNotebook writes one YAML file per month into its data directory:
 * ```
 * ~/.rednotebook/data/
 * ├── 2024-01.txt
 * ├── 2024-02.txt
 * └── ...
 * ```
 *
 * @property DEFAULT_DATA_DIR - Data directory, `~` is expanded at load time
 * @property MONTH_FILE_PATTERN - File name of a month archive, capturing year and month
 */
export const JOURNAL_CONSTANTS = {
	DEFAULT_DATA_DIR: '~/.rednotebook/data',
	MONTH_FILE_PATTERN: /^(\d{4})-(\d{2})\.txt$/
} as const;

/**
 * Output layout for rendered journal days.
 *
 * A day-block is `# Jan 05, 2024` followed by the converted entry text.
 * Consecutive day-blocks are separated by two blank lines so downstream
 * consumers can split sections on blank-line runs.
 *
 * @property DAY_SEPARATOR - Text between two day-blocks
 * @property DAY_HEADING_PREFIX - Prefix of the heading line of a day-block
 * @property DEFAULT_HEADER_PADDING - Extra `#` added to entry headers, keeping them below the day heading
 */
export const OUTPUT_CONSTANTS = {
	DAY_SEPARATOR: '\n\n\n',
	DAY_HEADING_PREFIX: '# ',
	DEFAULT_HEADER_PADDING: 1
} as const;

/** Abbreviated month names for `Jan 05, 2024` style headings */
export const MONTH_ABBREVIATIONS = [
	'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
	'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'
] as const;

/**
 * Environment variables consulted by `resolveSettings`.
 */
export const ENV_VARS = {
	DATA_DIR: 'RN2MD_DATA_DIR',
	HEADER_PADDING: 'RN2MD_HEADER_PADDING'
} as const;

/**
 * Process exit codes used by the command line entry point.
 */
export const EXIT_CODES = {
	SUCCESS: 0,
	FAILURE: 1,
	USAGE: 2
} as const;
