/**
 * Centralized error handling utilities for journal conversion.
 *
 * The rewrite core never fails; errors come from the edges: unreadable or
 * malformed month archives, bad dates on the command line, and I/O on
 * stdin/stdout. This module gives those a single place for message
 * formatting and console logging.
 */

/**
 * Result summary for operations that process many items (month archives).
 *
 * @property successful - Number of items processed
 * @property failed - Number of items that failed
 * @property errors - One `name: message` line per failure
 */
export interface BatchResult {
	successful: number;
	failed: number;
	errors: string[];
}

/**
 * Structured error information.
 *
 * @property fileName - Optional file the error relates to
 * @property operation - What was being attempted (e.g. "Loading month archive")
 * @property error - The error object or message
 * @property logLevel - Console level to log at (default: 'error')
 */
export interface ConversionError {
	fileName?: string;
	operation: string;
	error: unknown;
	logLevel?: 'error' | 'warn' | 'info';
}

/**
 * Bad command line input. The entry point maps it to the usage exit code.
 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

/**
 * Normalize anything thrown into a message string.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export class ConversionErrorHandler {
	/**
	 * Log an error at the requested level and return a message suitable for
	 * collecting into a report.
	 *
	 * @example
	 * ```typescript
	 * const message = ConversionErrorHandler.handleError({
	 *   fileName: '2024-01.txt',
	 *   operation: 'Journal: loading month archive',
	 *   error: new Error('bad indentation'),
	 *   logLevel: 'warn'
	 * });
	 * // message: '2024-01.txt: bad indentation'
	 * ```
	 */
	public static handleError(conversionError: ConversionError): string {
		const { fileName, operation, error, logLevel = 'error' } = conversionError;

		const message = errorMessage(error);
		const fullMessage = fileName ? `${fileName}: ${message}` : message;

		switch (logLevel) {
			case 'error':
				console.error(`${operation}:`, fullMessage);
				break;
			case 'warn':
				console.warn(`${operation}:`, fullMessage);
				break;
			case 'info':
				console.info(`${operation}:`, fullMessage);
				break;
		}

		return fullMessage;
	}

	/**
	 * Create a tracker for collecting successes and failures item by item.
	 *
	 * @example
	 * ```typescript
	 * const batch = ConversionErrorHandler.createBatchTracker();
	 * for (const file of files) {
	 *   try {
	 *     load(file);
	 *     batch.recordSuccess();
	 *   } catch (error) {
	 *     batch.recordError(file, error);
	 *   }
	 * }
	 * ConversionErrorHandler.handleBatchResult(batch.getResult(), 'Journal load');
	 * ```
	 */
	public static createBatchTracker(): {
		tracker: BatchResult;
		recordSuccess: () => void;
		recordError: (itemName: string, error: unknown) => void;
		getResult: () => BatchResult;
	} {
		const tracker: BatchResult = {
			successful: 0,
			failed: 0,
			errors: []
		};

		return {
			tracker,
			recordSuccess: () => {
				tracker.successful++;
			},
			recordError: (itemName: string, error: unknown) => {
				tracker.failed++;
				tracker.errors.push(`${itemName}: ${errorMessage(error)}`);
			},
			getResult: () => tracker
		};
	}

	/**
	 * Report a batch result. Failures are logged as warnings, one per line,
	 * after a summary; a clean batch logs nothing.
	 */
	public static handleBatchResult(result: BatchResult, operationDescription: string): void {
		const { successful, failed, errors } = result;
		if (failed === 0) {
			return;
		}

		console.warn(`${operationDescription}: ${successful} succeeded, ${failed} failed`);
		for (const error of errors) {
			console.warn(`  ${error}`);
		}
	}
}
