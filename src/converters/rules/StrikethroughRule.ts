import { Rule } from './Rule';
import { Span } from '../spanUtils';
import { findDelimitedSpans } from './delimiterPairs';

/**
 * `--text--` → `~~text~~`
 */
export class StrikethroughRule extends Rule {
	readonly name = 'strikethrough';
	private readonly DELIMITER_PATTERN = /--/g;

	findRanges(line: string): Span[] {
		return findDelimitedSpans(line, this.DELIMITER_PATTERN);
	}

	transform(old: string): string {
		return `~~${old.slice(2, -2)}~~`;
	}
}
