import { Rule } from './Rule';
import { Span } from '../spanUtils';
import { findDelimitedSpans } from './delimiterPairs';

/**
 * `//text//` → `_text_`
 */
export class ItalicsRule extends Rule {
	readonly name = 'italics';
	private readonly DELIMITER_PATTERN = /\/\//g;

	findRanges(line: string): Span[] {
		return findDelimitedSpans(line, this.DELIMITER_PATTERN);
	}

	transform(old: string): string {
		return `_${old.slice(2, -2)}_`;
	}
}
