import { Rule } from './Rule';
import { Span, wholeSpan } from '../spanUtils';

/**
 * Turns the first line this instance sees into a top-level header.
 */
export class FirstLineHeaderRule extends Rule {
	readonly name = 'first-line-header';
	private pastFirstLine = false;

	findRanges(line: string): Span[] {
		if (this.pastFirstLine) {
			return [];
		}
		this.pastFirstLine = true;
		return [wholeSpan(line)];
	}

	transform(old: string): string {
		return `# ${old}`;
	}
}
