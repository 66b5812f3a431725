import { Rule } from './Rule';
import { occursInUrl } from '../contextGuards';
import { Span, matchSpan } from '../spanUtils';

/**
 * Double-backtick monospace (` ``code`` `) → single-backtick inline code.
 */
export class BacktickRule extends Rule {
	readonly name = 'backtick';
	private readonly DOUBLE_BACKTICK_PATTERN = /``.*?``/g;

	findRanges(line: string): Span[] {
		return Array.from(line.matchAll(this.DOUBLE_BACKTICK_PATTERN))
			.map(matchSpan)
			.filter(span => !occursInUrl(span, line));
	}

	transform(old: string): string {
		return old.slice(1, -1);
	}
}
