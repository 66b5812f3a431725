import { Rule } from './Rule';
import { isGuarded } from '../contextGuards';
import { Span, matchSpan } from '../spanUtils';

/**
 * Escapes underscores inside words (`snake_case` → `snake\_case`) so they
 * are not read as emphasis.
 */
export class EscapeUnderscoreRule extends Rule {
	readonly name = 'escape-underscore';
	private readonly INNER_UNDERSCORE_PATTERN = /(?<=\w)_(?=\w)/g;

	findRanges(line: string): Span[] {
		return Array.from(line.matchAll(this.INNER_UNDERSCORE_PATTERN))
			.map(matchSpan)
			.filter(span => !isGuarded(span, line));
	}

	transform(): string {
		return '\\_';
	}
}
