import { Rule } from './Rule';
import { Span, wholeSpan } from '../spanUtils';

/**
 * Converts symmetric `=` headers into `#` headers.
 *
 * `=Title=` is level one, `==Title==` level two and so on. The emitted
 * depth is `padding + level`, which lets the caller reserve `#` for the day
 * heading and push entry headers one level down.
 */
export class HeaderRule extends Rule {
	readonly name = 'header';

	constructor(private readonly padding: number = 0) {
		super();
	}

	findRanges(line: string): Span[] {
		const leading = this.countEquals(line, /^=*/);
		const trailing = this.countEquals(line, /=*$/);

		// Whole line of '=' (or empty) has no inner text
		if (leading === line.length) {
			return [];
		}
		if (leading > 0 && leading === trailing) {
			return [wholeSpan(line)];
		}
		return [];
	}

	transform(old: string): string {
		const level = this.countEquals(old, /^=*/);
		return '#'.repeat(this.padding + level) + ' ' + old.slice(level, -level);
	}

	private countEquals(text: string, run: RegExp): number {
		const match = text.match(run);
		return match ? match[0].length : 0;
	}
}
