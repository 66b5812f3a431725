import { Rule } from './Rule';
import { Span, matchSpan } from '../spanUtils';

/**
 * `[name ""url""]` → `[name](url)`
 */
export class LinkRule extends Rule {
	readonly name = 'link';
	private readonly LINK_PATTERN = /\[[^"].*?""\]/g;
	private readonly URL_OPENER_PATTERN = /\s""/;

	findRanges(line: string): Span[] {
		// Without a whitespace-separated `""` there is no name/url split to make
		return Array.from(line.matchAll(this.LINK_PATTERN))
			.filter(match => this.URL_OPENER_PATTERN.test(match[0]))
			.map(matchSpan);
	}

	transform(old: string): string {
		const opener = old.match(this.URL_OPENER_PATTERN);
		const openerStart = opener?.index ?? 0;
		const openerEnd = opener ? openerStart + opener[0].length : 0;

		const name = old.slice(1, openerStart).trim();
		const url = old.slice(openerEnd, old.length - 3).trim();
		return `[${name}](${escapeUrl(url)})`;
	}
}

/**
 * Backslash-escape characters that Markdown would read as emphasis.
 */
export function escapeUrl(url: string): string {
	return url.replace(/_/g, '\\_').replace(/\*/g, '\\*');
}
