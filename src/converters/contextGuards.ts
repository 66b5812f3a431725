import { Span, matchSpan, rangesIntersect } from './spanUtils';

/**
 * Scheme, host (domain labels or dotted quad) and optional port of a URL literal.
 * The path is deliberately not part of the match.
 */
export const URL_PATTERN = new RegExp(
	'(?:http|file|ftp)s?://' +
	'(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\\.)+' +
	'(?:[A-Z]{2,6}\\.?|[A-Z0-9-]{2,}\\.?)|' +
	'\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3})' +
	'(?::\\d+)?',
	'gi'
);

/** An already converted Markdown link: `[name](target)` */
export const LINK_PATTERN = /\[.*?\]\(.*?\)/g;

/** Inline code between single backticks */
export const BACKTICK_PATTERN = /`.*?`/g;

function intersectsAny(span: Span, line: string, patterns: RegExp[]): boolean {
	// matchAll clones the regex, so lastIndex on the shared patterns is never touched
	return patterns.some(pattern =>
		Array.from(line.matchAll(pattern)).some(match => rangesIntersect(span, matchSpan(match)))
	);
}

/**
 * Check if `span` falls on a URL literal or an existing Markdown link in `line`.
 */
export function occursInUrl(span: Span, line: string): boolean {
	return intersectsAny(span, line, [URL_PATTERN, LINK_PATTERN]);
}

/**
 * Check if `span` falls on an inline code span in `line`.
 */
export function occursInBacktick(span: Span, line: string): boolean {
	return intersectsAny(span, line, [BACKTICK_PATTERN]);
}

/**
 * Both guards together; what most inline rules consult before accepting a match.
 */
export function isGuarded(span: Span, line: string): boolean {
	return occursInUrl(span, line) || occursInBacktick(span, line);
}
