/**
 * Half-open index ranges over a single line of text.
 */

/**
 * A `[lo, hi)` character range into a specific string.
 */
export interface Span {
	lo: number;
	hi: number;
}

/**
 * Check whether two spans overlap or touch.
 *
 * Boundaries are inclusive, so a span ending at `n` intersects a span
 * starting at `n`, and a zero-width span at either edge intersects too.
 */
export function rangesIntersect(a: Span, b: Span): boolean {
	return a.hi >= b.lo && b.hi >= a.lo;
}

/**
 * The span covering the whole of `text`.
 */
export function wholeSpan(text: string): Span {
	return { lo: 0, hi: text.length };
}

/**
 * Span of a regex match, as reported by `matchAll`/`exec`.
 */
export function matchSpan(match: RegExpMatchArray): Span {
	const lo = match.index ?? 0;
	return { lo, hi: lo + match[0].length };
}
