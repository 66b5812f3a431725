import { Span } from '../spanUtils';

/**
 * Replace every `spans` substring of `line` with `transform(substring)`.
 *
 * Spans must be sorted by start offset and must not overlap. Text between
 * spans is copied through untouched, so each character of `line` ends up
 * either in the output verbatim or in exactly one `transform` input.
 *
 * @example
 * ```typescript
 * morphSpans('a //b// c', [{ lo: 2, hi: 7 }], old => `_${old.slice(2, -2)}_`);
 * // 'a _b_ c'
 * ```
 */
export function morphSpans(line: string, spans: Span[], transform: (old: string) => string): string {
	if (spans.length === 0) {
		return line;
	}

	const bounds: Span[] = [{ lo: 0, hi: 0 }, ...spans, { lo: line.length, hi: line.length }];
	let output = line.slice(bounds[0].hi, bounds[1].lo);

	for (let i = 1; i < bounds.length - 1; i++) {
		const current = bounds[i];
		const next = bounds[i + 1];
		output += transform(line.slice(current.lo, current.hi));
		output += line.slice(current.hi, next.lo);
	}

	return output;
}

/**
 * A single rewrite unit of the conversion pipeline.
 *
 * Subclasses say where their construct occurs (`findRanges`) and what each
 * occurrence becomes (`transform`); `apply` stitches the two together.
 * Some rules keep state between lines, so an instance belongs to one document.
 */
export abstract class Rule {
	/** Name used in logs and pipeline introspection */
	abstract readonly name: string;

	/**
	 * Sorted, non-overlapping ranges of `line` that should be rewritten.
	 */
	abstract findRanges(line: string): Span[];

	/**
	 * Rewrite one matched substring.
	 */
	abstract transform(old: string): string;

	/**
	 * Run the rule over one line.
	 */
	apply(line: string): string {
		return morphSpans(line, this.findRanges(line), old => this.transform(old));
	}
}
