import { isGuarded } from '../contextGuards';
import { Span, matchSpan } from '../spanUtils';

/**
 * Pair up unguarded occurrences of `delimiter` in order of appearance.
 *
 * The first occurrence opens, the second closes, the third opens again and
 * so on. Each pair yields one span from the opener's start to the closer's
 * end. An unpaired final delimiter is ignored.
 */
export function findDelimitedSpans(line: string, delimiter: RegExp): Span[] {
	const occurrences = Array.from(line.matchAll(delimiter))
		.map(matchSpan)
		.filter(span => !isGuarded(span, line));

	const spans: Span[] = [];
	for (let i = 0; i + 1 < occurrences.length; i += 2) {
		spans.push({ lo: occurrences[i].lo, hi: occurrences[i + 1].hi });
	}
	return spans;
}
