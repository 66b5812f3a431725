import { Rule } from './Rule';
import { Span } from '../spanUtils';

/**
 * Numbers `+` list items, keeping a separate counter per indentation depth.
 *
 * `+ item` becomes `N. item`; `- item` is left as a bullet but still takes
 * part in depth tracking. One non-list line (a blank separator, say) is
 * tolerated inside a list; a second consecutive one ends the list and all
 * counters start over.
 */
export class ListRule extends Rule {
	readonly name = 'list';
	private readonly ITEM_PATTERN = /^\s*([+-])\s/;

	/** Counter per depth; the last entry is the depth of the latest item */
	private history: number[] = [];
	private missedOne = false;

	findRanges(line: string): Span[] {
		const match = line.match(this.ITEM_PATTERN);
		if (!match) {
			this.recordMiss();
			return [];
		}

		const marker = match[1];
		const markerEnd = match[0].length - 1;
		this.resizeHistory(markerEnd);

		if (marker !== '+') {
			return [];
		}
		this.history[this.history.length - 1] += 1;
		return [{ lo: markerEnd - 1, hi: markerEnd }];
	}

	transform(): string {
		return `${this.history[this.history.length - 1]}.`;
	}

	/**
	 * Current counters, outermost first.
	 */
	getHistory(): readonly number[] {
		return this.history;
	}

	private recordMiss(): void {
		if (this.missedOne) {
			this.history = [];
		} else {
			this.missedOne = true;
		}
	}

	private resizeHistory(size: number): void {
		this.missedOne = false;
		const kept = this.history.slice(0, size);
		while (kept.length < size) {
			kept.push(0);
		}
		this.history = kept;
	}
}
