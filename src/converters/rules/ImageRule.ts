import { Rule } from './Rule';
import { Span, matchSpan } from '../spanUtils';

/**
 * `[""file:///path/pic"".png]` → `![](file:///path/pic.png)`
 */
export class ImageRule extends Rule {
	readonly name = 'image';
	private readonly IMAGE_PATTERN = /\[""(file:\/\/.*?)""\.(jpg|tif|png|gif)\]/g;
	private readonly SINGLE_IMAGE_PATTERN = /^\[""(file:\/\/.*)""\.(jpg|tif|png|gif)\]$/;

	findRanges(line: string): Span[] {
		return Array.from(line.matchAll(this.IMAGE_PATTERN)).map(matchSpan);
	}

	transform(old: string): string {
		const match = old.match(this.SINGLE_IMAGE_PATTERN);
		if (!match) {
			return old;
		}
		const [, url, extension] = match;
		return `![](${url}.${extension})`;
	}
}
