/**
 * RedNotebook-to-Markdown conversion pipeline.
 *
 * This module owns the ordered list of rewrite rules and folds each line of
 * an entry through them. Each rule only sees the output of the rules before
 * it:
 *
 * 0. First line to header (optional)
 * 1. Headers (`=Title=` → `## Title`)
 * 2. Images (`[""file://pic"".png]`), before links since both use `[""`
 * 3. Links (`[name ""url""]`), so later rules see finished `[name](url)` links
 * 4. Double backticks, so the code guard sees single-backtick spans
 * 5. Italics (`//text//`)
 * 6. List numbering (`+ item`)
 * 7. Strikethrough (`--text--`)
 * 8. Underscore escaping (optional, on by default)
 *
 * List numbering and the first-line header keep state from line to line.
 * A converter therefore belongs to one document: create a new one for
 * every entry instead of reusing it.
 */

import { Rn2mdSettings, DEFAULT_SETTINGS } from '../core/settings';
import {
	Rule,
	BacktickRule,
	EscapeUnderscoreRule,
	FirstLineHeaderRule,
	HeaderRule,
	ImageRule,
	ItalicsRule,
	LinkRule,
	ListRule,
	StrikethroughRule
} from './rules';

/**
 * Settings the converter reads. Any omitted field takes its default.
 */
export type ConverterOptions = Partial<Pick<Rn2mdSettings, 'headerPadding' | 'firstLineAsHeader' | 'escapeUnderscores'>>;

/**
 * Build the default rule sequence for one document.
 */
export function createDefaultRules(options: ConverterOptions = {}): Rule[] {
	const {
		headerPadding = DEFAULT_SETTINGS.headerPadding,
		firstLineAsHeader = DEFAULT_SETTINGS.firstLineAsHeader,
		escapeUnderscores = DEFAULT_SETTINGS.escapeUnderscores
	} = options;

	const rules: Rule[] = [];
	if (firstLineAsHeader) {
		rules.push(new FirstLineHeaderRule());
	}
	rules.push(
		new HeaderRule(headerPadding),
		new ImageRule(),
		new LinkRule(),
		new BacktickRule(),
		new ItalicsRule(),
		new ListRule(),
		new StrikethroughRule()
	);
	if (escapeUnderscores) {
		rules.push(new EscapeUnderscoreRule());
	}
	return rules;
}

/**
 * Converts RedNotebook markup to Markdown one line at a time.
 *
 * @example
 * ```typescript
 * const converter = new RednotebookConverter({ headerPadding: 1 });
 * converter.convertLine('=Plans=');          // '## Plans'
 * converter.convertLine('+ buy //milk//');    // '1. buy _milk_'
 * converter.convertLine('+ call mum');        // '2. call mum'
 * ```
 */
export class RednotebookConverter {
	private readonly rules: Rule[];

	/**
	 * @param options - Converter settings, or an explicit rule sequence
	 */
	constructor(options: ConverterOptions | Rule[] = {}) {
		this.rules = Array.isArray(options) ? [...options] : createDefaultRules(options);
	}

	/**
	 * Run one line through every rule in order.
	 */
	public convertLine(line: string): string {
		return this.rules.reduce((current, rule) => rule.apply(current), line);
	}

	/**
	 * Convert multi-line entry text.
	 *
	 * Lines are right-trimmed before conversion; trailing whitespace would
	 * otherwise defeat the header rule's symmetry check.
	 */
	public convertText(text: string): string {
		return text
			.split('\n')
			.map(line => this.convertLine(line.trimEnd()))
			.join('\n');
	}

	/**
	 * Names of the rules, in the order they run.
	 */
	public getRules(): string[] {
		return this.rules.map(rule => rule.name);
	}
}
