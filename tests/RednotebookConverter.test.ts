import { describe, it, expect } from 'vitest';
import { RednotebookConverter, createDefaultRules } from '../src/converters/RednotebookConverter';
import { ItalicsRule } from '../src/converters/rules';

describe('RednotebookConverter', () => {
	describe('rule order', () => {
		it('should run the default rules in order', () => {
			expect(new RednotebookConverter().getRules()).toEqual([
				'header',
				'image',
				'link',
				'backtick',
				'italics',
				'list',
				'strikethrough',
				'escape-underscore'
			]);
		});

		it('should honour the optional rules', () => {
			const names = new RednotebookConverter({ firstLineAsHeader: true, escapeUnderscores: false }).getRules();
			expect(names[0]).toBe('first-line-header');
			expect(names).not.toContain('escape-underscore');
		});

		it('should accept an explicit rule list', () => {
			const converter = new RednotebookConverter([new ItalicsRule()]);
			expect(converter.getRules()).toEqual(['italics']);
			expect(converter.convertLine('+ //a//')).toBe('+ _a_');
		});

		it('should build fresh rule instances on every call', () => {
			const first = createDefaultRules();
			const second = createDefaultRules();
			expect(first[0]).not.toBe(second[0]);
		});
	});

	describe('convertLine', () => {
		it('should convert headers with the default padding', () => {
			const converter = new RednotebookConverter();
			expect(converter.convertLine('=Title=')).toBe('## Title');
			expect(converter.convertLine('==Title==')).toBe('### Title');
		});

		it('should use the configured padding', () => {
			expect(new RednotebookConverter({ headerPadding: 0 }).convertLine('=Title=')).toBe('# Title');
		});

		it('should leave an existing Markdown link alone', () => {
			expect(new RednotebookConverter().convertLine('[x](http://a//b)')).toBe('[x](http://a//b)');
		});

		it('should convert a link and then italics after it', () => {
			const converter = new RednotebookConverter();
			expect(converter.convertLine('[Site ""http://ex.com/x_y""] and //it//'))
				.toBe('[Site](http://ex.com/x\\_y) and _it_');
		});

		it('should convert images before links see them', () => {
			expect(new RednotebookConverter().convertLine('[""file:///tmp/my_pic"".png]'))
				.toBe('![](file:///tmp/my_pic.png)');
		});

		it('should protect code unwrapped from double backticks', () => {
			expect(new RednotebookConverter().convertLine('run ``make_all`` then my_step'))
				.toBe('run `make_all` then my\\_step');
		});

		it('should skip underscore escaping when disabled', () => {
			expect(new RednotebookConverter({ escapeUnderscores: false }).convertLine('my_var')).toBe('my_var');
		});

		it('should pass malformed markup through', () => {
			const converter = new RednotebookConverter();
			expect(converter.convertLine('==lopsided=')).toBe('==lopsided=');
			expect(converter.convertLine('[broken ""http://ex.com"]')).toBe('[broken ""http://ex.com"]');
			expect(converter.convertLine('half //open')).toBe('half //open');
		});
	});

	describe('convertText', () => {
		it('should convert a whole entry keeping list state between lines', () => {
			const converter = new RednotebookConverter();
			const text = '=Plans=\n+ buy //milk//\n+ call_mum\n\n- maybe --not-- this\n+ done';

			expect(converter.convertText(text)).toBe(
				'## Plans\n1. buy _milk_\n2. call\\_mum\n\n- maybe ~~not~~ this\n3. done'
			);
		});

		it('should right-trim lines before converting', () => {
			expect(new RednotebookConverter().convertText('=Title=   \nnext  ')).toBe('## Title\nnext');
		});

		it('should prefix only the first line when asked', () => {
			const converter = new RednotebookConverter({ firstLineAsHeader: true });
			expect(converter.convertText('Summary\nsecond\nthird')).toBe('# Summary\nsecond\nthird');
		});

		it('should not leak list numbering between converters', () => {
			const first = new RednotebookConverter();
			const second = new RednotebookConverter();

			expect(first.convertText('+ a\n+ b')).toBe('1. a\n2. b');
			expect(second.convertText('+ a')).toBe('1. a');
		});
	});
});
