import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_SETTINGS, parseHeaderPadding, resolveSettings, settingsFromEnv } from '../src/core/settings';

describe('settings', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should default to the RedNotebook data directory and one level of padding', () => {
		expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
		expect(DEFAULT_SETTINGS.dataDir).toBe('~/.rednotebook/data');
		expect(DEFAULT_SETTINGS.headerPadding).toBe(1);
		expect(DEFAULT_SETTINGS.daySeparator).toBe('\n\n\n');
	});

	it('should read the environment', () => {
		expect(settingsFromEnv({ RN2MD_DATA_DIR: ' /srv/journal ', RN2MD_HEADER_PADDING: '2' })).toEqual({
			dataDir: '/srv/journal',
			headerPadding: 2
		});
	});

	it('should fall back to the default on an invalid padding', () => {
		const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

		expect(resolveSettings({ RN2MD_HEADER_PADDING: 'deep' }).headerPadding).toBe(1);
		expect(warnSpy).toHaveBeenCalledWith('Invalid RN2MD_HEADER_PADDING: deep. Using default: 1');
	});

	it('should let overrides win over the environment', () => {
		const settings = resolveSettings({ RN2MD_HEADER_PADDING: '2' }, { headerPadding: 0 });
		expect(settings.headerPadding).toBe(0);
	});

	it('should parse non-negative integer paddings only', () => {
		expect(parseHeaderPadding('3')).toBe(3);
		expect(parseHeaderPadding(' 0 ')).toBe(0);
		expect(parseHeaderPadding('-1')).toBeUndefined();
		expect(parseHeaderPadding('1.5')).toBeUndefined();
		expect(parseHeaderPadding('')).toBeUndefined();
	});
});
