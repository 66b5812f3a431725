import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { CliEnvironment, CommandRunner, USAGE, parseCliArgs } from '../src/cli/CommandRunner';
import { JournalStore } from '../src/journal/JournalStore';
import { UsageError } from '../src/core/ConversionErrorHandler';

describe('CommandRunner', () => {
	let output: string[];
	let io: CliEnvironment;
	let loadJournal: Mock<(dataDir: string) => Promise<JournalStore>>;

	const journal = new JournalStore({
		'2024-01-08': 'Monday',
		'2024-01-09': 'Tuesday notes',
		'2024-01-10': '+ one'
	});

	beforeEach(() => {
		output = [];
		loadJournal = vi.fn(async (_dataDir: string) => journal);
		io = {
			env: {},
			// Wednesday
			now: () => new Date(2024, 0, 10, 9, 0),
			write: text => {
				output.push(text);
			},
			readStdin: async () => '',
			loadJournal
		};
		vi.spyOn(console, 'error').mockImplementation(() => {});
		vi.spyOn(console, 'info').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe('calendar commands', () => {
		it('should print today by default', async () => {
			const code = await new CommandRunner(io).run([]);

			expect(code).toBe(0);
			expect(output).toEqual(['# Jan 10, 2024\n1. one']);
		});

		it('should print the previous workday for yesterday', async () => {
			await new CommandRunner(io).run(['yesterday']);
			expect(output).toEqual(['# Jan 09, 2024\nTuesday notes']);
		});

		it('should print every entry of the week as one document', async () => {
			await new CommandRunner(io).run(['week']);
			expect(output).toEqual([
				'# Jan 08, 2024\nMonday\n\n\n# Jan 09, 2024\nTuesday notes\n\n\n# Jan 10, 2024\n1. one'
			]);
		});

		it('should print an explicit range', async () => {
			const code = await new CommandRunner(io).run(['range', '-f', '2024-01-09', '--end', '2024-01-10']);

			expect(code).toBe(0);
			expect(output).toEqual(['# Jan 09, 2024\nTuesday notes\n\n\n# Jan 10, 2024\n1. one']);
		});

		it('should print nothing when no day has an entry', async () => {
			const code = await new CommandRunner(io).run(['range', '-f', '2023-01-01', '-t', '2023-01-02']);

			expect(code).toBe(0);
			expect(output).toEqual([]);
		});
	});

	describe('ranges command', () => {
		it('should print one document per date pair read from stdin', async () => {
			io.readStdin = async () => '2024-01-08 2024-01-08\n2024-01-10 2024-01-09\n';

			await new CommandRunner(io).run(['ranges']);

			expect(output).toEqual([
				'# Jan 08, 2024\nMonday',
				'# Jan 09, 2024\nTuesday notes\n\n\n# Jan 10, 2024\n1. one'
			]);
		});
	});

	describe('settings', () => {
		it('should load the journal from the default data directory', async () => {
			await new CommandRunner(io).run([]);
			expect(loadJournal).toHaveBeenCalledWith('~/.rednotebook/data');
		});

		it('should prefer the flag over the environment', async () => {
			io.env = { RN2MD_DATA_DIR: '/srv/env-journal' };
			await new CommandRunner(io).run([]);
			expect(loadJournal).toHaveBeenLastCalledWith('/srv/env-journal');

			await new CommandRunner(io).run(['--data-dir', '/srv/flag-journal']);
			expect(loadJournal).toHaveBeenLastCalledWith('/srv/flag-journal');
		});

		it('should pass conversion flags through', async () => {
			await new CommandRunner(io).run(['yesterday', '--first-line-header']);
			expect(output).toEqual(['# Jan 09, 2024\n# Tuesday notes']);
		});

		it('should log progress when verbose', async () => {
			await new CommandRunner(io).run(['--verbose']);
			expect(console.info).toHaveBeenCalledWith('rn2md: loaded 3 entries from ~/.rednotebook/data');
		});
	});

	describe('errors', () => {
		it('should print usage for help', async () => {
			const code = await new CommandRunner(io).run(['--help']);

			expect(code).toBe(0);
			expect(output).toEqual([USAGE]);
			expect(loadJournal).not.toHaveBeenCalled();
		});

		it('should exit with the usage code on bad input', async () => {
			const runner = new CommandRunner(io);

			expect(await runner.run(['range', '-f', '2024-01-09'])).toBe(2);
			expect(await runner.run(['fortnight'])).toBe(2);
			expect(await runner.run(['--padding', 'x'])).toBe(2);
			expect(await runner.run(['range', '-f', '2024-02-30', '-t', '2024-03-01'])).toBe(2);
			expect(await runner.run(['--unknown'])).toBe(2);
			expect(console.error).toHaveBeenCalledWith('rn2md: Unknown command: fortnight');
		});

		it('should exit with the failure code when the journal cannot be loaded', async () => {
			io.loadJournal = async () => {
				throw new Error('ENOENT: no such directory');
			};

			const code = await new CommandRunner(io).run([]);

			expect(code).toBe(1);
			expect(console.error).toHaveBeenCalledWith('rn2md:', 'ENOENT: no such directory');
		});
	});
});

describe('parseCliArgs', () => {
	it('should default to today with no overrides', () => {
		expect(parseCliArgs([])).toEqual({
			command: 'today',
			start: undefined,
			end: undefined,
			help: false,
			verbose: false,
			settings: {}
		});
	});

	it('should collect overrides', () => {
		const options = parseCliArgs(['week', '--padding', '0', '--no-escape', '--data-dir', 'journal']);

		expect(options.command).toBe('week');
		expect(options.settings).toEqual({ headerPadding: 0, escapeUnderscores: false, dataDir: 'journal' });
	});

	it('should reject extra positionals', () => {
		expect(() => parseCliArgs(['today', 'now'])).toThrow(UsageError);
	});
});
