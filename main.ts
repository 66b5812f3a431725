#!/usr/bin/env node
/**
 * rn2md command line entry point.
 */

import { CliEnvironment, CommandRunner } from './src/cli/CommandRunner';
import { JournalStore } from './src/journal/JournalStore';
import { EXIT_CODES } from './src/core/constants';

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString('utf-8');
}

export function nodeEnvironment(): CliEnvironment {
	return {
		env: process.env,
		now: () => new Date(),
		write: text => {
			process.stdout.write(`${text}\n`);
		},
		readStdin,
		loadJournal: dataDir => JournalStore.load(dataDir)
	};
}

if (require.main === module) {
	new CommandRunner(nodeEnvironment())
		.run(process.argv.slice(2))
		.then(code => {
			process.exitCode = code;
		})
		.catch(error => {
			console.error('rn2md: unexpected failure:', error);
			process.exitCode = EXIT_CODES.FAILURE;
		});
}
