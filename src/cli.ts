#!/usr/bin/env node
import { runCli } from './commands/run.js';

const exitCode = await runCli(process.argv.slice(2), {
	stdout: (line) => {
		process.stdout.write(`${line}\n`);
	},
	stderr: (line) => {
		process.stderr.write(`${line}\n`);
	},
});
process.exitCode = exitCode;
