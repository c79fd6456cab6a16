#!/usr/bin/env node
// Usage: prioritize <file>
// Reads one item per line, asks which of two items is more important until the list is ordered,
// then prints the items from highest priority to lowest.

import process from "node:process";
import { run } from "./prioritize";

run(process.argv.slice(2), process.stdin, process.stdout, process.stderr).then(
	code => { process.exitCode = code; },
	(err: unknown) => {
		process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
		process.exitCode = 1;
	},
);
