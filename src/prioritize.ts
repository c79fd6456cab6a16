import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { Readable, Writable } from "node:stream";
import { AvlTree } from "./avl-tree";
import { AsyncLess } from "./ordering";

export type Ask = (question: string) => Promise<string>;

/** Splits text into items: one per line, trimmed, blank lines dropped. */
export function parseItems(text: string): string[] {
	return text.split(/\r?\n/)
		.map(line => line.trim())
		.filter(line => line !== "");
}

/**
 * A comparison that asks a person which of two items has higher priority, repeating until the answer is "a" or "b".
 * "a" (the item being placed is more important) counts as less, so in-order traversal runs from highest priority to lowest.
 */
export function promptLess(ask: Ask, write: (line: string) => void): AsyncLess<string> {
	return async (a, b) => {
		for (;;) {
			const choice = (await ask(`\na) ${a}\nb) ${b}\nWhich is higher priority? [a, b] > `)).trim().toLowerCase();
			if (choice === "a") {
				return true;
			} else if (choice === "b") {
				return false;
			}
			write(`Invalid choice, must be "a" or "b", try again`);
		}
	};
}

/** Inserts the items one at a time, in the given order. */
export async function prioritize(items: readonly string[], less: AsyncLess<string>): Promise<AvlTree<string>> {
	const tree = new AvlTree<string>();
	for (const item of items) {
		await tree.insertAsync(item, less);
	}
	return tree;
}

/**
 * The prioritize command: sorts the items in the file named by args[0], reading answers line by line from input.
 * @returns the exit code.
 * @throws Error if the file has no items or input ends before every comparison is answered.
 */
export async function run(args: readonly string[], input: Readable, output: Writable, errors: Writable): Promise<number> {
	const [file] = args;
	if (!file) {
		errors.write("Usage: prioritize <file>\n");
		return 1;
	}

	const items = parseItems(await readFile(file, "utf8"));
	if (!items.length) {
		throw new Error(`No items to prioritize in ${file}`);
	}

	// One iterator for the whole session, so answers that arrive before their question are queued rather than dropped
	const rl = createInterface({ input, terminal: false });
	const lines = rl[Symbol.asyncIterator]();
	const write = (text: string) => { output.write(text); };
	try {
		const ask: Ask = async question => {
			write(question);
			const line = await lines.next();
			if (line.done) {
				throw new Error("Input ended before sorting finished");
			}
			return line.value;
		};
		const tree = await prioritize(items, promptLess(ask, line => write(line + "\n")));
		write("You're done sorting! Hit enter for the output (highest priority to lowest)\n");
		await lines.next();	// end of input here only skips the pause
		tree.traverse(item => write(item + "\n"));
	} finally {
		rl.close();
	}
	return 0;
}
