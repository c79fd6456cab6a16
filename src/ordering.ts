/** Ordering predicate: true if a sorts before b.  Must be irreflexive and give the same answer for the same pair for a tree's lifetime. */
export type Less<T> = (a: T, b: T) => boolean;

/** A Less that may need to wait for its answer (e.g. asking a person). */
export type AsyncLess<T> = (a: T, b: T) => boolean | Promise<boolean>;

/** Uses the < operator. */
export const defaultLess = <T>(a: T, b: T) => a < b;

/** Adapts a three-way comparator (negative, zero, positive) to a Less. */
export function lessFromCompare<T>(compare: (a: T, b: T) => number): Less<T> {
	return (a, b) => compare(a, b) < 0;
}

export function reverseLess<T>(less: Less<T>): Less<T> {
	return (a, b) => less(b, a);
}

/**
 * Answers comparisons from a previously recorded list, in order, ignoring the operands.
 * Used to replay a descent whose answers were gathered asynchronously.
 */
export function replayLess<T>(answers: readonly boolean[]): Less<T> {
	let next = 0;
	return () => {
		if (next >= answers.length) {
			throw new Error("Replay exhausted: more comparisons requested than were recorded");
		}
		return answers[next++];
	};
}
