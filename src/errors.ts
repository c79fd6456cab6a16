/**
 * Thrown when a node's balance factor is in a state insertion can never produce.
 * The tree is corrupt (usually from an inconsistent ordering predicate) and should be discarded.
 */
export class BalanceError extends Error {
	constructor(
		message: string,
		public readonly balance: number,
	) {
		super(message);
		this.name = "BalanceError";
	}
}
