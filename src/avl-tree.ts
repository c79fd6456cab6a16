import { dumpLines } from "./dump";
import { BalanceError } from "./errors";
import { AvlNode, insertNode } from "./nodes";
import { AsyncLess, Less, replayLess } from "./ordering";
import { isOverweight, rebalance } from "./rotations";

/**
 * Height-balanced (AVL) binary search tree.
 * The ordering is not fixed by the tree; each insert takes the predicate to place the value with.
 * Use the same consistent predicate for every insert into a given tree, or the ordering is meaningless.
 * Equal values are kept (duplicates sort after existing equals).
 * @template T The type of values stored.
 */
export class AvlTree<T> {
	private _root?: AvlNode<T>;
	private _count = 0;
	private _version = 0;

	/** Root node, for inspection.  Do not modify the nodes directly. */
	get root(): AvlNode<T> | undefined {
		return this._root;
	}

	/** Number of values stored. */
	get count(): number {
		return this._count;
	}

	/** Adds a value to the tree, rebalancing as needed.  Invalidates any iterators in progress. */
	insert(value: T, less: Less<T>): void {
		if (!this._root) {
			this._root = new AvlNode(value);
		} else {
			insertNode(this._root, value, less);
			if (isOverweight(this._root)) {
				this._root = rebalance(this._root);
			}
		}
		++this._count;
		++this._version;
	}

	/**
	 * Adds a value using a predicate that may answer asynchronously.
	 * Comparisons are gathered first; the structural change happens only once all have been answered.
	 * The tree must not be mutated while this is pending; if it is, this throws and nothing is inserted.
	 */
	async insertAsync(value: T, less: AsyncLess<T>): Promise<void> {
		const version = this._version;
		const answers: boolean[] = [];
		let node = this._root;
		while (node) {
			const isLess = await less(value, node.value);
			if (version !== this._version) {
				throw new Error("Tree was mutated while awaiting a comparison");
			}
			answers.push(isLess);
			node = isLess ? node.left : node.right;
		}
		this.insert(value, replayLess(answers));
	}

	/** In-order walk; visits values ascending under the predicate the tree was built with. */
	traverse(visitor: (value: T) => void): void {
		traverseNode(this._root, visitor);
	}

	/** Iterates values in order.
	 * WARNING: mutation during iteration will result in an exception
	 */
	*ascending(): IterableIterator<T> {
		yield* this.internalWalk("left", "right");
	}

	/** Iterates values in reverse order.
	 * WARNING: mutation during iteration will result in an exception
	 */
	*descending(): IterableIterator<T> {
		yield* this.internalWalk("right", "left");
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this.ascending();
	}

	/** @returns the first value in order; undefined if empty. */
	first(): T | undefined {
		let node = this._root;
		while (node?.left) {
			node = node.left;
		}
		return node?.value;
	}

	/** @returns the last value in order; undefined if empty. */
	last(): T | undefined {
		let node = this._root;
		while (node?.right) {
			node = node.right;
		}
		return node?.value;
	}

	/** Computed (not stored) number of levels; 0 for an empty tree.  O(n). */
	height(): number {
		return measure(this._root);
	}

	/**
	 * Checks ordering and balance of every node against the given predicate.  O(n).
	 * @throws BalanceError if a balance is out of range or doesn't match the measured heights.
	 * @throws Error if a value is on the wrong side of an ancestor.
	 */
	validate(less: Less<T>): void {
		validateNode(this._root, less);
	}

	/** Writes the tree structure with balances, one line per node.  Diagnostic only. */
	dump(write: (line: string) => void = console.log, format?: (value: T) => string): void {
		for (const line of dumpLines(this._root, format)) {
			write(line);
		}
	}

	private *internalWalk(first: "left" | "right", second: "left" | "right"): IterableIterator<T> {
		const version = this._version;
		const stack: AvlNode<T>[] = [];
		let node = this._root;
		while (node || stack.length) {
			while (node) {
				stack.push(node);
				node = node[first];
			}
			const next = stack.pop();
			if (!next) {
				break;
			}
			yield next.value;
			if (version !== this._version) {
				throw new Error("Tree was mutated during iteration");
			}
			node = next[second];
		}
	}
}

function traverseNode<T>(node: AvlNode<T> | undefined, visitor: (value: T) => void) {
	if (!node) {
		return;
	}
	traverseNode(node.left, visitor);
	visitor(node.value);
	traverseNode(node.right, visitor);
}

function measure<T>(node: AvlNode<T> | undefined): number {
	return node ? 1 + Math.max(measure(node.left), measure(node.right)) : 0;
}

/** @returns the measured height of the subtree. */
function validateNode<T>(node: AvlNode<T> | undefined, less: Less<T>, lower?: { value: T }, upper?: { value: T }): number {
	if (!node) {
		return 0;
	}
	// Bounds are inclusive: a rotation can carry an equal value to the left of its twin
	if ((lower && less(node.value, lower.value)) || (upper && less(upper.value, node.value))) {
		throw new Error(`Value ${String(node.value)} is out of order`);
	}
	const leftHeight = validateNode(node.left, less, lower, { value: node.value });
	const rightHeight = validateNode(node.right, less, { value: node.value }, upper);
	const measured = rightHeight - leftHeight;
	if (node.balance !== measured || measured < -1 || measured > 1) {
		throw new BalanceError(`Value ${String(node.value)} has balance ${node.balance}; measured ${measured}`, node.balance);
	}
	return 1 + Math.max(leftHeight, rightHeight);
}
