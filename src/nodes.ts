import { Less } from "./ordering";
import { isOverweight, rebalance } from "./rotations";

export type Side = "left" | "right";

export class AvlNode<T> {
	left?: AvlNode<T>;
	right?: AvlNode<T>;
	/** height(right) - height(left).  Only ever ±2 while an insert is in flight. */
	balance = 0;

	constructor(
		public value: T,
	) { }
}

/**
 * Inserts value into the subtree rooted at node.  Ties (less is false both ways) go right.
 * An overweight child is rebalanced here and its new root reattached, so node itself may be left at ±2 for its own caller to fix.
 * @returns true if the subtree's height grew and the caller must account for it.
 */
export function insertNode<T>(node: AvlNode<T>, value: T, less: Less<T>): boolean {
	const side: Side = less(value, node.value) ? "left" : "right";
	const step = side === "left" ? -1 : 1;
	const child = node[side];
	if (!child) {
		node[side] = new AvlNode(value);
		// The other child, if present, must be a lone leaf or the tree was already out of balance here
		node.balance = node[side === "left" ? "right" : "left"] ? 0 : step;
		return node.balance !== 0;
	}

	if (!insertNode(child, value, less)) {
		return false;
	}
	if (isOverweight(child)) {
		node[side] = rebalance(child);	// height-neutral
		return false;
	}
	node.balance += step;
	return node.balance !== 0;
}
