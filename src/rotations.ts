import { BalanceError } from "./errors";
import { AvlNode, Side } from "./nodes";

/*
 * All rotations take the root of the subtree to rotate and return the new subtree root.
 * The caller reattaches the result wherever the old root hung (parent slot or tree root).
 * These assume the shapes produced by insertion; deletion would need different balance bookkeeping.
 */

/** @returns true if the node's balance has reached ±2 and it must be rebalanced. */
export function isOverweight<T>(node: AvlNode<T>): boolean {
	return node.balance < -1 || node.balance > 1;
}

/**
 *     x                r
 *    / \              / \
 *   a   r     =>     x   c
 *      / \          / \
 *     b   c        a   b
 */
export function rotateLeft<T>(node: AvlNode<T>): AvlNode<T> {
	const right = childOf(node, "right");
	node.right = right.left;
	right.left = node;
	// A single rotation always leaves both subtrees at the same height
	node.balance = 0;
	right.balance = 0;
	return right;
}

/**
 *       x            l
 *      / \          / \
 *     l   c   =>   a   x
 *    / \              / \
 *   a   b            b   c
 */
export function rotateRight<T>(node: AvlNode<T>): AvlNode<T> {
	const left = childOf(node, "left");
	node.left = left.right;
	left.right = node;
	node.balance = 0;
	left.balance = 0;
	return left;
}

/** Left-heavy node whose left child is right-heavy: rotate the left child left, then the node right.
 * The single rotations zero every balance they touch; the true balances depend on which side of the pivot grew. */
export function rotateLeftRight<T>(node: AvlNode<T>): AvlNode<T> {
	const left = childOf(node, "left");
	const pivotBalance = childOf(left, "right").balance;
	node.left = rotateLeft(left);
	const root = rotateRight(node);
	node.balance = pivotBalance < 0 ? 1 : 0;
	left.balance = pivotBalance > 0 ? -1 : 0;
	return root;
}

/** Mirror of rotateLeftRight. */
export function rotateRightLeft<T>(node: AvlNode<T>): AvlNode<T> {
	const right = childOf(node, "right");
	const pivotBalance = childOf(right, "left").balance;
	node.right = rotateRight(right);
	const root = rotateLeft(node);
	node.balance = pivotBalance > 0 ? -1 : 0;
	right.balance = pivotBalance < 0 ? 1 : 0;
	return root;
}

/**
 * Restores balance to an overweight subtree following an insertion.  The result has the subtree's pre-insertion height.
 * @returns the new subtree root.
 * @throws BalanceError if the balances can't have come from an insertion into a balanced tree.
 */
export function rebalance<T>(node: AvlNode<T>): AvlNode<T> {
	if (node.balance === -2) {
		const leftBalance = node.left?.balance;
		if (leftBalance === -1) {
			return rotateRight(node);
		}
		if (leftBalance === 1) {
			return rotateLeftRight(node);
		}
		throw new BalanceError(`Unreachable left-heavy shape: left child balance ${leftBalance}`, node.balance);
	}
	if (node.balance === 2) {
		const rightBalance = node.right?.balance;
		if (rightBalance === 1) {
			return rotateLeft(node);
		}
		if (rightBalance === -1) {
			return rotateRightLeft(node);
		}
		throw new BalanceError(`Unreachable right-heavy shape: right child balance ${rightBalance}`, node.balance);
	}
	throw new BalanceError(`Node with balance ${node.balance} is not overweight`, node.balance);
}

function childOf<T>(node: AvlNode<T>, side: Side): AvlNode<T> {
	const child = node[side];
	if (!child) {
		throw new BalanceError(`Rotation requires a ${side} child`, node.balance);
	}
	return child;
}
