import { AvlNode } from "./nodes";

/**
 * Renders the structure under root, pre-order, one line per node: value and balance, indented by depth.
 * e.g. for a, b, c:
 * ```
 * b[0]
 * +L--a[0]
 * +R--c[0]
 * ```
 */
export function dumpLines<T>(root: AvlNode<T> | undefined, format: (value: T) => string = String): string[] {
	const lines: string[] = [];
	appendLines(root, 0, "", format, lines);
	return lines;
}

function appendLines<T>(node: AvlNode<T> | undefined, depth: number, marker: string, format: (value: T) => string, lines: string[]) {
	if (!node) {
		return;
	}
	const indent = depth > 0 ? " ".repeat((depth - 1) * 4) + "+" + marker + "--" : "";
	lines.push(`${indent}${format(node.value)}[${node.balance}]`);
	appendLines(node.left, depth + 1, "L", format, lines);
	appendLines(node.right, depth + 1, "R", format, lines);
}
