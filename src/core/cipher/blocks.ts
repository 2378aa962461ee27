// CHANGE: Block partitioning and padding for the block transform
// FORMAT THEOREM: ∀xs, n > 0: flatten(chunk(pad(xs, n), n)) = pad(xs, n) ∧ |pad(xs, n)| mod n = 0
// PURITY: CORE
// INVARIANT: Padding only ever appends; the prefix equals the input
// COMPLEXITY: O(|xs|)

import type { Vector } from "../types/index.js";

/**
 * Appends `filler` until the length is a multiple of `size`.
 *
 * An empty input stays empty.
 *
 * @pure true
 * @precondition size >= 1
 */
export function padToBlock<T>(
	items: ReadonlyArray<T>,
	size: number,
	filler: T,
): ReadonlyArray<T> {
	const remainder = items.length % size;
	return remainder === 0
		? items
		: [...items, ...Array.from({ length: size - remainder }, () => filler)];
}

/**
 * Consecutive slices of `size` items; the last may be shorter.
 *
 * @pure true
 * @precondition size >= 1
 */
export function chunk<T>(
	items: ReadonlyArray<T>,
	size: number,
): ReadonlyArray<ReadonlyArray<T>> {
	const chunks: ReadonlyArray<T>[] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}

/**
 * Concatenates blocks in order.
 *
 * @pure true
 */
export const flattenBlocks = (blocks: ReadonlyArray<Vector>): Vector =>
	blocks.flat();
