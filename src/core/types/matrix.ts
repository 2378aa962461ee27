// CHANGE: Matrix and vector shapes shared by every core module
// PURITY: CORE
// INVARIANT: Rows are never mutated after construction

/**
 * Row of integers. Used both as a matrix row and as a plaintext/cipher block.
 */
export type Vector = ReadonlyArray<number>;

/**
 * Square grid of integers, row-major.
 *
 * @invariant ∀ row: row.length === matrix.length (checked by validateKey)
 * @invariant ∀ entry: Number.isSafeInteger(entry)
 */
export type Matrix = ReadonlyArray<Vector>;
