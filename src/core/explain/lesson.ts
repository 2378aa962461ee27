// CHANGE: Long-form explanation of why singular keys break the cipher, for the `lesson` command
// PURITY: CORE
// INVARIANT: Text depends only on the modulus

import { primeFactors } from "../matrix/arithmetic.js";

export interface LessonSection {
	readonly title: string;
	readonly lines: ReadonlyArray<string>;
}

const factorization = (n: number, primes: ReadonlyArray<number>): string => {
	if (primes.length === 1 && primes[0] === n) return `${n} (prime)`;
	const parts: number[] = [];
	let rest = n;
	for (const p of primes) {
		while (rest % p === 0) {
			parts.push(p);
			rest /= p;
		}
	}
	return parts.join(" × ");
};

/**
 * Lesson sections for a given modulus.
 *
 * @pure true
 * @postcondition result.length === 5
 */
export function lessonFor(modulus: number): ReadonlyArray<LessonSection> {
	const factors = primeFactors(modulus);
	const factorText = factorization(modulus, factors);
	const badDeterminants = factors
		.flatMap((p) => [p, 2 * p])
		.filter((d, i, all) => d < modulus && all.indexOf(d) === i)
		.sort((a, b) => a - b);

	return [
		{
			title: "Linear algebra",
			lines: [
				"A singular matrix has determinant zero and no inverse.",
				"Encryption computes C = K × P; decryption needs P = K⁻¹ × C.",
				"Without K⁻¹ there is no way back from the ciphertext to the plaintext.",
			],
		},
		{
			title: "Information",
			lines: [
				"A singular key squeezes n-dimensional blocks into a lower-dimensional space.",
				"Its nullity counts the directions that are lost.",
				"Different plaintext blocks then encrypt to the same ciphertext block, so no decryption can be unique.",
			],
		},
		{
			title: "Geometry",
			lines: [
				"An invertible key maps the plane onto itself one-to-one; the unit square becomes a parallelogram of area |det|.",
				"A singular key flattens the unit square onto a line or a point.",
			],
		},
		{
			title: `Working modulo ${modulus}`,
			lines: [
				`All cipher arithmetic happens in Z_${modulus}, and ${modulus} = ${factorText}.`,
				`A key needs det mod ${modulus} to have an inverse in Z_${modulus}, i.e. gcd(det mod ${modulus}, ${modulus}) = 1.`,
				`A non-zero determinant is not enough: determinants sharing a factor with ${modulus}${badDeterminants.length > 0 ? ` (such as ${badDeterminants.join(", ")})` : ""} fail too.`,
			],
		},
		{
			title: "Summary",
			lines: [
				"A usable key must be non-singular (det ≠ 0).",
				`Its determinant must also be coprime with ${modulus}.`,
				"Singular keys give a many-to-one mapping that destroys information.",
			],
		},
	];
}
