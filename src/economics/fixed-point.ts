/** Implicit scale of every fixed-point quantity: 18 decimals. */
export const SCALE = 10n ** 18n;

const WORD = 1n << 256n;

/**
 * Subtraction modulo 2^256. Callers detect underflow by checking whether
 * the result exceeds the minuend.
 */
export function wrappingSub256(a: bigint, b: bigint): bigint {
	return (((a - b) % WORD) + WORD) % WORD;
}

/**
 * Floor of the square root of a non-negative bigint (Newton iteration).
 */
export function isqrt(value: bigint): bigint {
	if (value < 0n) {
		throw new RangeError("isqrt of a negative number");
	}
	if (value < 2n) return value;

	let x = value;
	let y = (x + 1n) / 2n;
	while (y < x) {
		x = y;
		y = (x + value / x) / 2n;
	}
	return x;
}
