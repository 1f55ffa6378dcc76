/**
 * Run `fn` and return what it threw; fails the test when nothing is thrown.
 */
export function thrownBy(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("expected function to throw");
}

/** Deterministic 32-byte hash for test data. */
export function hash(n: number): string {
	return `0x${n.toString(16).padStart(64, "0")}`;
}
