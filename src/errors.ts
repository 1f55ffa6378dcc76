export type PlatformErrorCode =
	| "NotFound"
	| "QuorumNotMet"
	| "AlreadyRegistered"
	| "InvalidUsername"
	| "Unauthorized"
	| "InsufficientBalance"
	| "InsufficientAllowance"
	| "NothingToWithdraw"
	| "NoLikesToHarvest"
	| "DivisionByZero"
	| "NoStrikes"
	| "NotEliminable"
	| "ContentEliminable"
	| "InvalidTimestamp"
	| "InvalidInput";

/**
 * A rejected ledger operation. Thrown synchronously; the enclosing
 * workflow transaction is rolled back and nothing is retried.
 */
export class PlatformError extends Error {
	constructor(
		public readonly code: PlatformErrorCode,
		message: string,
	) {
		super(message);
		this.name = "PlatformError";
	}
}

export function isPlatformError(err: unknown, code?: PlatformErrorCode): err is PlatformError {
	return err instanceof PlatformError && (code === undefined || err.code === code);
}
