import { InvalidArgumentError } from "commander";
import { type ContentId, isContentType } from "../content/types.js";
import { formatTokenAmount } from "../utils.js";

/**
 * Parse a content reference written as `<type>:<index>` (e.g. `video:12`).
 */
export function parseContentIdArg(value: string): ContentId {
	const match = /^([a-z]+)[:#](\d+)$/.exec(value.trim());
	if (!match) {
		throw new InvalidArgumentError(`expected <type>:<index>, got "${value}"`);
	}
	const [, type, index] = match;
	if (!isContentType(type)) {
		throw new InvalidArgumentError(`unknown content type "${type}"`);
	}
	return { contentType: type, index: Number.parseInt(index, 10) };
}

/**
 * Parse a token amount in whole tokens with up to 18 decimals.
 */
export function parseTokenAmountArg(value: string): bigint {
	const match = /^(\d+)(?:\.(\d{1,18}))?$/.exec(value.trim());
	if (!match) {
		throw new InvalidArgumentError(`expected a token amount such as 12.5, got "${value}"`);
	}
	const [, whole, fraction = ""] = match;
	return BigInt(whole) * 10n ** 18n + BigInt(fraction.padEnd(18, "0"));
}

export function parsePositiveIntArg(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!Number.isSafeInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
	}
	return parsed;
}

/**
 * Pretty JSON with bigints rendered as decimal token amounts.
 */
export function toDisplayJson(value: unknown): string {
	return JSON.stringify(
		value,
		(_key, inner: unknown) => (typeof inner === "bigint" ? formatTokenAmount(inner) : inner),
		2,
	);
}
