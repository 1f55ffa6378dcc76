import { PlatformError, isPlatformError } from "../errors.js";

export const USERNAME_SLOTS = 15;
export const USERNAME_MIN_LENGTH = 4;

const NUL = 0;

function isNameByte(byte: number): boolean {
	return (
		(byte >= 0x61 && byte <= 0x7a) || // a-z
		(byte >= 0x30 && byte <= 0x39) || // 0-9
		byte === 0x5f // _
	);
}

/**
 * Check a username laid out in 15 left-justified byte slots: `[a-z0-9_]`
 * characters followed only by NUL padding, at least 4 characters long.
 * Returns the name without padding.
 */
export function validateUsername(name: string): string {
	const bytes = Buffer.from(name, "utf8");
	const reject = (reason: string): never => {
		throw new PlatformError("InvalidUsername", `invalid username ${JSON.stringify(name)}: ${reason}`);
	};

	if (bytes.length === 0) reject("empty");
	if (bytes.length > USERNAME_SLOTS) reject(`longer than ${USERNAME_SLOTS} bytes`);

	let length = 0;
	let padded = false;
	for (const byte of bytes) {
		if (byte === NUL) {
			padded = true;
			continue;
		}
		if (padded) reject("characters after padding");
		if (!isNameByte(byte)) reject("only a-z, 0-9 and _ are allowed");
		length++;
	}

	if (length < USERNAME_MIN_LENGTH) reject(`fewer than ${USERNAME_MIN_LENGTH} characters`);

	return name.slice(0, length);
}

export function isValidUsername(name: string): boolean {
	try {
		validateUsername(name);
		return true;
	} catch (err) {
		if (isPlatformError(err, "InvalidUsername")) return false;
		throw err;
	}
}
