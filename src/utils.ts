import os from "node:os";
import path from "node:path";

/**
 * Data directory for the config file, database and logs.
 * Defaults to ~/.crowdmod; CROWDMOD_DATA_DIR overrides it.
 */
export const CONFIG_DIR = process.env.CROWDMOD_DATA_DIR || path.join(os.homedir(), ".crowdmod");

/**
 * Render a bigint base-unit amount with 18 decimals, trimming trailing zeros.
 */
export function formatTokenAmount(amount: bigint, decimals = 18): string {
	const negative = amount < 0n;
	const abs = negative ? -amount : amount;
	const unit = 10n ** BigInt(decimals);
	const whole = abs / unit;
	const fraction = (abs % unit).toString().padStart(decimals, "0").replace(/0+$/, "");
	const sign = negative ? "-" : "";
	return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}
