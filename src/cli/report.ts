import chalk from "chalk";
import type { Logger } from "pino";
import { isPlatformError } from "../errors.js";

/**
 * Print a failed command and set a non-zero exit code.
 */
export function reportFailure(logger: Logger, command: string, err: unknown): void {
	if (isPlatformError(err)) {
		logger.warn({ command, code: err.code, error: err.message }, "command rejected");
		console.error(chalk.red(`✗ ${err.code}: ${err.message}`));
	} else {
		logger.error({ command, error: String(err) }, "command failed");
		console.error(chalk.red(`✗ ${String(err)}`));
	}
	process.exitCode = 1;
}

export function reportSuccess(message: string): void {
	console.log(chalk.green(`✓ ${message}`));
}
