import type { Command } from "commander";
import { reportFailure, reportSuccess } from "../cli/report.js";
import { createDefaultConfigIfMissing, getConfigPath } from "../config/config.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "cmd-init" });

export function registerInitCommand(program: Command): void {
	program
		.command("init")
		.description("Write a default config file if none exists")
		.action(async () => {
			try {
				const created = await createDefaultConfigIfMissing();
				reportSuccess(
					created
						? `wrote default config to ${getConfigPath()}`
						: `config already exists at ${getConfigPath()}`,
				);
			} catch (err) {
				reportFailure(logger, "init", err);
			}
		});
}
