import fs from "node:fs";
import chalk from "chalk";
import type { Command } from "commander";
import { toDisplayJson } from "../cli/args.js";
import { reportFailure } from "../cli/report.js";
import { getConfigPath, loadConfig, resolvePlatformConfig } from "../config/config.js";
import { CONTENT_TYPES } from "../content/types.js";
import { getChildLogger, getResolvedLoggerSettings } from "../logging.js";
import { createPlatform } from "../platform/index.js";
import { getDbPath } from "../storage/db.js";
import { formatTokenAmount } from "../utils.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show ledger status: MAU, current pricing and library sizes")
		.option("--json", "Output as JSON")
		.action((opts: StatusOptions) => {
			try {
				const configPath = getConfigPath();
				const config = loadConfig();
				const platformConfig = resolvePlatformConfig(config);
				const { platform, token } = createPlatform({ config });

				const mau = platform.currentPeriodMAU();
				const libraries = Object.fromEntries(
					CONTENT_TYPES.map((type) => [type, platform.getContentLibraryLength(type)]),
				);

				const status = {
					config: { path: configPath, exists: fs.existsSync(configPath) },
					database: getDbPath(),
					logFile: getResolvedLoggerSettings().file,
					platform: platformConfig,
					activity: {
						currentPeriodMAU: mau,
						periods: platform.mauHistory().length,
					},
					pricing:
						mau > 0
							? { likeFee: platform.currentFee(), rewardPerLike: platform.currentReward() }
							: null,
					collectedFees: token.balanceOf(token.platformAccount),
					totalSupply: token.totalSupply(),
					libraries,
				};

				if (opts.json) {
					console.log(toDisplayJson(status));
					return;
				}

				console.log(chalk.bold("\ncrowdmod status\n"));
				console.log(`Config:        ${status.config.path}${status.config.exists ? "" : " (defaults)"}`);
				console.log(`Database:      ${status.database}`);
				console.log(`Log file:      ${status.logFile}`);
				console.log(`Genesis:       ${platformConfig.genesis}`);
				console.log(`Administrator: ${platformConfig.administrator}`);
				console.log(`MAU (pricing): ${mau} over ${status.activity.periods} period(s)`);
				if (status.pricing) {
					console.log(`Like fee:      ${formatTokenAmount(status.pricing.likeFee)}`);
					console.log(`Reward/like:   ${formatTokenAmount(status.pricing.rewardPerLike)}`);
				} else {
					console.log("Pricing:       unavailable until the first interaction");
				}
				console.log(`Fees held:     ${formatTokenAmount(status.collectedFees)}`);
				console.log(`Total supply:  ${formatTokenAmount(status.totalSupply)}`);
				console.log("\nLibraries:");
				for (const [type, length] of Object.entries(libraries)) {
					if (length > 0) console.log(`  ${type.padEnd(12)} ${length}`);
				}
				console.log("");
			} catch (err) {
				reportFailure(logger, "status", err);
			}
		});
}
