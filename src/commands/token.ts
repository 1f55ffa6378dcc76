import type { Command } from "commander";
import { parseTokenAmountArg } from "../cli/args.js";
import { reportFailure, reportSuccess } from "../cli/report.js";
import { getChildLogger } from "../logging.js";
import { createPlatform } from "../platform/index.js";
import { formatTokenAmount } from "../utils.js";

const logger = getChildLogger({ module: "cmd-token" });

export function registerTokenCommands(program: Command): void {
	const token = program.command("token").description("Local token ledger");

	token
		.command("balance")
		.description("Show an account's token balance")
		.argument("<account>", "account identifier")
		.action((account: string) => {
			try {
				const { token: ledger } = createPlatform();
				console.log(formatTokenAmount(ledger.balanceOf(account)));
			} catch (err) {
				reportFailure(logger, "token balance", err);
			}
		});

	token
		.command("mint")
		.description("Credit tokens to an account (local ledger only)")
		.argument("<account>", "account identifier")
		.argument("<amount>", "whole tokens, up to 18 decimals", parseTokenAmountArg)
		.action((account: string, amount: bigint) => {
			try {
				const { token: ledger } = createPlatform();
				ledger.mint(account, amount);
				logger.info({ account, amount: amount.toString() }, "tokens minted from CLI");
				reportSuccess(`minted ${formatTokenAmount(amount)} to ${account}`);
			} catch (err) {
				reportFailure(logger, "token mint", err);
			}
		});

	token
		.command("approve")
		.description("Allow the platform to collect fees from an account")
		.argument("<account>", "account granting the allowance")
		.argument("<amount>", "whole tokens, up to 18 decimals", parseTokenAmountArg)
		.action((account: string, amount: bigint) => {
			try {
				const { token: ledger } = createPlatform();
				ledger.approve(account, ledger.platformAccount, amount);
				reportSuccess(
					`${account} allows ${ledger.platformAccount} to spend ${formatTokenAmount(amount)}`,
				);
			} catch (err) {
				reportFailure(logger, "token approve", err);
			}
		});
}
