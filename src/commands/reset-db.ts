import crypto from "node:crypto";
import * as readline from "node:readline";
import chalk from "chalk";
import type { Command } from "commander";
import { reportFailure, reportSuccess } from "../cli/report.js";
import { getChildLogger } from "../logging.js";
import { getDbPath, resetDatabase } from "../storage/db.js";

const logger = getChildLogger({ module: "cmd-reset-db" });

async function prompt(question: string): Promise<string> {
	const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
	return new Promise((resolve) => {
		rl.question(question, (answer) => {
			rl.close();
			resolve(answer);
		});
	});
}

export function registerResetDbCommand(program: Command): void {
	program
		.command("reset-db")
		.description("Delete the ledger database (DANGEROUS: removes content, profiles, balances)")
		.option("--force", "Skip interactive confirmations (non-TTY only)")
		.action(async (options: { force?: boolean }) => {
			try {
				console.log("");
				console.log(chalk.yellow(`⚠️  WARNING: This will delete ${getDbPath()}.`));
				console.log("   Content, reply edges, profiles, usernames, MAU history,");
				console.log("   token balances and the event log will be lost.");
				console.log("");

				const isTty = Boolean(process.stdin.isTTY && process.stdout.isTTY);

				if (options.force && isTty) {
					console.log("--force ignored on TTY; interactive confirmations are required.");
				}

				if (!options.force || isTty) {
					const answer = await prompt('Type "RESET DB" to confirm: ');
					if (answer.trim().toUpperCase() !== "RESET DB") {
						console.log("Aborted. No changes made.");
						return;
					}
				}

				if (isTty) {
					const confirmationCode = crypto.randomBytes(3).toString("hex").toUpperCase();
					const codeAnswer = await prompt(`Enter confirmation code ${confirmationCode}: `);
					if (codeAnswer.trim().toUpperCase() !== confirmationCode) {
						console.log("Aborted. No changes made.");
						return;
					}
				}

				resetDatabase();
				reportSuccess("Database reset complete.");
			} catch (err) {
				reportFailure(logger, "reset-db", err);
			}
		});
}
