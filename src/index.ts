#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerInitCommand } from "./commands/init.js";
import { registerInspectCommands } from "./commands/inspect.js";
import { registerResetDbCommand } from "./commands/reset-db.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerTokenCommands } from "./commands/token.js";
import { registerWorkflowCommands } from "./commands/workflow.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";
import { closeDb } from "./storage/db.js";

const program = createProgram();

registerInitCommand(program);
registerStatusCommand(program);
registerInspectCommands(program);
registerWorkflowCommands(program);
registerTokenCommands(program);
registerResetDbCommand(program);

// Global options must be applied before any command loads config
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose === true) {
		setVerbose(true);
	}
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino destination and SQLite keep handles open
		closeDb();
		closeLogger();
	});
