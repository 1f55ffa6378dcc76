import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist/src)
		const pkg: { version?: string } = require("../../package.json");
		return pkg.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("crowdmod")
		.description("Crowd moderation and token incentive ledger")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
