import path from "node:path";
import { CONFIG_DIR } from "../utils.js";

const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, "crowdmod.json");

/**
 * Global config path override. Set via CLI or programmatically.
 */
let configPathOverride: string | null = null;

/**
 * Resolve the config file path from:
 * 1. Programmatic override (set via setConfigPath)
 * 2. CROWDMOD_CONFIG environment variable
 * 3. Default: ~/.crowdmod/crowdmod.json
 */
export function resolveConfigPath(): string {
	if (configPathOverride) {
		return configPathOverride;
	}

	const envPath = process.env.CROWDMOD_CONFIG;
	if (envPath) {
		return envPath;
	}

	return DEFAULT_CONFIG_PATH;
}

/**
 * Set the config path override. Called from CLI parsing.
 */
export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath;
}

/**
 * Reset config path to default (for testing).
 */
export function resetConfigPath(): void {
	configPathOverride = null;
}
