import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { CONFIG_DIR } from "../utils.js";
import { resolveConfigPath } from "./path.js";

export const DEFAULT_GENESIS = "2024-01-01T00:00:00.000Z";
export const DEFAULT_ADMINISTRATOR = "admin";
export const DEFAULT_PLATFORM_ACCOUNT = "crowdmod:platform";

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const StorageConfigSchema = z.object({
	// Absolute path, or ":memory:" for a throwaway ledger
	path: z.string().min(1).optional(),
});

const PlatformConfigSchema = z.object({
	// Network genesis; MAU periods are 30-day windows counted from here
	genesis: z
		.string()
		.refine((value) => !Number.isNaN(Date.parse(value)), { message: "genesis must be an ISO date" })
		.default(DEFAULT_GENESIS),
	administrator: z.string().min(1).default(DEFAULT_ADMINISTRATOR),
	// Token account that collects fees and mints rewards
	account: z.string().min(1).default(DEFAULT_PLATFORM_ACCOUNT),
});

const EconomicsConfigSchema = z.object({
	// Whole tokens; scaled by 10^18 at runtime
	baseReward: z
		.string()
		.regex(/^\d+$/, { message: "baseReward must be a non-negative integer string" })
		.default("1000"),
	// Commission rate in basis points of the base reward
	commissionBps: z.number().int().min(0).max(10_000).default(500),
});

const CrowdmodConfigSchema = z.object({
	logging: LoggingConfigSchema.optional(),
	storage: StorageConfigSchema.optional(),
	platform: PlatformConfigSchema.optional(),
	economics: EconomicsConfigSchema.optional(),
});

export type CrowdmodConfig = z.infer<typeof CrowdmodConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;
export type EconomicsConfig = z.infer<typeof EconomicsConfigSchema>;

let cachedConfig: CrowdmodConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): CrowdmodConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const parsed: unknown = JSON5.parse(raw);
		const validated = CrowdmodConfigSchema.parse(parsed);

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "EACCES")) {
			// No readable config file - use defaults
			return {};
		}
		throw err;
	}
}

/**
 * Platform section with defaults applied.
 */
export function resolvePlatformConfig(config: CrowdmodConfig = loadConfig()): PlatformConfig {
	return PlatformConfigSchema.parse(config.platform ?? {});
}

/**
 * Economics section with defaults applied.
 */
export function resolveEconomicsConfig(config: CrowdmodConfig = loadConfig()): EconomicsConfig {
	return EconomicsConfigSchema.parse(config.economics ?? {});
}

export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}

/**
 * Ensure the config directory exists with owner-only permissions.
 */
export async function ensureConfigDir(): Promise<void> {
	await fs.promises.mkdir(CONFIG_DIR, { recursive: true, mode: 0o700 });
}

/**
 * Create a default config file if it doesn't exist.
 * Uses resolveConfigPath() for the target location.
 */
export async function createDefaultConfigIfMissing(): Promise<boolean> {
	const configPath = resolveConfigPath();

	try {
		await fs.promises.access(configPath);
		return false;
	} catch {
		await ensureConfigDir();
		const defaultConfig = {
			logging: { level: "info" },
			platform: {
				genesis: DEFAULT_GENESIS,
				administrator: DEFAULT_ADMINISTRATOR,
				account: DEFAULT_PLATFORM_ACCOUNT,
			},
			economics: {
				baseReward: "1000",
				commissionBps: 500,
			},
		};
		await fs.promises.writeFile(configPath, `${JSON.stringify(defaultConfig, null, "\t")}\n`, {
			mode: 0o600,
		});
		return true;
	}
}
