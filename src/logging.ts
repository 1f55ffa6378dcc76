import fs from "node:fs";
import path from "node:path";

import pino, {
	type Bindings,
	type DestinationStream,
	type LevelWithSilent,
	type Logger,
} from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

const DEFAULT_LOG_DIR = path.join(CONFIG_DIR, "logs");
export const DEFAULT_LOG_FILE = path.join(DEFAULT_LOG_DIR, "crowdmod.log");

type Destination = ReturnType<typeof pino.destination>;

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};
export type LoggerResolvedSettings = ResolvedSettings;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;
let cachedDestinationFile: string | null = null;

function resolveSettings(): ResolvedSettings {
	const cfg: LoggingConfig | undefined = loadConfig().logging;
	const level: LevelWithSilent = isVerbose() ? "debug" : (cfg?.level ?? "info");
	const file = cfg?.file ?? DEFAULT_LOG_FILE;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	// Flush before closing so short-lived CLI commands exit with their logs written.
	dest.flushSync();
	dest.end();
}

function openDestination(file: string): Destination {
	const logDir = path.dirname(file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });

	// Create the file with 0600 so logs are never world-readable
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) {
			throw err;
		}
	}

	return pino.destination({
		dest: file,
		mkdir: true,
		sync: true, // deterministic for tests; log volume is modest.
	});
}

/**
 * Single open destination; switching files closes the previous one.
 */
function useDestination(file: string): Destination {
	if (cachedDestination && cachedDestinationFile === file) {
		return cachedDestination;
	}
	if (cachedDestination) {
		closeDestination(cachedDestination);
	}
	cachedDestination = openDestination(file);
	cachedDestinationFile = file;
	return cachedDestination;
}

// Module-level child loggers outlive a rebuild; they write through here
// so they always reach the current destination.
const stream: DestinationStream = {
	write(msg: string) {
		useDestination(cachedDestinationFile ?? resolveSettings().file).write(msg);
	},
};

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		useDestination(settings.file);
		cachedLogger = pino(
			{
				level: settings.level,
				base: undefined,
				timestamp: pino.stdTimeFunctions.isoTime,
			},
			stream,
		);
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
	}
	cachedDestination = null;
	cachedLogger = null;
	cachedSettings = null;
}
