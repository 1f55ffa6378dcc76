import type Database from "better-sqlite3";
import {
	type CrowdmodConfig,
	loadConfig,
	resolveEconomicsConfig,
	resolvePlatformConfig,
} from "../config/config.js";
import { resolveEconomicsParams } from "../economics/pricing.js";
import { getDb } from "../storage/db.js";
import { SqliteTokenLedger } from "../token/ledger.js";
import { Platform } from "./platform.js";

export { Platform, type PlatformOptions } from "./platform.js";
export type { EventListener, PlatformEvent, StoredEvent } from "./events.js";
export { PlatformError, isPlatformError, type PlatformErrorCode } from "../errors.js";
export type { ContentId, ContentRecord, ContentType } from "../content/types.js";
export { CONTENT_TYPES, ZERO_HASH } from "../content/types.js";
export type { UserProfile } from "../activity/tracker.js";
export { SqliteTokenLedger, type TokenLedger } from "../token/ledger.js";
export { shouldEliminate } from "../economics/elimination.js";
export { fee, feeForStrikes, reward } from "../economics/pricing.js";
export { isValidUsername, validateUsername } from "../economics/username.js";

export type CreatePlatformOptions = {
	db?: Database.Database;
	config?: CrowdmodConfig;
	clock?: () => number;
};

/**
 * Build a platform over the configured database, backed by the local
 * SQLite token ledger.
 */
export function createPlatform(
	options: CreatePlatformOptions = {},
): { platform: Platform; token: SqliteTokenLedger } {
	const config = options.config ?? loadConfig();
	const platformConfig = resolvePlatformConfig(config);
	const db = options.db ?? getDb();
	const token = new SqliteTokenLedger(db, platformConfig.account);
	const platform = new Platform({
		db,
		token,
		administrator: platformConfig.administrator,
		genesisMs: Date.parse(platformConfig.genesis),
		economics: resolveEconomicsParams(resolveEconomicsConfig(config)),
		clock: options.clock,
	});
	return { platform, token };
}
