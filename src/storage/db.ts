/**
 * SQLite storage layer for crowdmod.
 *
 * One database holds the whole ledger so that a workflow can wrap every
 * mutation (content, activity, token balances, events) in a single
 * transaction:
 * - Content collections and the reply graph
 * - User profiles, usernames and the MAU histogram
 * - The local token ledger
 * - Emitted platform events
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { loadConfig } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import { CONFIG_DIR } from "../utils.js";

const logger = getChildLogger({ module: "storage" });

const DEFAULT_DB_PATH = path.join(CONFIG_DIR, "crowdmod.db");
const SCHEMA_VERSION = 1;

export const IN_MEMORY = ":memory:";

let db: Database.Database | null = null;

/**
 * Database file path from config, falling back to the data directory.
 */
export function getDbPath(): string {
	return loadConfig().storage?.path ?? DEFAULT_DB_PATH;
}

/**
 * Open a database at `file` and bring its schema up to date.
 * Pass ":memory:" for an isolated ledger (tests, dry runs).
 */
export function openDatabase(file: string): Database.Database {
	if (file !== IN_MEMORY) {
		fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	}

	const database = new Database(file);

	if (file !== IN_MEMORY) {
		try {
			fs.chmodSync(file, 0o600);
		} catch {
			logger.warn({ path: file }, "could not set database file permissions to 0600");
		}
		database.pragma("journal_mode = WAL");
	}
	database.pragma("foreign_keys = ON");

	migrate(database);
	return database;
}

/**
 * Get or create the process-wide database connection.
 */
export function getDb(): Database.Database {
	if (db) return db;

	const file = getDbPath();
	db = openDatabase(file);
	logger.info({ path: file }, "database initialized");
	return db;
}

/**
 * Close the database connection.
 */
export function closeDb(): void {
	if (db) {
		db.close();
		db = null;
		logger.debug("database closed");
	}
}

/**
 * Close the connection and delete the database file with its WAL side files.
 */
export function resetDatabase(): void {
	closeDb();
	const file = getDbPath();
	if (file === IN_MEMORY) return;
	for (const suffix of ["", "-wal", "-shm"]) {
		fs.rmSync(`${file}${suffix}`, { force: true });
	}
	logger.info({ path: file }, "database reset");
}

/**
 * Run database migrations.
 */
function migrate(database: Database.Database): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const row = database
		.prepare<[], { version: number }>("SELECT version FROM schema_version LIMIT 1")
		.get();
	const currentVersion = row?.version ?? 0;

	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	logger.info({ from: currentVersion, to: SCHEMA_VERSION }, "running migrations");

	// Migration 1: Initial schema
	if (currentVersion < 1) {
		database.exec(`
			-- One row per slot; tombstones keep their row so indices stay dense
			CREATE TABLE IF NOT EXISTS content (
				content_type INTEGER NOT NULL,
				idx INTEGER NOT NULL,
				owner TEXT NOT NULL,
				content_hash TEXT NOT NULL,
				metadata_hash TEXT NOT NULL,
				likes INTEGER NOT NULL DEFAULT 0,
				dislikes INTEGER NOT NULL DEFAULT 0,
				harvested_likes INTEGER NOT NULL DEFAULT 0,
				PRIMARY KEY (content_type, idx)
			);

			-- Outgoing reply edges, in insertion order (seq)
			CREATE TABLE IF NOT EXISTS content_replies (
				seq INTEGER PRIMARY KEY AUTOINCREMENT,
				content_type INTEGER NOT NULL,
				idx INTEGER NOT NULL,
				target_type INTEGER NOT NULL,
				target_idx INTEGER NOT NULL
			);
			CREATE INDEX IF NOT EXISTS idx_content_replies_source
				ON content_replies(content_type, idx);

			-- Incoming reply edges, in insertion order (seq)
			CREATE TABLE IF NOT EXISTS content_replied_by (
				seq INTEGER PRIMARY KEY AUTOINCREMENT,
				content_type INTEGER NOT NULL,
				idx INTEGER NOT NULL,
				reply_type INTEGER NOT NULL,
				reply_idx INTEGER NOT NULL
			);
			CREATE INDEX IF NOT EXISTS idx_content_replied_by_target
				ON content_replied_by(content_type, idx);

			CREATE TABLE IF NOT EXISTS profiles (
				account TEXT PRIMARY KEY,
				latest_interaction INTEGER NOT NULL DEFAULT 0,
				metadata_hash TEXT NOT NULL,
				user_name TEXT NOT NULL DEFAULT '',
				strikes INTEGER NOT NULL DEFAULT 0
			);

			-- Permanent username <-> account bijection
			CREATE TABLE IF NOT EXISTS usernames (
				name TEXT PRIMARY KEY,
				account TEXT NOT NULL UNIQUE
			);

			-- One row per elapsed 30-day period since genesis, no gaps
			CREATE TABLE IF NOT EXISTS mau_buckets (
				period INTEGER PRIMARY KEY,
				active_users INTEGER NOT NULL
			);

			-- Token amounts are decimal strings of 18-decimal base units
			CREATE TABLE IF NOT EXISTS token_balances (
				account TEXT PRIMARY KEY,
				amount TEXT NOT NULL
			);

			CREATE TABLE IF NOT EXISTS token_allowances (
				owner TEXT NOT NULL,
				spender TEXT NOT NULL,
				amount TEXT NOT NULL,
				PRIMARY KEY (owner, spender)
			);

			CREATE TABLE IF NOT EXISTS token_supply (
				id INTEGER PRIMARY KEY CHECK (id = 1),
				amount TEXT NOT NULL
			);

			CREATE TABLE IF NOT EXISTS platform_events (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				kind TEXT NOT NULL,
				payload TEXT NOT NULL,
				emitted_at INTEGER NOT NULL
			);
			CREATE INDEX IF NOT EXISTS idx_platform_events_kind ON platform_events(kind);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);

	logger.info({ version: SCHEMA_VERSION }, "migrations complete");
}
