/**
 * User profiles, the username registry and the monthly active user
 * histogram.
 *
 * MAU is approximated without keeping a per-period set of accounts: each
 * account is counted at most once per 30-day period by comparing its own
 * last interaction time against the start of the open period.
 */

import type Database from "better-sqlite3";
import { type Hash32, ZERO_HASH } from "../content/types.js";
import { validateUsername } from "../economics/username.js";
import { PlatformError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "activity-tracker" });

export const PERIOD_MS = 30 * 24 * 60 * 60 * 1000;

export type UserProfile = {
	/** Milliseconds since epoch; 0 when the account never interacted. */
	latestInteractionTime: number;
	metadataHash: Hash32;
	/** Empty until a username is registered. */
	userName: string;
	strikes: number;
};

type ProfileRow = {
	latest_interaction: number;
	metadata_hash: string;
	user_name: string;
	strikes: number;
};

export class ActivityTracker {
	constructor(
		private readonly db: Database.Database,
		readonly genesisMs: number,
	) {}

	profile(account: string): UserProfile {
		const row = this.db
			.prepare<[string], ProfileRow>(
				"SELECT latest_interaction, metadata_hash, user_name, strikes FROM profiles WHERE account = ?",
			)
			.get(account);
		if (!row) {
			return { latestInteractionTime: 0, metadataHash: ZERO_HASH, userName: "", strikes: 0 };
		}
		return {
			latestInteractionTime: row.latest_interaction,
			metadataHash: row.metadata_hash,
			userName: row.user_name,
			strikes: row.strikes,
		};
	}

	mauHistory(): number[] {
		return this.db
			.prepare<[], { active_users: number }>(
				"SELECT active_users FROM mau_buckets ORDER BY period ASC",
			)
			.all()
			.map((row) => row.active_users);
	}

	historicMAU(period: number): number {
		const row = this.db
			.prepare<[number], { active_users: number }>(
				"SELECT active_users FROM mau_buckets WHERE period = ?",
			)
			.get(period);
		if (!row) {
			throw new PlatformError("NotFound", `no MAU recorded for period ${period}`);
		}
		return row.active_users;
	}

	/**
	 * MAU used for pricing: the last closed period, or the bootstrap
	 * period while it is the only one.
	 */
	currentPeriodMAU(): number {
		const length = this.periodCount();
		if (length === 0) return 0;
		return this.historicMAU(length >= 2 ? length - 2 : 0);
	}

	periodStart(period: number): number {
		return this.genesisMs + PERIOD_MS * period;
	}

	logInteraction(account: string, now: number): void {
		if (!Number.isSafeInteger(now) || now < this.genesisMs) {
			throw new PlatformError("InvalidTimestamp", `interaction at ${now} precedes genesis`);
		}

		const elapsedPeriods = Math.floor((now - this.genesisMs) / PERIOD_MS);
		let length = this.periodCount();

		const insertBucket = this.db.prepare(
			"INSERT INTO mau_buckets (period, active_users) VALUES (?, ?)",
		);

		// Back-fill periods nobody interacted in
		while (length < elapsedPeriods) {
			insertBucket.run(length, 0);
			length++;
		}

		if (elapsedPeriods + 1 > length) {
			insertBucket.run(length, 1);
			logger.debug({ period: length, account }, "opened MAU period");
		} else {
			const { latestInteractionTime } = this.profile(account);
			const openPeriod = length - 1;
			if (latestInteractionTime === 0 || latestInteractionTime < this.periodStart(openPeriod)) {
				this.db
					.prepare("UPDATE mau_buckets SET active_users = active_users + 1 WHERE period = ?")
					.run(openPeriod);
			}
		}

		this.ensureProfile(account);
		this.db
			.prepare("UPDATE profiles SET latest_interaction = ? WHERE account = ?")
			.run(now, account);
	}

	addStrike(account: string): number {
		this.ensureProfile(account);
		this.db.prepare("UPDATE profiles SET strikes = strikes + 1 WHERE account = ?").run(account);
		const { strikes } = this.profile(account);
		logger.info({ account, strikes }, "strike added");
		return strikes;
	}

	/**
	 * Bind `name` to `account` permanently. Returns the name without padding.
	 */
	registerUsername(account: string, name: string): string {
		const userName = validateUsername(name);

		if (this.profile(account).userName !== "") {
			throw new PlatformError("AlreadyRegistered", `account ${account} already has a username`);
		}
		if (this.usernameOwner(userName) !== null) {
			throw new PlatformError("AlreadyRegistered", `username ${userName} is taken`);
		}

		this.ensureProfile(account);
		this.db.prepare("INSERT INTO usernames (name, account) VALUES (?, ?)").run(userName, account);
		this.db.prepare("UPDATE profiles SET user_name = ? WHERE account = ?").run(userName, account);
		logger.info({ account, userName }, "username registered");
		return userName;
	}

	usernameOwner(name: string): string | null {
		const row = this.db
			.prepare<[string], { account: string }>("SELECT account FROM usernames WHERE name = ?")
			.get(name.replace(/\0+$/, ""));
		return row?.account ?? null;
	}

	setMetadata(account: string, metadataHash: Hash32): void {
		this.ensureProfile(account);
		this.db
			.prepare("UPDATE profiles SET metadata_hash = ? WHERE account = ?")
			.run(metadataHash, account);
	}

	private periodCount(): number {
		const row = this.db
			.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM mau_buckets")
			.get();
		return row?.count ?? 0;
	}

	private ensureProfile(account: string): void {
		this.db
			.prepare(
				`INSERT INTO profiles (account, latest_interaction, metadata_hash, user_name, strikes)
				 VALUES (?, 0, ?, '', 0)
				 ON CONFLICT(account) DO NOTHING`,
			)
			.run(account, ZERO_HASH);
	}
}
