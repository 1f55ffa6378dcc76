/**
 * Platform workflows.
 *
 * Each workflow runs inside a single SQLite transaction covering the
 * content ledger, activity tracker, token ledger and event log. Any
 * failure rolls every step back; listeners only hear about committed
 * workflows. A TokenLedger that lives outside this database must provide
 * its own compensation, since the transaction cannot undo it.
 */

import type Database from "better-sqlite3";
import { ActivityTracker, type UserProfile } from "../activity/tracker.js";
import { ContentLedger } from "../content/ledger.js";
import {
	type ContentFields,
	type ContentId,
	type ContentRecord,
	type ContentType,
	ContentTypeSchema,
	type Hash32,
	Hash32Schema,
	formatContentId,
} from "../content/types.js";
import { shouldEliminate } from "../economics/elimination.js";
import {
	DEFAULT_ECONOMICS,
	type EconomicsParams,
	fee,
	feeForStrikes,
	reward,
} from "../economics/pricing.js";
import { PlatformError, isPlatformError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { TokenLedger } from "../token/ledger.js";
import {
	type EventListener,
	type EventQuery,
	type PlatformEvent,
	type StoredEvent,
	listEvents,
	recordEvent,
} from "./events.js";

const logger = getChildLogger({ module: "platform" });

export type PlatformOptions = {
	db: Database.Database;
	token: TokenLedger;
	/** Only account allowed to withdraw collected fees. */
	administrator: string;
	genesisMs: number;
	economics?: EconomicsParams;
	/** Milliseconds since epoch; defaults to Date.now. */
	clock?: () => number;
};

type WorkflowContext = {
	now: number;
	emit: (event: PlatformEvent) => void;
};

function toFields(record: ContentRecord): ContentFields {
	return {
		owner: record.owner,
		contentHash: record.contentHash,
		metadataHash: record.metadataHash,
		likes: record.likes,
		dislikes: record.dislikes,
		harvestedLikes: record.harvestedLikes,
	};
}

function parseHash(value: string, field: string): Hash32 {
	const result = Hash32Schema.safeParse(value);
	if (!result.success) {
		throw new PlatformError("InvalidInput", `${field}: ${result.error.issues[0]?.message}`);
	}
	return result.data;
}

function parseContentType(value: string): ContentType {
	const result = ContentTypeSchema.safeParse(value);
	if (!result.success) {
		throw new PlatformError("InvalidInput", `unknown content type ${JSON.stringify(value)}`);
	}
	return result.data;
}

function assertCaller(caller: string): void {
	if (caller.length === 0) {
		throw new PlatformError("InvalidInput", "caller account is empty");
	}
}

export class Platform {
	readonly content: ContentLedger;
	readonly activity: ActivityTracker;
	readonly token: TokenLedger;
	readonly administrator: string;
	readonly economics: EconomicsParams;

	private readonly db: Database.Database;
	private readonly clock: () => number;
	private readonly listeners = new Set<EventListener>();

	constructor(options: PlatformOptions) {
		this.db = options.db;
		this.token = options.token;
		this.administrator = options.administrator;
		this.economics = options.economics ?? DEFAULT_ECONOMICS;
		this.clock = options.clock ?? Date.now;
		this.content = new ContentLedger(options.db);
		this.activity = new ActivityTracker(options.db, options.genesisMs);
	}

	/**
	 * Subscribe to committed workflow events. Returns an unsubscribe function.
	 */
	onEvent(listener: EventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	// ─── Workflows ───────────────────────────────────────────────────────────

	upload(caller: string, contentHash: string, metadataHash: string, type: string): ContentId {
		return this.run("upload", caller, ({ now, emit }) => {
			const fields: ContentFields = {
				owner: caller,
				contentHash: parseHash(contentHash, "contentHash"),
				metadataHash: parseHash(metadataHash, "metadataHash"),
				likes: 0,
				dislikes: 0,
				harvestedLikes: 0,
			};
			const contentType = parseContentType(type);

			const { strikes } = this.activity.profile(caller);
			if (strikes > 0) {
				this.collectFee(caller, feeForStrikes(BigInt(strikes), this.pricingMAU(), this.economics));
			}
			this.activity.logInteraction(caller, now);
			const id = this.content.create(fields, contentType);
			emit({ kind: "Uploaded", creator: caller, index: id.index, type: id.contentType });
			return id;
		});
	}

	like(caller: string, id: ContentId): void {
		this.run("like", caller, (ctx) => this.vote(caller, id, "like", ctx));
	}

	dislike(caller: string, id: ContentId): void {
		this.run("dislike", caller, (ctx) => this.vote(caller, id, "dislike", ctx));
	}

	/**
	 * Mint rewards for net likes not yet paid out. Returns the minted amount.
	 */
	harvestLikes(caller: string, id: ContentId): bigint {
		return this.run("harvestLikes", caller, ({ emit }) => {
			const record = this.liveContent(id);
			if (record.likes <= record.dislikes) {
				throw new PlatformError("NoLikesToHarvest", `${formatContentId(id)} has no net likes`);
			}
			if (shouldEliminate(BigInt(record.likes), BigInt(record.dislikes))) {
				throw new PlatformError(
					"ContentEliminable",
					`${formatContentId(id)} qualifies for elimination`,
				);
			}
			const unharvested = record.likes - record.dislikes - record.harvestedLikes;
			if (unharvested <= 0) {
				throw new PlatformError(
					"NoLikesToHarvest",
					`${formatContentId(id)} has no unharvested likes`,
				);
			}

			const amount = BigInt(unharvested) * reward(this.pricingMAU(), this.economics);
			this.token.mint(record.owner, amount);
			this.content.update(id, {
				...toFields(record),
				harvestedLikes: record.harvestedLikes + unharvested,
			});
			emit({ kind: "Harvested", index: id.index, type: id.contentType, amount });
			return amount;
		});
	}

	/**
	 * Remove crowd-disapproved content and give its owner a strike.
	 */
	deletion(caller: string, id: ContentId): void {
		this.run("deletion", caller, ({ emit }) => {
			const record = this.liveContent(id);
			if (!shouldEliminate(BigInt(record.likes), BigInt(record.dislikes))) {
				throw new PlatformError("NotEliminable", `${formatContentId(id)} is not eliminable`);
			}
			this.content.delete(id);
			this.activity.addStrike(record.owner);
			emit({
				kind: "Deleted",
				owner: record.owner,
				contentHash: record.contentHash,
				metadataHash: record.metadataHash,
				index: id.index,
				type: id.contentType,
			});
		});
	}

	voluntarilyDelete(caller: string, id: ContentId): void {
		this.run("voluntarilyDelete", caller, () => {
			const record = this.content.get(id);
			if (record.owner !== caller) {
				throw new PlatformError("Unauthorized", `${caller} does not own ${formatContentId(id)}`);
			}
			this.content.delete(id);
		});
	}

	reply(caller: string, replyId: ContentId, targetId: ContentId): void {
		this.run("reply", caller, ({ emit }) => {
			const record = this.content.get(replyId);
			if (record.owner !== caller) {
				throw new PlatformError(
					"Unauthorized",
					`${caller} does not own ${formatContentId(replyId)}`,
				);
			}
			this.content.link(replyId, targetId);
			emit({
				kind: "Replied",
				replyIndex: replyId.index,
				replyType: replyId.contentType,
				targetIndex: targetId.index,
				targetType: targetId.contentType,
			});
		});
	}

	/**
	 * Move every collected fee to the administrator. Returns the amount.
	 */
	withdraw(caller: string): bigint {
		return this.run("withdraw", caller, () => {
			if (caller !== this.administrator) {
				throw new PlatformError("Unauthorized", `${caller} is not the administrator`);
			}
			const balance = this.token.balanceOf(this.token.platformAccount);
			if (balance === 0n) {
				throw new PlatformError("NothingToWithdraw", "no collected fees to withdraw");
			}
			this.token.transfer(this.administrator, balance);
			return balance;
		});
	}

	createUser(caller: string, name: string, metadataHash: string): string {
		return this.run("createUser", caller, () => {
			const metadata = parseHash(metadataHash, "metadataHash");
			const userName = this.activity.registerUsername(caller, name);
			this.activity.setMetadata(caller, metadata);
			return userName;
		});
	}

	updateMetadata(caller: string, metadataHash: string): void {
		this.run("updateMetadata", caller, () => {
			this.activity.setMetadata(caller, parseHash(metadataHash, "metadataHash"));
		});
	}

	// ─── Read accessors ──────────────────────────────────────────────────────

	getProfile(account: string): UserProfile {
		return this.activity.profile(account);
	}

	getUsernameOwner(name: string): string | null {
		return this.activity.usernameOwner(name);
	}

	currentPeriodMAU(): number {
		return this.activity.currentPeriodMAU();
	}

	historicMAU(period: number): number {
		return this.activity.historicMAU(period);
	}

	mauHistory(): number[] {
		return this.activity.mauHistory();
	}

	getContentById(id: ContentId): ContentRecord {
		return this.content.get(id);
	}

	getContentLibraryLength(type: ContentType): number {
		return this.content.length(type);
	}

	getRepliesOf(id: ContentId): ContentId[] {
		return this.content.repliesOf(id);
	}

	getRepliedBy(id: ContentId): ContentId[] {
		return this.content.repliedByOf(id);
	}

	listEvents(query?: EventQuery): StoredEvent[] {
		return listEvents(this.db, query);
	}

	/** Current like/dislike fee. */
	currentFee(): bigint {
		return fee(this.pricingMAU(), this.economics);
	}

	/** Current reward per harvested like. */
	currentReward(): bigint {
		return reward(this.pricingMAU(), this.economics);
	}

	// ─── Internals ───────────────────────────────────────────────────────────

	private vote(
		caller: string,
		id: ContentId,
		direction: "like" | "dislike",
		{ now, emit }: WorkflowContext,
	): void {
		this.collectFee(caller, fee(this.pricingMAU(), this.economics));
		const record = this.content.get(id);
		const fields = toFields(record);
		if (direction === "like") {
			fields.likes++;
		} else {
			fields.dislikes++;
		}
		this.content.update(id, fields);
		this.activity.logInteraction(caller, now);
		emit(
			direction === "like"
				? { kind: "Liked", index: id.index, type: id.contentType }
				: { kind: "Disliked", index: id.index, type: id.contentType },
		);
	}

	/**
	 * Record that still has an owner. Tombstones keep counting votes but have
	 * nobody to reward or strike.
	 */
	private liveContent(id: ContentId): ContentRecord {
		const record = this.content.get(id);
		if (record.owner === "") {
			throw new PlatformError("NotFound", `${formatContentId(id)} has been deleted`);
		}
		return record;
	}

	private pricingMAU(): bigint {
		return BigInt(this.activity.currentPeriodMAU());
	}

	private collectFee(caller: string, amount: bigint): void {
		const platformAccount = this.token.platformAccount;
		const balance = this.token.balanceOf(caller);
		if (balance < amount) {
			throw new PlatformError(
				"InsufficientBalance",
				`${caller} holds ${balance}, fee is ${amount}`,
			);
		}
		const allowance = this.token.allowance(caller, platformAccount);
		if (allowance < amount) {
			throw new PlatformError(
				"InsufficientAllowance",
				`${caller} allows ${allowance} to ${platformAccount}, fee is ${amount}`,
			);
		}
		this.token.transferFrom(caller, platformAccount, amount);
		logger.debug({ caller, amount: amount.toString() }, "fee collected");
	}

	private run<T>(workflow: string, caller: string, body: (ctx: WorkflowContext) => T): T {
		const now = this.clock();
		const pending: StoredEvent[] = [];
		const emit = (event: PlatformEvent) => {
			pending.push(recordEvent(this.db, event, now));
		};

		let result: T;
		try {
			assertCaller(caller);
			result = this.db.transaction(() => body({ now, emit }))();
		} catch (err) {
			if (isPlatformError(err)) {
				logger.warn({ workflow, caller, code: err.code, error: err.message }, "workflow rejected");
			} else {
				logger.error({ workflow, caller, error: String(err) }, "workflow failed");
			}
			throw err;
		}

		logger.info({ workflow, caller, events: pending.length }, "workflow committed");
		this.deliver(pending);
		return result;
	}

	private deliver(events: StoredEvent[]): void {
		for (const stored of events) {
			for (const listener of this.listeners) {
				try {
					listener(stored.event, stored);
				} catch (err) {
					// The workflow is committed; a failing listener must not undo it.
					logger.warn(
						{ kind: stored.event.kind, eventId: stored.id, error: String(err) },
						"event listener failed",
					);
				}
			}
		}
	}
}
