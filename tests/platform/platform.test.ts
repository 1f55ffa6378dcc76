import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PERIOD_MS } from "../../src/activity/tracker.js";
import type { ContentId } from "../../src/content/types.js";
import { ZERO_HASH } from "../../src/content/types.js";
import { fee, feeForStrikes, reward } from "../../src/economics/pricing.js";
import type { PlatformEvent } from "../../src/platform/events.js";
import { Platform } from "../../src/platform/platform.js";
import { openDatabase } from "../../src/storage/db.js";
import { SqliteTokenLedger } from "../../src/token/ledger.js";
import { hash, thrownBy } from "../helpers.js";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

const GENESIS = Date.parse("2024-01-01T00:00:00.000Z");
const FUNDS = 10n ** 24n;

describe("Platform", () => {
	let db: Database.Database;
	let token: SqliteTokenLedger;
	let platform: Platform;
	let now: number;

	function fund(account: string, amount = FUNDS): void {
		token.mint(account, amount);
		token.approve(account, "platform", amount);
	}

	function uploadText(owner = "alice"): ContentId {
		return platform.upload(owner, hash(1), hash(2), "text");
	}

	function vote(id: ContentId, likes: number, dislikes: number, voter = "voter"): void {
		for (let i = 0; i < likes; i++) platform.like(voter, id);
		for (let i = 0; i < dislikes; i++) platform.dislike(voter, id);
	}

	beforeEach(() => {
		db = openDatabase(":memory:");
		token = new SqliteTokenLedger(db, "platform");
		now = GENESIS + 1000;
		platform = new Platform({
			db,
			token,
			administrator: "admin",
			genesisMs: GENESIS,
			clock: () => now,
		});
		fund("alice");
		fund("voter");
	});

	afterEach(() => {
		db.close();
	});

	describe("upload", () => {
		it("appends content and logs the uploader as active", () => {
			const first = uploadText();
			const second = uploadText();

			expect(first).toEqual({ contentType: "text", index: 0 });
			expect(second).toEqual({ contentType: "text", index: 1 });
			expect(platform.getContentById(first)).toEqual({
				owner: "alice",
				contentHash: hash(1),
				metadataHash: hash(2),
				likes: 0,
				dislikes: 0,
				harvestedLikes: 0,
				repliesTo: [],
				repliedBy: [],
			});
			expect(platform.getContentLibraryLength("text")).toBe(2);
			expect(platform.getContentLibraryLength("video")).toBe(0);
			expect(platform.mauHistory()).toEqual([1]);
			expect(platform.getProfile("alice").latestInteractionTime).toBe(now);
		});

		it("is free without strikes", () => {
			uploadText();

			expect(token.balanceOf("alice")).toBe(FUNDS);
		});

		it("normalizes hashes to lower case", () => {
			const id = platform.upload("alice", `0x${"AB".repeat(32)}`, ZERO_HASH, "poll");

			expect(platform.getContentById(id).contentHash).toBe(`0x${"ab".repeat(32)}`);
		});

		it("rejects unknown content types and malformed hashes", () => {
			expect(thrownBy(() => platform.upload("alice", hash(1), hash(2), "hologram"))).toMatchObject({
				code: "InvalidInput",
			});
			expect(thrownBy(() => platform.upload("alice", "0x1234", hash(2), "text"))).toMatchObject({
				code: "InvalidInput",
			});
			expect(platform.mauHistory()).toEqual([]);
		});

		it("rejects an empty caller", () => {
			expect(thrownBy(() => uploadText(""))).toMatchObject({ code: "InvalidInput" });
		});
	});

	describe("voting", () => {
		it("charges the current fee for each vote", () => {
			const id = uploadText();

			platform.like("voter", id);
			expect(token.balanceOf("voter")).toBe(FUNDS - fee(1n));
			expect(token.balanceOf("platform")).toBe(fee(1n));

			platform.dislike("voter", id);
			expect(token.balanceOf("platform")).toBe(fee(1n) + fee(2n));
			expect(token.allowance("voter", "platform")).toBe(FUNDS - fee(1n) - fee(2n));

			const record = platform.getContentById(id);
			expect(record.likes).toBe(1);
			expect(record.dislikes).toBe(1);
			expect(platform.mauHistory()).toEqual([2]);
		});

		it("reports the first fee of the platform", () => {
			uploadText();

			expect(platform.currentFee()).toBe(50n * 10n ** 18n);
			expect(platform.currentReward()).toBe(1000n * 10n ** 18n);
		});

		it("fails without allowance and leaves state unchanged", () => {
			const id = uploadText();
			token.mint("bob", FUNDS);

			expect(thrownBy(() => platform.like("bob", id))).toMatchObject({
				code: "InsufficientAllowance",
			});
			expect(token.balanceOf("bob")).toBe(FUNDS);
			expect(platform.getContentById(id).likes).toBe(0);
			expect(platform.mauHistory()).toEqual([1]);
		});

		it("fails without balance", () => {
			const id = uploadText();
			token.approve("bob", "platform", FUNDS);

			expect(thrownBy(() => platform.dislike("bob", id))).toMatchObject({
				code: "InsufficientBalance",
			});
			expect(platform.getContentById(id).dislikes).toBe(0);
		});

		it("refunds the fee when the content does not exist", () => {
			uploadText();

			expect(
				thrownBy(() => platform.like("voter", { contentType: "text", index: 7 })),
			).toMatchObject({ code: "NotFound" });
			expect(token.balanceOf("voter")).toBe(FUNDS);
			expect(token.balanceOf("platform")).toBe(0n);
			expect(platform.listEvents()).toHaveLength(1);
		});
	});

	describe("harvestLikes", () => {
		it("mints the reward for net likes once", () => {
			const id = uploadText();
			vote(id, 5, 1);

			const minted = platform.harvestLikes("alice", id);

			expect(minted).toBe(4n * reward(2n));
			expect(minted).toBe(10n ** 21n);
			expect(token.balanceOf("alice")).toBe(FUNDS + minted);
			expect(platform.getContentById(id).harvestedLikes).toBe(4);
			expect(thrownBy(() => platform.harvestLikes("alice", id))).toMatchObject({
				code: "NoLikesToHarvest",
			});
		});

		it("pays only likes gained since the last harvest", () => {
			const id = uploadText();
			vote(id, 5, 1);
			platform.harvestLikes("alice", id);

			vote(id, 2, 0);

			expect(platform.harvestLikes("voter", id)).toBe(2n * reward(2n));
			expect(token.balanceOf("alice")).toBe(FUNDS + 6n * reward(2n));
		});

		it("needs more likes than dislikes", () => {
			const id = uploadText();
			vote(id, 3, 3);

			expect(thrownBy(() => platform.harvestLikes("alice", id))).toMatchObject({
				code: "NoLikesToHarvest",
			});
		});

		it("needs a quorum", () => {
			const id = uploadText();
			vote(id, 3, 0);

			expect(thrownBy(() => platform.harvestLikes("alice", id))).toMatchObject({
				code: "QuorumNotMet",
			});
			expect(token.balanceOf("alice")).toBe(FUNDS);
		});

		it("emits the minted amount", () => {
			const id = uploadText();
			vote(id, 5, 1);
			platform.harvestLikes("alice", id);

			const [latest] = platform.listEvents({ kind: "Harvested" });
			expect(latest?.event).toEqual({
				kind: "Harvested",
				index: 0,
				type: "text",
				amount: 10n ** 21n,
			});
		});
	});

	describe("deletion", () => {
		it("tombstones eliminable content and strikes its owner", () => {
			const id = uploadText();
			vote(id, 1, 9);

			platform.deletion("voter", id);

			expect(platform.getContentById(id)).toEqual({
				owner: "",
				contentHash: ZERO_HASH,
				metadataHash: ZERO_HASH,
				likes: 0,
				dislikes: 0,
				harvestedLikes: 0,
				repliesTo: [],
				repliedBy: [],
			});
			expect(platform.getProfile("alice").strikes).toBe(1);
			expect(platform.getContentLibraryLength("text")).toBe(1);
		});

		it("charges struck owners on their next upload", () => {
			const id = uploadText();
			vote(id, 1, 9);
			platform.deletion("voter", id);

			uploadText();

			expect(token.balanceOf("alice")).toBe(FUNDS - feeForStrikes(1n, 2n));
			expect(feeForStrikes(1n, 2n)).toBe(3n * 12_500_000_000_000_000_000n);
		});

		it("refuses content the crowd has not rejected", () => {
			const id = uploadText();
			vote(id, 3, 3);

			expect(thrownBy(() => platform.deletion("voter", id))).toMatchObject({
				code: "NotEliminable",
			});
			expect(platform.getProfile("alice").strikes).toBe(0);
		});

		it("records what was deleted", () => {
			const id = uploadText();
			vote(id, 1, 9);
			platform.deletion("voter", id);

			const [latest] = platform.listEvents({ kind: "Deleted" });
			expect(latest?.event).toEqual({
				kind: "Deleted",
				owner: "alice",
				contentHash: hash(1),
				metadataHash: hash(2),
				index: 0,
				type: "text",
			});
		});
	});

	describe("voluntarilyDelete", () => {
		it("lets the owner tombstone without a strike", () => {
			const id = uploadText();

			platform.voluntarilyDelete("alice", id);

			expect(platform.getContentById(id).owner).toBe("");
			expect(platform.getProfile("alice").strikes).toBe(0);
		});

		it("refuses anyone else", () => {
			const id = uploadText();

			expect(thrownBy(() => platform.voluntarilyDelete("voter", id))).toMatchObject({
				code: "Unauthorized",
			});
			expect(platform.getContentById(id).owner).toBe("alice");
		});
	});

	describe("tombstones", () => {
		it("count votes but pay no reward", () => {
			const id = uploadText();
			platform.voluntarilyDelete("alice", id);
			vote(id, 6, 0);
			const supply = token.totalSupply();

			expect(thrownBy(() => platform.harvestLikes("voter", id))).toMatchObject({
				code: "NotFound",
			});
			expect(platform.getContentById(id).likes).toBe(6);
			expect(token.balanceOf("")).toBe(0n);
			expect(token.totalSupply()).toBe(supply);
		});

		it("cannot be eliminated again", () => {
			const id = uploadText();
			platform.voluntarilyDelete("alice", id);
			vote(id, 0, 6);

			expect(thrownBy(() => platform.deletion("voter", id))).toMatchObject({
				code: "NotFound",
			});
			expect(platform.getProfile("").strikes).toBe(0);
			expect(platform.listEvents({ kind: "Deleted" })).toEqual([]);
		});
	});

	describe("reply", () => {
		it("links the reply in both directions", () => {
			const post = uploadText("voter");
			const comment = platform.upload("alice", hash(3), hash(4), "comment");

			platform.reply("alice", comment, post);

			expect(platform.getRepliesOf(comment)).toEqual([post]);
			expect(platform.getRepliedBy(post)).toEqual([comment]);
			expect(platform.listEvents({ kind: "Replied" })[0]?.event).toEqual({
				kind: "Replied",
				replyIndex: 0,
				replyType: "comment",
				targetIndex: 0,
				targetType: "text",
			});
		});

		it("needs the caller to own the reply", () => {
			const post = uploadText("voter");
			const comment = platform.upload("alice", hash(3), hash(4), "comment");

			expect(thrownBy(() => platform.reply("voter", comment, post))).toMatchObject({
				code: "Unauthorized",
			});
			expect(platform.getRepliedBy(post)).toEqual([]);
		});

		it("needs the target to exist", () => {
			const comment = platform.upload("alice", hash(3), hash(4), "comment");

			expect(
				thrownBy(() => platform.reply("alice", comment, { contentType: "text", index: 0 })),
			).toMatchObject({ code: "NotFound" });
			expect(platform.getRepliesOf(comment)).toEqual([]);
		});
	});

	describe("withdraw", () => {
		it("is reserved for the administrator", () => {
			expect(thrownBy(() => platform.withdraw("alice"))).toMatchObject({ code: "Unauthorized" });
		});

		it("needs collected fees", () => {
			expect(thrownBy(() => platform.withdraw("admin"))).toMatchObject({
				code: "NothingToWithdraw",
			});
		});

		it("moves every collected fee to the administrator", () => {
			const id = uploadText();
			platform.like("voter", id);

			expect(platform.withdraw("admin")).toBe(fee(1n));
			expect(token.balanceOf("admin")).toBe(fee(1n));
			expect(token.balanceOf("platform")).toBe(0n);
		});
	});

	describe("profiles", () => {
		it("registers a username with metadata", () => {
			expect(platform.createUser("alice", "alice_01", hash(9))).toBe("alice_01");

			expect(platform.getProfile("alice")).toMatchObject({
				userName: "alice_01",
				metadataHash: hash(9),
			});
			expect(platform.getUsernameOwner("alice_01")).toBe("alice");
		});

		it("rolls back metadata when the name is taken", () => {
			platform.createUser("alice", "shared", hash(9));

			expect(thrownBy(() => platform.createUser("voter", "shared", hash(8)))).toMatchObject({
				code: "AlreadyRegistered",
			});
			expect(platform.getProfile("voter").metadataHash).toBe(ZERO_HASH);
		});

		it("updates metadata", () => {
			platform.updateMetadata("alice", hash(5));

			expect(platform.getProfile("alice").metadataHash).toBe(hash(5));
			expect(thrownBy(() => platform.updateMetadata("alice", "nope"))).toMatchObject({
				code: "InvalidInput",
			});
		});
	});

	describe("pricing across periods", () => {
		it("prices from the last closed period", () => {
			fund("bob");
			fund("carol");
			const id = uploadText();

			now = GENESIS + PERIOD_MS + 1000;
			platform.like("voter", id);
			platform.like("bob", id);
			expect(platform.mauHistory()).toEqual([1, 2]);

			now = GENESIS + 2 * PERIOD_MS + 1000;
			platform.like("carol", id);
			expect(token.balanceOf("carol")).toBe(FUNDS - fee(1n));

			platform.like("bob", id);
			expect(token.balanceOf("bob")).toBe(FUNDS - fee(1n) - fee(2n));
			expect(fee(2n)).toBe(12_500_000_000_000_000_000n);
		});
	});

	describe("events", () => {
		it("delivers events after commit", () => {
			const seen: Array<{ event: PlatformEvent; likes: number }> = [];
			const id = uploadText();
			platform.onEvent((event) => {
				seen.push({ event, likes: platform.getContentById(id).likes });
			});

			platform.like("voter", id);

			expect(seen).toEqual([{ event: { kind: "Liked", index: 0, type: "text" }, likes: 1 }]);
		});

		it("stays silent for failed workflows", () => {
			const listener = vi.fn();
			platform.onEvent(listener);

			expect(() => platform.like("voter", { contentType: "text", index: 0 })).toThrow();

			expect(listener).not.toHaveBeenCalled();
			expect(platform.listEvents()).toEqual([]);
		});

		it("stops after unsubscribe", () => {
			const listener = vi.fn();
			const unsubscribe = platform.onEvent(listener);
			uploadText();

			unsubscribe();
			uploadText();

			expect(listener).toHaveBeenCalledTimes(1);
		});

		it("keeps the workflow when a listener throws", () => {
			const after = vi.fn();
			platform.onEvent(() => {
				throw new Error("listener broke");
			});
			platform.onEvent(after);

			const id = uploadText();

			expect(platform.getContentLibraryLength("text")).toBe(1);
			expect(after).toHaveBeenCalledWith(
				{ kind: "Uploaded", creator: "alice", index: id.index, type: "text" },
				expect.objectContaining({ emittedAt: now }),
			);
		});
	});
});
