import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { listEvents, recordEvent } from "../../src/platform/events.js";
import { openDatabase } from "../../src/storage/db.js";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

describe("platform events", () => {
	let db: Database.Database;

	beforeEach(() => {
		db = openDatabase(":memory:");
	});

	afterEach(() => {
		db.close();
	});

	it("returns stored events newest first", () => {
		recordEvent(db, { kind: "Uploaded", creator: "alice", index: 0, type: "video" }, 100);
		recordEvent(db, { kind: "Liked", index: 0, type: "video" }, 200);

		expect(listEvents(db)).toEqual([
			{ id: 2, emittedAt: 200, event: { kind: "Liked", index: 0, type: "video" } },
			{
				id: 1,
				emittedAt: 100,
				event: { kind: "Uploaded", creator: "alice", index: 0, type: "video" },
			},
		]);
	});

	it("keeps harvested amounts exact", () => {
		const amount = 123_456_789_000_000_000_000_000_001n;
		recordEvent(db, { kind: "Harvested", index: 3, type: "podcast", amount }, 1);

		const [stored] = listEvents(db);
		expect(stored?.event).toEqual({ kind: "Harvested", index: 3, type: "podcast", amount });
	});

	it("filters by kind and limits the result", () => {
		for (let i = 0; i < 4; i++) {
			recordEvent(db, { kind: "Disliked", index: i, type: "text" }, i);
		}
		recordEvent(db, { kind: "Liked", index: 9, type: "text" }, 10);

		const disliked = listEvents(db, { kind: "Disliked", limit: 2 });
		expect(disliked.map((stored) => stored.event)).toEqual([
			{ kind: "Disliked", index: 3, type: "text" },
			{ kind: "Disliked", index: 2, type: "text" },
		]);
		expect(listEvents(db, { kind: "Replied" })).toEqual([]);
	});

	it("disappears with a rolled back transaction", () => {
		const failing = db.transaction(() => {
			recordEvent(db, { kind: "Liked", index: 0, type: "text" }, 1);
			throw new Error("abort");
		});

		expect(() => failing()).toThrow("abort");
		expect(listEvents(db)).toEqual([]);
	});
});
