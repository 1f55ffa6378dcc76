import type Database from "better-sqlite3";
import { z } from "zod";
import { ContentTypeSchema, type ContentType } from "../content/types.js";

export type PlatformEvent =
	| { kind: "Uploaded"; creator: string; index: number; type: ContentType }
	| { kind: "Liked"; index: number; type: ContentType }
	| { kind: "Disliked"; index: number; type: ContentType }
	| { kind: "Harvested"; index: number; type: ContentType; amount: bigint }
	| {
			kind: "Deleted";
			owner: string;
			contentHash: string;
			metadataHash: string;
			index: number;
			type: ContentType;
	  }
	| {
			kind: "Replied";
			replyIndex: number;
			replyType: ContentType;
			targetIndex: number;
			targetType: ContentType;
	  };

export type PlatformEventKind = PlatformEvent["kind"];

export type StoredEvent = {
	id: number;
	emittedAt: number;
	event: PlatformEvent;
};

export type EventListener = (event: PlatformEvent, stored: StoredEvent) => void;

const index = z.number().int().nonnegative();

// Amounts are stored as decimal strings; JSON has no bigint
const StoredPayloadSchema = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("Uploaded"), creator: z.string(), index, type: ContentTypeSchema }),
	z.object({ kind: z.literal("Liked"), index, type: ContentTypeSchema }),
	z.object({ kind: z.literal("Disliked"), index, type: ContentTypeSchema }),
	z.object({
		kind: z.literal("Harvested"),
		index,
		type: ContentTypeSchema,
		amount: z
			.string()
			.regex(/^\d+$/)
			.transform((value) => BigInt(value)),
	}),
	z.object({
		kind: z.literal("Deleted"),
		owner: z.string(),
		contentHash: z.string(),
		metadataHash: z.string(),
		index,
		type: ContentTypeSchema,
	}),
	z.object({
		kind: z.literal("Replied"),
		replyIndex: index,
		replyType: ContentTypeSchema,
		targetIndex: index,
		targetType: ContentTypeSchema,
	}),
]);

type EventRow = {
	id: number;
	kind: string;
	payload: string;
	emitted_at: number;
};

function serializePayload(event: PlatformEvent): string {
	return JSON.stringify(event, (_key, value: unknown) =>
		typeof value === "bigint" ? value.toString() : value,
	);
}

function rowToEvent(row: EventRow): StoredEvent {
	return {
		id: row.id,
		emittedAt: row.emitted_at,
		event: StoredPayloadSchema.parse(JSON.parse(row.payload)),
	};
}

/**
 * Append an event to the log. Call inside the workflow transaction so the
 * event disappears with a rollback.
 */
export function recordEvent(
	db: Database.Database,
	event: PlatformEvent,
	emittedAt: number,
): StoredEvent {
	const result = db
		.prepare("INSERT INTO platform_events (kind, payload, emitted_at) VALUES (?, ?, ?)")
		.run(event.kind, serializePayload(event), emittedAt);
	return { id: Number(result.lastInsertRowid), emittedAt, event };
}

export type EventQuery = {
	kind?: PlatformEventKind;
	limit?: number;
};

const DEFAULT_EVENT_LIMIT = 50;
const MAX_EVENT_LIMIT = 1000;

/**
 * Most recent events first.
 */
export function listEvents(db: Database.Database, query: EventQuery = {}): StoredEvent[] {
	const limit = Math.min(Math.max(1, query.limit ?? DEFAULT_EVENT_LIMIT), MAX_EVENT_LIMIT);
	const rows = query.kind
		? db
				.prepare<[string, number], EventRow>(
					`SELECT id, kind, payload, emitted_at FROM platform_events
					 WHERE kind = ? ORDER BY id DESC LIMIT ?`,
				)
				.all(query.kind, limit)
		: db
				.prepare<[number], EventRow>(
					"SELECT id, kind, payload, emitted_at FROM platform_events ORDER BY id DESC LIMIT ?",
				)
				.all(limit);
	return rows.map(rowToEvent);
}
