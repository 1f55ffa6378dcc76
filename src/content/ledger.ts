/**
 * Type-partitioned content storage with a symmetric reply graph.
 *
 * Each content type owns a dense, append-only collection. A record's
 * index is fixed at creation and never reused: deletion leaves a zeroed
 * tombstone in the slot so reply edges held by other records stay valid.
 */

import type Database from "better-sqlite3";
import { PlatformError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import {
	type ContentFields,
	type ContentId,
	type ContentRecord,
	type ContentType,
	contentTypeAt,
	contentTypeIndex,
	emptyContentFields,
	formatContentId,
} from "./types.js";

const logger = getChildLogger({ module: "content-ledger" });

type ContentRow = {
	owner: string;
	content_hash: string;
	metadata_hash: string;
	likes: number;
	dislikes: number;
	harvested_likes: number;
};

type EdgeRow = {
	other_type: number;
	other_idx: number;
};

export class ContentLedger {
	constructor(private readonly db: Database.Database) {}

	/**
	 * Number of slots ever allocated for `type`, tombstones included.
	 */
	length(type: ContentType): number {
		const row = this.db
			.prepare<[number], { count: number }>(
				"SELECT COUNT(*) AS count FROM content WHERE content_type = ?",
			)
			.get(contentTypeIndex(type));
		return row?.count ?? 0;
	}

	create(fields: ContentFields, type: ContentType): ContentId {
		const index = this.length(type);
		this.db
			.prepare(
				`INSERT INTO content
					(content_type, idx, owner, content_hash, metadata_hash, likes, dislikes, harvested_likes)
				 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
			)
			.run(
				contentTypeIndex(type),
				index,
				fields.owner,
				fields.contentHash,
				fields.metadataHash,
				fields.likes,
				fields.dislikes,
				fields.harvestedLikes,
			);
		const id: ContentId = { contentType: type, index };
		logger.debug({ id: formatContentId(id), owner: fields.owner }, "content created");
		return id;
	}

	get(id: ContentId): ContentRecord {
		const row = this.getRow(id);
		return {
			owner: row.owner,
			contentHash: row.content_hash,
			metadataHash: row.metadata_hash,
			likes: row.likes,
			dislikes: row.dislikes,
			harvestedLikes: row.harvested_likes,
			repliesTo: this.repliesOf(id),
			repliedBy: this.repliedByOf(id),
		};
	}

	/**
	 * Overwrite every writable field of the slot.
	 */
	update(id: ContentId, fields: ContentFields): void {
		this.assertExists(id);
		this.db
			.prepare(
				`UPDATE content
				 SET owner = ?, content_hash = ?, metadata_hash = ?, likes = ?, dislikes = ?, harvested_likes = ?
				 WHERE content_type = ? AND idx = ?`,
			)
			.run(
				fields.owner,
				fields.contentHash,
				fields.metadataHash,
				fields.likes,
				fields.dislikes,
				fields.harvestedLikes,
				contentTypeIndex(id.contentType),
				id.index,
			);
	}

	/**
	 * Tombstone the slot. Edges other records hold toward it are kept.
	 */
	delete(id: ContentId): void {
		this.assertExists(id);
		const type = contentTypeIndex(id.contentType);
		this.db.transaction(() => {
			this.update(id, emptyContentFields());
			this.db
				.prepare("DELETE FROM content_replies WHERE content_type = ? AND idx = ?")
				.run(type, id.index);
			this.db
				.prepare("DELETE FROM content_replied_by WHERE content_type = ? AND idx = ?")
				.run(type, id.index);
		})();
		logger.debug({ id: formatContentId(id) }, "content tombstoned");
	}

	/**
	 * Record that `replyId` replies to `targetId`, on both ends at once.
	 */
	link(replyId: ContentId, targetId: ContentId): void {
		this.assertExists(replyId);
		this.assertExists(targetId);
		const replyType = contentTypeIndex(replyId.contentType);
		const targetType = contentTypeIndex(targetId.contentType);
		this.db.transaction(() => {
			this.db
				.prepare(
					`INSERT INTO content_replies (content_type, idx, target_type, target_idx)
					 VALUES (?, ?, ?, ?)`,
				)
				.run(replyType, replyId.index, targetType, targetId.index);
			this.db
				.prepare(
					`INSERT INTO content_replied_by (content_type, idx, reply_type, reply_idx)
					 VALUES (?, ?, ?, ?)`,
				)
				.run(targetType, targetId.index, replyType, replyId.index);
		})();
		logger.debug(
			{ reply: formatContentId(replyId), target: formatContentId(targetId) },
			"reply linked",
		);
	}

	repliesOf(id: ContentId): ContentId[] {
		this.assertExists(id);
		return this.edges(
			`SELECT target_type AS other_type, target_idx AS other_idx
			 FROM content_replies
			 WHERE content_type = ? AND idx = ?
			 ORDER BY seq ASC`,
			id,
		);
	}

	repliedByOf(id: ContentId): ContentId[] {
		this.assertExists(id);
		return this.edges(
			`SELECT reply_type AS other_type, reply_idx AS other_idx
			 FROM content_replied_by
			 WHERE content_type = ? AND idx = ?
			 ORDER BY seq ASC`,
			id,
		);
	}

	private edges(sql: string, id: ContentId): ContentId[] {
		return this.db
			.prepare<[number, number], EdgeRow>(sql)
			.all(contentTypeIndex(id.contentType), id.index)
			.map((row) => ({ contentType: contentTypeAt(row.other_type), index: row.other_idx }));
	}

	private getRow(id: ContentId): ContentRow {
		const row = this.db
			.prepare<[number, number], ContentRow>(
				`SELECT owner, content_hash, metadata_hash, likes, dislikes, harvested_likes
				 FROM content
				 WHERE content_type = ? AND idx = ?`,
			)
			.get(contentTypeIndex(id.contentType), id.index);
		if (!row) {
			throw notFound(id, this.length(id.contentType));
		}
		return row;
	}

	private assertExists(id: ContentId): void {
		const length = this.length(id.contentType);
		if (!Number.isSafeInteger(id.index) || id.index < 0 || id.index >= length) {
			throw notFound(id, length);
		}
	}
}

function notFound(id: ContentId, length: number): PlatformError {
	return new PlatformError(
		"NotFound",
		`content ${formatContentId(id)} is out of range (collection length ${length})`,
	);
}
