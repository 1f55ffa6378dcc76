import { z } from "zod";

/**
 * The fixed content partition. Order matters: a type's position is its
 * storage index and must never change.
 */
export const CONTENT_TYPES = [
	"text",
	"image",
	"video",
	"audio",
	"link",
	"article",
	"poll",
	"comment",
	"story",
	"livestream",
	"podcast",
	"document",
	"event",
	"animation",
	"sticker",
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export const ContentTypeSchema = z.enum(CONTENT_TYPES);

export const ZERO_HASH = `0x${"0".repeat(64)}`;

/** 32-byte digest as 0x-prefixed hex, normalized to lowercase. */
export const Hash32Schema = z
	.string()
	.regex(/^0x[0-9a-fA-F]{64}$/, { message: "expected a 0x-prefixed 32-byte hex digest" })
	.transform((value) => value.toLowerCase());

export type Hash32 = string;

export type ContentId = {
	contentType: ContentType;
	index: number;
};

export type ContentRecord = {
	owner: string;
	contentHash: Hash32;
	metadataHash: Hash32;
	likes: number;
	dislikes: number;
	harvestedLikes: number;
	repliesTo: ContentId[];
	repliedBy: ContentId[];
};

/** Fields a caller may write; reply lists only change through link/delete. */
export type ContentFields = Omit<ContentRecord, "repliesTo" | "repliedBy">;

export function contentTypeIndex(type: ContentType): number {
	return CONTENT_TYPES.indexOf(type);
}

export function contentTypeAt(index: number): ContentType {
	const type = CONTENT_TYPES[index];
	if (type === undefined) {
		throw new Error(`unknown content type index ${index}`);
	}
	return type;
}

export function isContentType(value: string): value is ContentType {
	return ContentTypeSchema.safeParse(value).success;
}

export function formatContentId(id: ContentId): string {
	return `${id.contentType}#${id.index}`;
}

export function emptyContentFields(): ContentFields {
	return {
		owner: "",
		contentHash: ZERO_HASH,
		metadataHash: ZERO_HASH,
		likes: 0,
		dislikes: 0,
		harvestedLikes: 0,
	};
}
