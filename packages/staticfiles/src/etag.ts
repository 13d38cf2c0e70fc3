/**
 * Entity tags: generation, formatting and If-None-Match parsing
 */

export interface ETag {
	/** Opaque tag, without quotes */
	readonly tag: string;
	readonly weak: boolean;
}

/** Parsed If-None-Match header: a list of tags, or "*" for any */
export type IfNoneMatch = readonly ETag[] | "*";

/**
 * Derive a strong entity tag from a resource's modification time and size.
 * Content is never read, so two versions with the same mtime and length
 * share a tag.
 */
export function makeETag(lastModified: number, length: number): ETag {
	return {
		tag: `${lastModified.toString(16)}-${length.toString(16)}`,
		weak: false,
	};
}

/**
 * Render an entity tag as a header value
 */
export function formatETag(etag: ETag): string {
	return `${etag.weak ? "W/" : ""}"${etag.tag}"`;
}

const ENTITY_TAG_SOURCE = String.raw`\s*(W\/)?"([^"]*)"\s*(?:,|$)`;

/**
 * Parse an If-None-Match header value.
 * Returns undefined for absent, empty or malformed values so that the
 * request is treated as unconditional.
 */
export function parseIfNoneMatch(
	value: string | null | undefined,
): IfNoneMatch | undefined {
	const trimmed = value?.trim();
	if (!trimmed) {
		return undefined;
	} else if (trimmed === "*") {
		return "*";
	}

	const pattern = new RegExp(ENTITY_TAG_SOURCE, "y");
	const tags: ETag[] = [];
	while (pattern.lastIndex < trimmed.length) {
		const match = pattern.exec(trimmed);
		if (!match) {
			return undefined;
		}
		tags.push({tag: match[2], weak: match[1] === "W/"});
	}

	return tags;
}
