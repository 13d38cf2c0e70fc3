import mime from "mime";

export const OCTET_STREAM = "application/octet-stream";

/** type "/" subtype, both RFC 7230 tokens */
const MEDIA_TYPE = /^[!#$%&'*+.^_`|~0-9a-z-]+\/[!#$%&'*+.^_`|~0-9a-z-]+$/i;

/**
 * Guess the media type of a resource from its name.
 * Names without an extension, unknown extensions and registry entries that
 * are not valid media types all fall back to application/octet-stream.
 */
export function mediaTypeFor(name: string): string {
	if (!name.includes(".")) {
		return OCTET_STREAM;
	}

	const type = mime.getType(name);
	return type !== null && MEDIA_TYPE.test(type) ? type : OCTET_STREAM;
}
