/**
 * Conditional request evaluation (If-None-Match / If-Modified-Since)
 */

import type {ETag, IfNoneMatch} from "./etag.js";

/** The conditional headers of a request, already parsed */
export interface ConditionalHeaders {
	/** If-Modified-Since in epoch milliseconds */
	readonly ifModifiedSince?: number;
	readonly ifNoneMatch?: IfNoneMatch;
}

/**
 * Decide whether a resource must be sent in full.
 *
 * When the resource has an ETag, If-None-Match alone decides: the resource
 * is modified unless one of the listed tags equals its tag (weakness is
 * ignored), and a request without If-None-Match always gets the full
 * resource, whatever If-Modified-Since says. Without an ETag the decision
 * falls back to If-Modified-Since.
 */
export function isModified(
	request: ConditionalHeaders,
	etag: ETag | undefined,
	lastModified: number,
): boolean {
	if (etag === undefined) {
		return isModifiedSince(request, lastModified);
	}

	const {ifNoneMatch} = request;
	if (ifNoneMatch === "*") {
		return false;
	} else if (ifNoneMatch && ifNoneMatch.length > 0) {
		return ifNoneMatch.every((candidate) => candidate.tag !== etag.tag);
	}

	return true;
}

/**
 * Date-only check: modified when strictly newer than If-Modified-Since,
 * or when the header is absent
 */
export function isModifiedSince(
	request: ConditionalHeaders,
	lastModified: number,
): boolean {
	const {ifModifiedSince} = request;
	return ifModifiedSince === undefined || lastModified > ifModifiedSince;
}

// ============================================================================
// HTTP-DATE PARSING
// ============================================================================

const MONTHS = [
	"Jan",
	"Feb",
	"Mar",
	"Apr",
	"May",
	"Jun",
	"Jul",
	"Aug",
	"Sep",
	"Oct",
	"Nov",
	"Dec",
];
const MONTH = `(${MONTHS.join("|")})`;
const TIME = String.raw`(\d{2}):(\d{2}):(\d{2})`;

// Sun, 06 Nov 1994 08:49:37 GMT
const IMF_FIXDATE = new RegExp(
	String.raw`^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{2}) ${MONTH} (\d{4}) ${TIME} GMT$`,
);
// Sunday, 06-Nov-94 08:49:37 GMT
const RFC850_DATE = new RegExp(
	String.raw`^(?:Mon|Tues|Wednes|Thurs|Fri|Satur|Sun)day, (\d{2})-${MONTH}-(\d{2}) ${TIME} GMT$`,
);
// Sun Nov  6 08:49:37 1994
const ASCTIME_DATE = new RegExp(
	String.raw`^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) ${MONTH} ([ \d]\d) ${TIME} (\d{4})$`,
);

/**
 * Parse an HTTP-date (IMF-fixdate, or the obsolete RFC 850 and asctime
 * forms) into epoch milliseconds.
 * Returns undefined for absent or malformed values.
 */
export function parseHTTPDate(
	value: string | null | undefined,
): number | undefined {
	const trimmed = value?.trim();
	if (!trimmed) {
		return undefined;
	}

	let match = IMF_FIXDATE.exec(trimmed);
	if (match) {
		const [, day, month, year, hours, minutes, seconds] = match;
		return toEpoch(+year, month, +day, +hours, +minutes, +seconds);
	}

	match = RFC850_DATE.exec(trimmed);
	if (match) {
		const [, day, month, year, hours, minutes, seconds] = match;
		// Two-digit years: 70-99 are 19xx, the rest 20xx
		const fullYear = +year < 70 ? 2000 + +year : 1900 + +year;
		return toEpoch(fullYear, month, +day, +hours, +minutes, +seconds);
	}

	match = ASCTIME_DATE.exec(trimmed);
	if (match) {
		const [, month, day, hours, minutes, seconds, year] = match;
		return toEpoch(+year, month, +day, +hours, +minutes, +seconds);
	}

	return undefined;
}

function toEpoch(
	year: number,
	monthName: string,
	day: number,
	hours: number,
	minutes: number,
	seconds: number,
): number | undefined {
	const month = MONTHS.indexOf(monthName);
	if (hours > 23 || minutes > 59 || seconds > 59) {
		return undefined;
	}

	// Years below 100 stay as written
	const date = new Date(0);
	date.setUTCFullYear(year, month, day);
	date.setUTCHours(hours, minutes, seconds, 0);
	// Reject days that roll over into the next month, e.g. 31 Feb
	if (date.getUTCDate() !== day || date.getUTCMonth() !== month) {
		return undefined;
	}

	return date.getTime();
}
