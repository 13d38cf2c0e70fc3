import {test, expect, describe} from "vitest";
import {formatETag, makeETag, parseIfNoneMatch} from "../src/etag.js";

describe("makeETag", () => {
	test("joins hex mtime and hex length", () => {
		expect(makeETag(1700000000000, 10)).toEqual({
			tag: "18bcfe56800-a",
			weak: false,
		});
		expect(makeETag(0, 0).tag).toBe("0-0");
		expect(makeETag(255, 4096).tag).toBe("ff-1000");
	});

	test("is deterministic", () => {
		expect(makeETag(1234, 5678)).toEqual(makeETag(1234, 5678));
	});

	test("gives distinct pairs distinct tags", () => {
		const values = [0, 1, 15, 16, 255, 256, 1700000000000];
		const tags = new Set<string>();
		for (const lastModified of values) {
			for (const length of values) {
				tags.add(makeETag(lastModified, length).tag);
			}
		}
		expect(tags.size).toBe(values.length * values.length);
	});
});

describe("formatETag", () => {
	test("quotes strong tags", () => {
		expect(formatETag({tag: "abc-1", weak: false})).toBe('"abc-1"');
	});

	test("prefixes weak tags", () => {
		expect(formatETag({tag: "abc-1", weak: true})).toBe('W/"abc-1"');
	});
});

describe("parseIfNoneMatch", () => {
	test("parses a single tag", () => {
		expect(parseIfNoneMatch('"abc-1"')).toEqual([{tag: "abc-1", weak: false}]);
	});

	test("parses lists with weak tags and whitespace", () => {
		expect(parseIfNoneMatch(' "a" ,W/"b",  "c, d" ')).toEqual([
			{tag: "a", weak: false},
			{tag: "b", weak: true},
			{tag: "c, d", weak: false},
		]);
	});

	test("parses the wildcard", () => {
		expect(parseIfNoneMatch("*")).toBe("*");
		expect(parseIfNoneMatch(" * ")).toBe("*");
	});

	test("treats absent and empty values as absent", () => {
		expect(parseIfNoneMatch(null)).toBeUndefined();
		expect(parseIfNoneMatch(undefined)).toBeUndefined();
		expect(parseIfNoneMatch("   ")).toBeUndefined();
	});

	test("treats malformed values as absent", () => {
		expect(parseIfNoneMatch("abc-1")).toBeUndefined();
		expect(parseIfNoneMatch('"a" "b"')).toBeUndefined();
		expect(parseIfNoneMatch('"unterminated')).toBeUndefined();
		expect(parseIfNoneMatch('"a", *')).toBeUndefined();
	});
});
