import {test, expect, describe} from "vitest";
import {OCTET_STREAM, mediaTypeFor} from "../src/media-type.js";

describe("mediaTypeFor", () => {
	test("resolves known extensions", () => {
		expect(mediaTypeFor("img.gif")).toBe("image/gif");
		expect(mediaTypeFor("notes.txt")).toBe("text/plain");
		expect(mediaTypeFor("index.html")).toBe("text/html");
		expect(mediaTypeFor("site.css")).toBe("text/css");
	});

	test("ignores extension case", () => {
		expect(mediaTypeFor("PHOTO.PNG")).toBe("image/png");
	});

	test("falls back for names without an extension", () => {
		expect(mediaTypeFor("f1")).toBe(OCTET_STREAM);
		expect(mediaTypeFor("txt")).toBe("application/octet-stream");
	});

	test("falls back for unknown extensions", () => {
		expect(mediaTypeFor("archive.not-a-real-extension")).toBe(OCTET_STREAM);
		expect(mediaTypeFor("trailing.")).toBe(OCTET_STREAM);
	});
});
