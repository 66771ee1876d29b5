import { describe, expect, it } from "vitest";
import { ByteCursor } from "../../src/core/cursor";
import { readMember, resolveName } from "../../src/core/header";
import type { ArchiveDiagnostic, Member } from "../../src/core/types";
import { decoder } from "../../src/core/utils";
import { captureArchiveError, concat, header, member } from "./fixtures";

function longNameTable(content: string): Member {
	const data = member("//", content);
	return readMember(new ByteCursor(data), undefined, () => {});
}

function read(data: Uint8Array, longNames?: Member) {
	const diagnostics: ArchiveDiagnostic[] = [];
	const cursor = new ByteCursor(data);
	const result = readMember(cursor, longNames, (d) => diagnostics.push(d));
	return { member: result, diagnostics, cursor };
}

describe("member headers", () => {
	describe("readMember", () => {
		it("decodes every header field", () => {
			const { member: m, diagnostics } = read(
				member("hello.obj/", "AB", {
					date: 1234567890,
					userId: "501",
					groupId: "20",
					mode: 100644,
				}),
			);

			expect(m.name).toBe("hello.obj");
			expect(m.date).toBe(1234567890);
			expect(m.userId).toBe("501");
			expect(m.groupId).toBe("20");
			expect(m.mode).toBe(100644);
			expect(m.size).toBe(2);
			expect(decoder.decode(m.content.bytes)).toBe("AB");
			expect(diagnostics).toEqual([]);
		});

		it("keeps empty user and group IDs as empty text", () => {
			const { member: m } = read(member("a.obj/", "AB"));

			expect(m.userId).toBe("");
			expect(m.groupId).toBe("");
		});

		it("returns frozen members", () => {
			const { member: m } = read(member("a.obj/", "AB"));

			expect(Object.isFrozen(m)).toBe(true);
		});

		it("exposes content as a view into the input buffer", () => {
			const data = member("a.obj/", "XYZW");
			const { member: m } = read(data);

			expect(m.content.length).toBe(4);
			expect(m.content.bytes.buffer).toBe(data.buffer);
			expect(m.content.bytes.byteOffset).toBe(60);
		});

		it("leaves special markers unresolved", () => {
			expect(read(member("/", "")).member.name).toBe("/");
			expect(read(member("//", "")).member.name).toBe("//");
		});

		it("consumes the newline pad after odd-sized content", () => {
			const data = concat(member("a.obj/", "ABC"), member("b.obj/", "DD"));
			const { member: m, cursor, diagnostics } = read(data);

			expect(m.size).toBe(3);
			expect(cursor.position).toBe(64);
			expect(diagnostics).toEqual([]);
			expect(readMember(cursor, undefined, () => {}).name).toBe("b.obj");
		});

		it("reports a pad byte that is not a newline", () => {
			const { member: m, cursor, diagnostics } = read(
				member("a.obj/", "ABC", { padding: 0x20 }),
			);

			expect(decoder.decode(m.content.bytes)).toBe("ABC");
			expect(cursor.moreToRead()).toBe(false);
			expect(diagnostics).toEqual([{ code: "padding", offset: 0, found: 0x20 }]);
		});

		it("throws when the data ends where a pad byte belongs", () => {
			const diagnostics: ArchiveDiagnostic[] = [];
			const data = member("a.obj/", "ABC", { padding: null });

			const error = captureArchiveError(() =>
				readMember(new ByteCursor(data), undefined, (d) =>
					diagnostics.push(d),
				),
			);

			expect(error.code).toBe("TRUNCATED");
			expect(error.offset).toBe(63);
			expect(error.expected).toBe("1 bytes");
			expect(error.found).toBe("0 bytes");
			expect(diagnostics).toEqual([]);
		});

		it("reports an unexpected header terminator and keeps going", () => {
			const { member: m, diagnostics } = read(
				member("a.obj/", "AB", { terminator: "XY" }),
			);

			expect(m.name).toBe("a.obj");
			expect(diagnostics).toEqual([
				{
					code: "header-terminator",
					offset: 0,
					found: new Uint8Array([0x58, 0x59]),
				},
			]);
		});

		it("pads based on the absolute position of the content", () => {
			// A leading byte puts the header at an odd offset, so even content ends odd.
			const data = concat(
				new Uint8Array([0]),
				member("a.obj/", "AB"),
				new Uint8Array([0x0a]),
			);
			const cursor = new ByteCursor(data);
			cursor.seek(1);
			const diagnostics: ArchiveDiagnostic[] = [];
			readMember(cursor, undefined, (d) => diagnostics.push(d));

			expect(cursor.position).toBe(64);
			expect(diagnostics).toEqual([]);
		});

		it("throws when the header is truncated", () => {
			const data = header("a.obj/", 2).subarray(0, 40);

			expect(captureArchiveError(() => read(data)).code).toBe("TRUNCATED");
		});

		it("throws when content is shorter than the declared size", () => {
			const data = concat(header("a.obj/", 10), new Uint8Array(4));

			expect(captureArchiveError(() => read(data)).code).toBe("TRUNCATED");
		});

		it("throws on a non-numeric size field", () => {
			const data = header("a.obj/", 0);
			data.set([0x78], 48);

			expect(captureArchiveError(() => read(data)).code).toBe("INVALID_NUMBER");
		});
	});

	describe("resolveName", () => {
		it("strips the trailing slash from short names", () => {
			expect(resolveName("a.obj/", undefined, 0)).toBe("a.obj");
		});

		it("resolves long names through the lookup table", () => {
			const longNames = longNameTable("foo.obj\0bar.obj\0");

			expect(resolveName("/0", longNames, 0)).toBe("foo.obj");
			expect(resolveName("/8", longNames, 0)).toBe("bar.obj");
		});

		it("does not move the lookup table's cursor", () => {
			const longNames = longNameTable("foo.obj\0bar.obj\0");
			resolveName("/8", longNames, 0);

			expect(longNames.content.position).toBe(0);
		});

		it("prefers the short-name rule for names with slashes at both ends", () => {
			expect(resolveName("/12/", undefined, 0)).toBe("/12");
		});

		it("throws when no lookup table has been read", () => {
			const error = captureArchiveError(() => resolveName("/0", undefined, 68));

			expect(error.code).toBe("MISSING_LONG_NAMES");
			expect(error.found).toBe("/0");
			expect(error.offset).toBe(68);
		});

		it("throws on a non-numeric long-name reference", () => {
			const longNames = longNameTable("foo.obj\0");
			const error = captureArchiveError(() => resolveName("/abc", longNames, 0));

			expect(error.code).toBe("MALFORMED_NAME");
			expect(error.message).toBe('Filename has unexpected format: "/abc".');
		});

		it("throws on names without a slash", () => {
			const error = captureArchiveError(() => resolveName("a.obj", undefined, 0));

			expect(error.code).toBe("MALFORMED_NAME");
			expect(error.found).toBe("a.obj");
		});

		it("throws on an empty name", () => {
			expect(captureArchiveError(() => resolveName("", undefined, 0)).code).toBe(
				"MALFORMED_NAME",
			);
		});

		it("throws when a long-name offset is past the table", () => {
			const longNames = longNameTable("foo.obj\0");

			expect(
				captureArchiveError(() => resolveName("/40", longNames, 0)).code,
			).toBe("OUT_OF_BOUNDS");
		});

		it("throws when a long name is not terminated", () => {
			const longNames = longNameTable("foo.obj\0bar");

			expect(
				captureArchiveError(() => resolveName("/8", longNames, 0)).code,
			).toBe("UNTERMINATED_STRING");
		});
	});
});
