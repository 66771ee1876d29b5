import { describe, expect, it } from "vitest";
import { ByteCursor } from "../../src/core/cursor";
import { decodeSymbolIndex } from "../../src/core/symbols";
import { captureArchiveError, concat, symbolIndex } from "./fixtures";

const OFFSETS = new Map([
	[90, "a.obj"],
	[152, "b.obj"],
]);

describe("decodeSymbolIndex", () => {
	it("maps each symbol to the member at its offset", () => {
		const index = symbolIndex([
			[90, "sym1"],
			[152, "sym2"],
			[90, "sym3"],
		]);

		const symbols = decodeSymbolIndex(new ByteCursor(index), OFFSETS);

		expect([...symbols]).toEqual([
			["sym1", "a.obj"],
			["sym2", "b.obj"],
			["sym3", "a.obj"],
		]);
	});

	it("decodes an empty index", () => {
		const symbols = decodeSymbolIndex(
			new ByteCursor(new Uint8Array(4)),
			OFFSETS,
		);

		expect(symbols.size).toBe(0);
	});

	it("reads offsets as big-endian", () => {
		const index = concat(
			new Uint8Array([0, 0, 0, 1, 0, 0, 0, 152]),
			new TextEncoder().encode("only\0"),
		);

		expect(decodeSymbolIndex(new ByteCursor(index), OFFSETS).get("only")).toBe(
			"b.obj",
		);
	});

	it("accepts a symbol listed twice for the same member", () => {
		const index = symbolIndex([
			[90, "sym1"],
			[90, "sym1"],
		]);

		const symbols = decodeSymbolIndex(new ByteCursor(index), OFFSETS);

		expect([...symbols]).toEqual([["sym1", "a.obj"]]);
	});

	it("throws when a symbol is defined in two members", () => {
		const index = symbolIndex([
			[90, "sym1"],
			[152, "sym1"],
		]);

		const error = captureArchiveError(() =>
			decodeSymbolIndex(new ByteCursor(index), OFFSETS),
		);

		expect(error.code).toBe("DUPLICATE_SYMBOL");
		expect(error.message).toBe(
			'Symbol "sym1" is defined in both "a.obj" and "b.obj".',
		);
	});

	it("throws when an offset does not start a member", () => {
		const index = symbolIndex([[100, "stray"]]);

		const error = captureArchiveError(() =>
			decodeSymbolIndex(new ByteCursor(index), OFFSETS),
		);

		expect(error.code).toBe("UNRESOLVED_SYMBOL_OFFSET");
		expect(error.found).toBe("100");
	});

	it("throws when the offset table is shorter than the count", () => {
		const index = new Uint8Array([0, 0, 0, 3, 0, 0, 0, 90]);

		expect(
			captureArchiveError(() =>
				decodeSymbolIndex(new ByteCursor(index), OFFSETS),
			).code,
		).toBe("TRUNCATED");
	});

	it("throws when there are fewer names than offsets", () => {
		const index = concat(
			new Uint8Array([0, 0, 0, 2, 0, 0, 0, 90, 0, 0, 0, 152]),
			new TextEncoder().encode("sym1\0"),
		);

		expect(
			captureArchiveError(() =>
				decodeSymbolIndex(new ByteCursor(index), OFFSETS),
			).code,
		).toBe("TRUNCATED");
	});
});
