import type { ByteCursor } from "./cursor";
import { ArchiveError } from "./errors";

/**
 * Decodes the first symbol index into a symbol name → member name map.
 *
 * The index holds a big-endian symbol count, then one big-endian header-start
 * offset per symbol, then the symbol names as consecutive NUL-terminated
 * strings in the same order. Each offset is resolved through
 * `memberNameByOffset`, built while cataloging members.
 */
export function decodeSymbolIndex(
	index: ByteCursor,
	memberNameByOffset: ReadonlyMap<number, string>,
): Map<string, string> {
	const symbolCount = index.readBigEndianDword();
	const offsets = index.readSubStream(4 * symbolCount);
	const names = index.readSubStream();

	const symbols = new Map<string, string>();
	for (let i = 0; i < symbolCount; i++) {
		const memberOffset = offsets.readBigEndianDword();
		const symbol = names.readCString();

		const memberName = memberNameByOffset.get(memberOffset);
		if (memberName === undefined) {
			throw new ArchiveError(
				"UNRESOLVED_SYMBOL_OFFSET",
				`Symbol "${symbol}" points at offset ${memberOffset}, where no member starts.`,
				{ expected: "member header offset", found: String(memberOffset) },
			);
		}

		const existing = symbols.get(symbol);
		if (existing !== undefined && existing !== memberName) {
			throw new ArchiveError(
				"DUPLICATE_SYMBOL",
				`Symbol "${symbol}" is defined in both "${existing}" and "${memberName}".`,
				{ expected: existing, found: memberName, memberName },
			);
		}

		symbols.set(symbol, memberName);
	}

	return symbols;
}
