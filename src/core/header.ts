import {
	AR_HEADER,
	HEADER_TERMINATOR,
	PADDING_BYTE,
	SPECIAL_MEMBER,
} from "./constants";
import type { ByteCursor } from "./cursor";
import { ArchiveError } from "./errors";
import type { ArchiveDiagnostic, Member } from "./types";
import { bytesEqual, parseDecimal } from "./utils";

/**
 * Reads one member: its 60-byte header, its content and the pad byte that
 * follows odd-sized content. The cursor must sit at the start of the header.
 *
 * `longNames` is the long-name table recorded so far, if any. Special members
 * keep their raw "/" or "//" name.
 */
export function readMember(
	cursor: ByteCursor,
	longNames: Member | undefined,
	report: (diagnostic: ArchiveDiagnostic) => void,
): Member {
	const headerOffset = cursor.position;

	const rawName = cursor.readAscii(AR_HEADER.name.size).replace(/ +$/, "");
	const name = resolveName(rawName, longNames, headerOffset);

	const date = cursor.readAsciiInteger(AR_HEADER.date.size);
	const userId = cursor.readAscii(AR_HEADER.userId.size).replace(/ +$/, "");
	const groupId = cursor.readAscii(AR_HEADER.groupId.size).replace(/ +$/, "");
	const mode = cursor.readAsciiInteger(AR_HEADER.mode.size);
	const size = cursor.readAsciiInteger(AR_HEADER.size.size);

	const terminator = cursor.readBytes(AR_HEADER.terminator.size);
	if (!bytesEqual(terminator, HEADER_TERMINATOR)) {
		report({
			code: "header-terminator",
			offset: headerOffset,
			found: terminator,
		});
	}

	const content = cursor.readSubStream(size);

	// Members start on even offsets; odd-sized content is followed by a newline.
	if (cursor.position % 2 !== 0) {
		const [padding] = cursor.readBytes(1);
		if (padding !== PADDING_BYTE) {
			report({ code: "padding", offset: headerOffset, found: padding });
		}
	}

	return Object.freeze({ name, date, userId, groupId, mode, size, content });
}

/**
 * Resolves the trimmed name field of a header.
 *
 * Short names end with "/". Long names are stored as "/<offset>" and point
 * at a NUL-terminated string inside the long-name table.
 */
export function resolveName(
	rawName: string,
	longNames: Member | undefined,
	headerOffset: number,
): string {
	if (
		rawName === SPECIAL_MEMBER.symbolIndex ||
		rawName === SPECIAL_MEMBER.longNames
	) {
		return rawName;
	}

	if (rawName.endsWith("/")) return rawName.slice(0, -1);

	if (rawName.startsWith("/")) {
		const nameOffset = parseDecimal(rawName.slice(1));
		if (nameOffset === null || nameOffset < 0) {
			throw new ArchiveError(
				"MALFORMED_NAME",
				`Filename has unexpected format: "${rawName}".`,
				{ expected: "/<decimal offset>", found: rawName, offset: headerOffset },
			);
		}

		if (!longNames) {
			throw new ArchiveError(
				"MISSING_LONG_NAMES",
				`Member name "${rawName}" references a long-name table ` +
					"that has not been read.",
				{ expected: "// member", found: rawName, offset: headerOffset },
			);
		}

		return longNames.content.clone().readCString(nameOffset);
	}

	throw new ArchiveError(
		"MALFORMED_NAME",
		`Filename has unexpected format: "${rawName}".`,
		{
			expected: 'name ending in "/" or "/<offset>"',
			found: rawName,
			offset: headerOffset,
		},
	);
}
