/** Global archive header that opens every `.lib` file. */
export const MAGIC = "!<arch>\n";

/** Size of the global archive header in bytes. */
export const MAGIC_SIZE = 8;

/** Size of a member header in bytes. */
export const HEADER_SIZE = 60;

/** Offsets and sizes of fields in a member header.
 *
 * @see https://en.wikipedia.org/wiki/Ar_(Unix)#File_header
 */
export const AR_HEADER = {
	name: { offset: 0, size: 16 },
	date: { offset: 16, size: 12 },
	userId: { offset: 28, size: 6 },
	groupId: { offset: 34, size: 6 },
	mode: { offset: 40, size: 8 },
	size: { offset: 48, size: 10 },
	terminator: { offset: 58, size: 2 },
} as const;

/** Bytes that close every member header ("`\n"). */
export const HEADER_TERMINATOR = [0x60, 0x0a] as const;

/** Byte inserted after odd-sized member content to keep headers 2-byte aligned. */
export const PADDING_BYTE = 0x0a;

/** Names of the special bookkeeping members. */
export const SPECIAL_MEMBER = {
	symbolIndex: "/",
	longNames: "//",
} as const;
