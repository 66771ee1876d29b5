import type { ByteCursor } from "./cursor";

/**
 * Raw archive bytes. An `ArrayBuffer` is wrapped without copying.
 */
export type ArchiveData = Uint8Array | ArrayBuffer;

/**
 * One entry of an archive, as described by its 60-byte header.
 */
export interface Member {
	/** Resolved member name. Special members keep their raw marker ("/" or "//"). */
	readonly name: string;
	/** Modification time in seconds since the epoch. */
	readonly date: number;
	/** Owner user ID as text. Usually empty in `.lib` files. */
	readonly userId: string;
	/** Owner group ID as text. Usually empty in `.lib` files. */
	readonly groupId: string;
	/** Mode field, decoded as a decimal integer. */
	readonly mode: number;
	/** Size of the content in bytes, excluding the alignment pad byte. */
	readonly size: number;
	/**
	 * Zero-copy view over the member's content.
	 *
	 * The cursor is shared by everyone holding this member, so reading from it
	 * moves its position for all of them. Read through `content.clone(true)` or
	 * take `content.bytes` instead.
	 */
	readonly content: ByteCursor;
}

/** Member header ended with something other than "`\n". */
export interface HeaderTerminatorDiagnostic {
	code: "header-terminator";
	offset: number;
	found: Uint8Array;
}

/** The byte after odd-sized content was not a newline. */
export interface PaddingDiagnostic {
	code: "padding";
	offset: number;
	found: number;
}

/** The member after the first symbol index was not a second index. */
export interface MissingSecondIndexDiagnostic {
	code: "missing-second-index";
	offset: number;
	/** Name of the member found in its place. */
	name: string;
}

/** A second long-name table was found and ignored. */
export interface DuplicateLongNamesDiagnostic {
	code: "duplicate-long-names";
	offset: number;
}

/**
 * Non-fatal anomaly found while reading an archive. `offset` is the
 * header-start offset of the member concerned.
 */
export type ArchiveDiagnostic =
	| HeaderTerminatorDiagnostic
	| PaddingDiagnostic
	| MissingSecondIndexDiagnostic
	| DuplicateLongNamesDiagnostic;

/**
 * Configuration options for reading an archive.
 */
export interface ReaderOptions {
	/**
	 * Treat every diagnostic as fatal. The diagnostic is still delivered to
	 * `onDiagnostic` before the error is thrown.
	 * @default false
	 */
	strict?: boolean;
	/** Receives non-fatal anomalies in the order they are found. */
	onDiagnostic?: (diagnostic: ArchiveDiagnostic) => void;
}
