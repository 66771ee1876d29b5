import type { ArchiveDiagnostic } from "./types";

/** Stable error codes for fatal archive failures. */
export type ArchiveErrorCode =
	| "BAD_MAGIC"
	| "UNEXPECTED_FIRST_MEMBER"
	| "MALFORMED_NAME"
	| "MISSING_LONG_NAMES"
	| "DUPLICATE_MEMBER"
	| "UNRESOLVED_SYMBOL_OFFSET"
	| "DUPLICATE_SYMBOL"
	| "TRUNCATED"
	| "UNTERMINATED_STRING"
	| "INVALID_TEXT"
	| "INVALID_NUMBER"
	| "OUT_OF_BOUNDS"
	| "STRICT_VIOLATION";

/** Details attached to an {@link ArchiveError}. */
export interface ArchiveErrorDetails {
	/** What the reader expected to find. */
	expected?: string;
	/** What the reader found instead. */
	found?: string;
	/** Byte offset related to the error, relative to the cursor that raised it. */
	offset?: number;
	/** Member name related to the error, if known. */
	memberName?: string;
	/** Diagnostic that was escalated in strict mode. */
	diagnostic?: ArchiveDiagnostic;
	/** Underlying cause, if any. */
	cause?: unknown;
}

/**
 * Error thrown when an archive cannot be read.
 *
 * A thrown `ArchiveError` always aborts {@link ArchiveReader.load}; the reader is left empty.
 */
export class ArchiveError extends Error {
	/** Machine-readable error code. */
	readonly code: ArchiveErrorCode;
	readonly expected?: string;
	readonly found?: string;
	readonly offset?: number;
	readonly memberName?: string;
	readonly diagnostic?: ArchiveDiagnostic;

	constructor(
		code: ArchiveErrorCode,
		message: string,
		details: ArchiveErrorDetails = {},
	) {
		super(
			message,
			details.cause !== undefined ? { cause: details.cause } : undefined,
		);
		this.name = "ArchiveError";
		this.code = code;
		this.expected = details.expected;
		this.found = details.found;
		this.offset = details.offset;
		this.memberName = details.memberName;
		this.diagnostic = details.diagnostic;
	}
}

/**
 * Renders raw bytes for error details, escaping anything that is not printable ASCII.
 */
export function describeBytes(bytes: Uint8Array): string {
	let result = "";
	for (const byte of bytes) {
		if (byte === 0x0a) result += "\\n";
		else if (byte >= 0x20 && byte < 0x7f) result += String.fromCharCode(byte);
		else result += `\\x${byte.toString(16).padStart(2, "0")}`;
	}
	return result;
}
