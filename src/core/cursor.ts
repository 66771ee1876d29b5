import { ArchiveError } from "./errors";
import { decoder, parseDecimal } from "./utils";

/**
 * A window over a shared byte buffer with a read position.
 *
 * Reads advance the position and never copy: byte results and sub-streams are
 * views into the same underlying buffer. Positions are relative to the start
 * of the window. Every read method with a `length` parameter reads the rest of
 * the window when `length` is omitted, and every read method accepts an
 * optional absolute `seek` applied before reading.
 *
 * @example
 * ```typescript
 * const cursor = new ByteCursor(bytes);
 * const count = cursor.readBigEndianDword();
 * const offsets = cursor.readSubStream(4 * count);
 * const names = cursor.readSubStream();
 * ```
 */
export class ByteCursor {
	readonly #buffer: Uint8Array;
	readonly #start: number;
	readonly #end: number;
	#position: number;

	constructor(
		buffer: Uint8Array,
		start = 0,
		end = buffer.length,
		position = 0,
	) {
		if (start < 0 || end > buffer.length || start > end) {
			throw new ArchiveError(
				"OUT_OF_BOUNDS",
				`Window [${start}, ${end}) does not fit a buffer of ` +
					`${buffer.length} bytes.`,
			);
		}

		this.#buffer = buffer;
		this.#start = start;
		this.#end = end;
		this.#position = start;
		this.seek(position);
	}

	/** Read position relative to the start of the window. */
	get position(): number {
		return this.#position - this.#start;
	}

	/** Total size of the window in bytes. */
	get length(): number {
		return this.#end - this.#start;
	}

	/** Bytes left between the read position and the end of the window. */
	get remaining(): number {
		return this.#end - this.#position;
	}

	/** The whole window, independent of the read position. */
	get bytes(): Uint8Array {
		return this.#buffer.subarray(this.#start, this.#end);
	}

	moreToRead(): boolean {
		return this.#position < this.#end;
	}

	seek(position: number): void {
		if (!Number.isInteger(position) || position < 0 || position > this.length) {
			throw new ArchiveError(
				"OUT_OF_BOUNDS",
				`Cannot seek to ${position} in a window of ${this.length} bytes.`,
				{ offset: position },
			);
		}
		this.#position = this.#start + position;
	}

	/**
	 * Creates an independent cursor over the same window, either at the current
	 * position or, when `reset` is set, at the start.
	 */
	clone(reset = false): ByteCursor {
		return new ByteCursor(
			this.#buffer,
			this.#start,
			this.#end,
			reset ? 0 : this.position,
		);
	}

	readBytes(length?: number, seek?: number): Uint8Array {
		const [from, to] = this.#take(length, seek);
		return this.#buffer.subarray(from, to);
	}

	readAscii(length?: number, seek?: number): string {
		const offset = seek ?? this.position;
		return decodeText(this.readBytes(length, seek), offset);
	}

	readAsciiInteger(length?: number, seek?: number): number {
		const offset = seek ?? this.position;
		const text = this.readAscii(length, seek);
		const value = parseDecimal(text);
		if (value === null) {
			throw new ArchiveError(
				"INVALID_NUMBER",
				`Expected a decimal integer at offset ${offset}, found "${text}".`,
				{ expected: "decimal integer", found: text, offset },
			);
		}
		return value;
	}

	readBigEndianDword(seek?: number): number {
		const bytes = this.readBytes(4, seek);
		// Multiply the high byte so values above 2^31 stay positive.
		return bytes[0] * 0x1000000 + ((bytes[1] << 16) | (bytes[2] << 8) | bytes[3]);
	}

	/**
	 * Reads a NUL-terminated string and moves past the terminator.
	 */
	readCString(seek?: number): string {
		if (seek !== undefined) this.seek(seek);

		const offset = this.position;
		if (!this.moreToRead()) {
			throw new ArchiveError(
				"TRUNCATED",
				`No data left to read a string at offset ${offset}.`,
				{ offset },
			);
		}

		const terminator = this.#buffer.indexOf(0, this.#position);
		if (terminator === -1 || terminator >= this.#end) {
			throw new ArchiveError(
				"UNTERMINATED_STRING",
				`String at offset ${offset} is not terminated within ` +
					`${this.remaining} bytes.`,
				{ expected: "NUL terminator", offset },
			);
		}

		const text = decodeText(
			this.#buffer.subarray(this.#position, terminator),
			offset,
		);
		this.#position = terminator + 1;
		return text;
	}

	/**
	 * Returns a cursor bound to the next `length` bytes and moves past them.
	 */
	readSubStream(length?: number, seek?: number): ByteCursor {
		const [from, to] = this.#take(length, seek);
		return new ByteCursor(this.#buffer, from, to);
	}

	// Validates a read, advances past it and returns its absolute range.
	#take(
		length: number | undefined,
		seek: number | undefined,
	): [number, number] {
		if (seek !== undefined) this.seek(seek);

		if (length === undefined) {
			const from = this.#position;
			this.#position = this.#end;
			return [from, this.#end];
		}

		if (!Number.isInteger(length) || length < 0) {
			throw new ArchiveError(
				"OUT_OF_BOUNDS",
				`Invalid read length ${length} at offset ${this.position}.`,
				{ offset: this.position },
			);
		}

		if (length > this.remaining) {
			throw new ArchiveError(
				"TRUNCATED",
				`Insufficient data to read ${length} bytes at offset ` +
					`${this.position}; ${this.remaining} remain.`,
				{
					expected: `${length} bytes`,
					found: `${this.remaining} bytes`,
					offset: this.position,
				},
			);
		}

		const from = this.#position;
		this.#position += length;
		return [from, this.#position];
	}
}

function decodeText(bytes: Uint8Array, offset: number): string {
	try {
		return decoder.decode(bytes);
	} catch (error) {
		throw new ArchiveError(
			"INVALID_TEXT",
			`Invalid UTF-8 text at offset ${offset}.`,
			{ expected: "UTF-8 text", offset, cause: error },
		);
	}
}
