import { MAGIC, MAGIC_SIZE, SPECIAL_MEMBER } from "./constants";
import { ByteCursor } from "./cursor";
import { ArchiveError, describeBytes } from "./errors";
import { readMember } from "./header";
import { decodeSymbolIndex } from "./symbols";
import type {
	ArchiveData,
	ArchiveDiagnostic,
	Member,
	ReaderOptions,
} from "./types";
import { bytesEqual, encoder, toUint8Array } from "./utils";

const MAGIC_BYTES = encoder.encode(MAGIC);

/**
 * Reads the `ar` container of a Windows `.lib` file.
 *
 * `load` catalogs every regular member and maps each symbol from the first
 * symbol index to the name of the member that defines it. The symbol index
 * ("/") and long-name table ("//") are kept apart from `members`. Member
 * contents are views into the loaded buffer, which is never copied.
 *
 * A reader holds the result of one `load`; calling `load` again replaces it.
 *
 * @example
 * ```typescript
 * import { ArchiveReader } from 'winlib-ar';
 *
 * const reader = new ArchiveReader(bytes);
 * const member = reader.memberForSymbol('__imp_CreateFileW');
 * console.log(member?.name, member?.content.length);
 * ```
 */
export class ArchiveReader {
	#members = new Map<string, Member>();
	#symbolMemberMap = new Map<string, string>();
	#symbolIndex: Member | undefined;
	#longNames: Member | undefined;
	#diagnostics: ArchiveDiagnostic[] = [];

	constructor(data?: ArchiveData, options: ReaderOptions = {}) {
		if (data !== undefined) this.load(data, options);
	}

	/** Regular members by resolved name, in archive order. */
	get members(): ReadonlyMap<string, Member> {
		return this.#members;
	}

	/** Symbol name → name of the member that defines it. */
	get symbolMemberMap(): ReadonlyMap<string, string> {
		return this.#symbolMemberMap;
	}

	/** The first "/" member. */
	get symbolIndex(): Member | undefined {
		return this.#symbolIndex;
	}

	/** The "//" member used to resolve long names, if the archive has one. */
	get longNames(): Member | undefined {
		return this.#longNames;
	}

	/** Non-fatal anomalies found by the last `load`, in order. */
	get diagnostics(): readonly ArchiveDiagnostic[] {
		return this.#diagnostics;
	}

	/** Returns the member that defines `symbol`, if any. */
	memberForSymbol(symbol: string): Member | undefined {
		const name = this.#symbolMemberMap.get(symbol);
		return name === undefined ? undefined : this.#members.get(name);
	}

	reset(): void {
		this.#members = new Map();
		this.#symbolMemberMap = new Map();
		this.#symbolIndex = undefined;
		this.#longNames = undefined;
		this.#diagnostics = [];
	}

	/**
	 * Parses a whole archive. Throws {@link ArchiveError} on malformed input, in
	 * which case the reader is left empty.
	 */
	load(data: ArchiveData, options: ReaderOptions = {}): void {
		this.reset();

		const strict = options.strict ?? false;
		const diagnostics: ArchiveDiagnostic[] = [];
		const report = (diagnostic: ArchiveDiagnostic): void => {
			diagnostics.push(diagnostic);
			options.onDiagnostic?.(diagnostic);
			if (strict) {
				throw new ArchiveError(
					"STRICT_VIOLATION",
					`Archive anomaly "${diagnostic.code}" at offset ${diagnostic.offset}.`,
					{ offset: diagnostic.offset, diagnostic },
				);
			}
		};

		const cursor = new ByteCursor(toUint8Array(data));

		// The whole archive must begin with the global header.
		const magic = cursor.readBytes(Math.min(MAGIC_SIZE, cursor.remaining));
		if (!bytesEqual(magic, MAGIC_BYTES)) {
			throw new ArchiveError(
				"BAD_MAGIC",
				`Bad magic number: "${describeBytes(magic)}".`,
				{
					expected: describeBytes(MAGIC_BYTES),
					found: describeBytes(magic),
					offset: 0,
				},
			);
		}

		// The first member is always the symbol index.
		const symbolIndex = readMember(cursor, undefined, report);
		if (symbolIndex.name !== SPECIAL_MEMBER.symbolIndex) {
			throw new ArchiveError(
				"UNEXPECTED_FIRST_MEMBER",
				`First member unexpectedly named "${symbolIndex.name}".`,
				{
					expected: SPECIAL_MEMBER.symbolIndex,
					found: symbolIndex.name,
					offset: MAGIC_SIZE,
				},
			);
		}

		// Catalog the remaining members by header-start offset.
		const members = new Map<string, Member>();
		const memberNameByOffset = new Map<number, string>();
		let longNames: Member | undefined;
		let expectSecondIndex = true;

		while (cursor.moreToRead()) {
			const offset = cursor.position;
			const member = readMember(cursor, longNames, report);

			if (expectSecondIndex) {
				expectSecondIndex = false;
				// The second index repeats the first in a different order; skip it.
				if (member.name === SPECIAL_MEMBER.symbolIndex) continue;
				report({ code: "missing-second-index", offset, name: member.name });
			}

			if (member.name === SPECIAL_MEMBER.longNames) {
				if (longNames) {
					report({ code: "duplicate-long-names", offset });
				} else {
					longNames = member;
				}
				continue;
			}

			if (members.has(member.name)) {
				throw new ArchiveError(
					"DUPLICATE_MEMBER",
					`Filename appears in archive twice: "${member.name}".`,
					{ found: member.name, offset, memberName: member.name },
				);
			}

			memberNameByOffset.set(offset, member.name);
			members.set(member.name, member);
		}

		const symbols = decodeSymbolIndex(
			symbolIndex.content.clone(true),
			memberNameByOffset,
		);

		this.#members = members;
		this.#symbolMemberMap = symbols;
		this.#symbolIndex = symbolIndex;
		this.#longNames = longNames;
		this.#diagnostics = diagnostics;
	}
}
