import * as fs from "node:fs/promises";
import { ArchiveReader, type ReaderOptions } from "../core/index";

/**
 * Reads a `.lib` file from disk and parses it.
 *
 * The whole file is loaded into memory; member contents are views into that
 * single buffer.
 *
 * @param path - Path of the archive to read.
 * @param options - Optional {@link ReaderOptions} passed to {@link ArchiveReader.load}.
 * @returns A loaded {@link ArchiveReader}.
 * @example
 * ```typescript
 * import { readArchiveFile } from 'winlib-ar/fs';
 *
 * const reader = await readArchiveFile('kernel32.lib', {
 *   onDiagnostic: (diagnostic) => warnings.push(diagnostic),
 * });
 *
 * for (const [symbol, member] of reader.symbolMemberMap) {
 *   console.log(`${symbol} -> ${member}`);
 * }
 * ```
 */
export async function readArchiveFile(
	path: string,
	options: ReaderOptions = {},
): Promise<ArchiveReader> {
	const data = await fs.readFile(path);
	return new ArchiveReader(data, options);
}
