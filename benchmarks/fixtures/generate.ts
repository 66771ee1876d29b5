import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { buildLibrary, type FixtureMember } from "../../tests/core/fixtures";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const FIXTURES_DIR = path.resolve(__dirname, "..", "tmp");

export const LIBRARIES = [
	// Import libraries hold thousands of tiny members with a couple of symbols each.
	{ file: "import-style.lib", members: 5000, size: 48, symbolsPerMember: 2 },
	// Static libraries hold fewer, larger objects that export many symbols.
	{
		file: "static-style.lib",
		members: 200,
		size: 64 * 1024,
		symbolsPerMember: 40,
	},
] as const;

function createMembers(
	count: number,
	size: number,
	symbolsPerMember: number,
): { longNames: string; members: FixtureMember[] } {
	const content = new Uint8Array(size).fill(0x61);
	let longNames = "";
	const members: FixtureMember[] = [];

	for (let i = 0; i < count; i++) {
		const objectName = `generated_object_${i}.obj`;
		const symbols = Array.from(
			{ length: symbolsPerMember },
			(_, j) => `__imp_generated_symbol_${i}_${j}`,
		);

		// Half the members use the long-name table so both name forms are exercised.
		if (i % 2 === 0) {
			members.push({ name: `/${longNames.length}`, content, symbols });
			longNames += `${objectName}\0`;
		} else {
			members.push({ name: `m${i}.obj/`, content, symbols });
		}
	}

	return { longNames, members };
}

export async function generateFixtures(): Promise<void> {
	console.log("Generating fixtures...");
	await fs.rm(FIXTURES_DIR, { recursive: true, force: true });
	await fs.mkdir(FIXTURES_DIR, { recursive: true });

	for (const library of LIBRARIES) {
		const { bytes } = buildLibrary(
			createMembers(library.members, library.size, library.symbolsPerMember),
		);
		await fs.writeFile(path.join(FIXTURES_DIR, library.file), bytes);
	}
}
