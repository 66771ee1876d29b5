import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Bench } from "tinybench";
import { ArchiveReader } from "../src/core/index";
import { readArchiveFile } from "../src/fs/index";
import { FIXTURES_DIR, LIBRARIES } from "./fixtures/generate";

export async function runLoadingBenchmarks(): Promise<void> {
	console.log("\nLoading benchmarks...");

	for (const library of LIBRARIES) {
		const libraryPath = path.join(FIXTURES_DIR, library.file);
		const bytes = await fs.readFile(libraryPath);
		const bench = new Bench({
			time: 5000,
			iterations: 30,
			warmupTime: 1000,
			warmupIterations: 10,
		});

		bench
			.add(`ArchiveReader: load ${library.file} from memory`, () => {
				new ArchiveReader(bytes);
			})
			.add(`readArchiveFile: load ${library.file} from disk`, async () => {
				await readArchiveFile(libraryPath);
			});

		await bench.run();
		console.log(`\n--- ${library.file} (${library.members} members) ---`);
		console.table(bench.table());
	}

	await fs.rm(FIXTURES_DIR, { recursive: true, force: true });
}
