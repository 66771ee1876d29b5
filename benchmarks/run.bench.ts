import { generateFixtures } from "./fixtures/generate";
import { runLoadingBenchmarks } from "./load.bench";

async function main() {
	console.log("Starting benchmark run...");

	await generateFixtures();
	await runLoadingBenchmarks();

	console.log("Benchmark run complete.");
}

main().catch((err) => {
	console.error("Benchmark failed:", err);
	process.exit(1);
});
