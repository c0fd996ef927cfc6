/**
 * stream.ts - generateContentStream example with real-time output
 *
 * Text appears progressively as chunks arrive from the API. The aggregate
 * of all chunks gives the final usage numbers.
 *
 * Run from packages/sdks/typescript (reads GENWIRE_* variables):
 *   npm run example:stream
 */

import {
	GenAIError,
	ResponseStoppedError,
	type GenerateContentResponse,
	aggregateResponses,
	createGenAI,
	loadConfigFromEnv,
	responseText,
} from "../src/index.js";

const genai = createGenAI(loadConfigFromEnv());

async function main() {
	console.log("Streaming response:\n");

	const stream = await genai.generateContentStream({
		contents:
			"Write a limerick about a programmer who loves coffee. Just the limerick, no explanation.",
	});

	const chunks: GenerateContentResponse[] = [];
	for await (const chunk of stream) {
		process.stdout.write(responseText(chunk)); // Print immediately (no newline)
		chunks.push(chunk);
	}

	const usage = aggregateResponses(chunks).usageMetadata;
	console.log(
		`\n\n--- Streamed in ${chunks.length} chunk${chunks.length === 1 ? "" : "s"} ---`,
	);
	if (usage) {
		console.log(
			`Usage: ${usage.totalTokenCount ?? 0} tokens (prompt: ${usage.promptTokenCount ?? 0}, output: ${usage.candidatesTokenCount ?? 0})`,
		);
	}
}

main().catch((error: unknown) => {
	if (error instanceof ResponseStoppedError) {
		console.error(`\nStopped early [${error.finishReason}]`);
		console.error(`  → Received so far: ${responseText(error.partial)}`);
	} else if (error instanceof GenAIError) {
		console.error(`\nGenAI Error [${error.code}]: ${error.message}`);
		if (error.code === "INVALID_API_KEY") {
			console.error("  → Check that GENWIRE_API_KEY is correct");
		} else if (error.code === "STREAM_ERROR") {
			console.error("  → The stream was interrupted");
		}
	} else {
		console.error("\nUnexpected error:", error);
	}
	process.exit(1);
});
