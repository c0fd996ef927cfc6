/**
 * stream-object.ts - streamObject example with real-time partial objects
 *
 * Watch the itinerary build incrementally: partial objects grow as more
 * days are generated, then the validated object arrives last.
 *
 * Run from packages/sdks/typescript (reads GENWIRE_* variables):
 *   npm run example:stream-object
 */

import { z } from "zod";
import { GenAIError, createGenAI, loadConfigFromEnv } from "../src/index.js";

const genai = createGenAI(loadConfigFromEnv());

const TravelItinerarySchema = z.object({
	destination: z.string().describe("The travel destination"),
	days: z
		.array(
			z.object({
				day: z.number().describe("Day number"),
				title: z.string().describe("Theme for the day"),
				activities: z.array(z.string()).describe("Activities for the day"),
			}),
		)
		.describe("Day-by-day itinerary"),
	packingList: z.array(z.string()).describe("Essential items to pack"),
});

async function main() {
	console.log("Streaming travel itinerary...\n");

	const stream = await genai.streamObject({
		contents:
			"Create a 3-day travel itinerary for Lisbon with 3 activities per day and a packing list.",
		schema: TravelItinerarySchema,
	});

	let updateCount = 0;
	let lastDayCount = 0;

	for await (const part of stream) {
		if (part.type === "partial") {
			updateCount++;
			const currentDays = part.object.days?.length ?? 0;
			// Only log when something meaningful changes
			if (currentDays !== lastDayCount) {
				console.log(`[Update ${updateCount}] Days planned: ${currentDays}/3`);
				lastDayCount = currentDays;
			}
			continue;
		}

		const itinerary = part.object;
		console.log(`\nDestination: ${itinerary.destination}\n`);
		for (const day of itinerary.days) {
			console.log(`--- Day ${day.day}: ${day.title} ---`);
			for (const activity of day.activities) {
				console.log(`  - ${activity}`);
			}
		}
		console.log(`\nPacking list: ${itinerary.packingList.join(", ")}`);
	}

	console.log(`\n[${updateCount} streaming updates]`);
}

main().catch((error: unknown) => {
	if (error instanceof GenAIError) {
		console.error(`\nGenAI Error [${error.code}]: ${error.message}`);
		if (error.code === "VALIDATION_ERROR" && error.rawText) {
			console.error(`  -> Raw response: ${error.rawText}`);
		}
	} else {
		console.error("\nUnexpected error:", error);
	}
	process.exit(1);
});
