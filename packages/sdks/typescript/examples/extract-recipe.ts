/**
 * extract-recipe.ts - generateObject example with Zod schema
 *
 * Demonstrates structured data extraction using Zod schemas for type-safe output.
 *
 * Run from packages/sdks/typescript (reads GENWIRE_* variables):
 *   npm run example:extract
 */

import { z } from "zod";
import { GenAIError, generateObject, loadConfigFromEnv } from "../src/index.js";

const config = loadConfigFromEnv();

// Define the schema for a recipe
const RecipeSchema = z.object({
	name: z.string().describe("Name of the recipe"),
	ingredients: z.array(z.string()).describe("List of ingredients"),
	steps: z.array(z.string()).describe("Cooking instructions"),
	prepTime: z.number().describe("Preparation time in minutes"),
	cookTime: z.number().describe("Cooking time in minutes"),
});

async function main() {
	console.log("Extracting recipe from natural language...\n");

	const result = await generateObject(config, {
		contents: `Extract the recipe from this description:

Make classic pancakes by mixing 1 cup flour, 1 egg, 1 cup milk, and 2 tbsp melted butter.
First combine the dry ingredients, then whisk in the wet ingredients until smooth.
Heat a griddle and pour 1/4 cup batter per pancake. Cook until bubbles form, flip,
and cook until golden. Takes about 5 minutes to prep and 15 minutes to cook.`,
		schema: RecipeSchema,
	});

	console.log("Recipe extracted:");
	console.log(JSON.stringify(result.object, null, 2));
	const usage = result.response.usageMetadata;
	if (usage) {
		console.log(`\nTokens used: ${usage.totalTokenCount ?? 0}`);
	}
}

main().catch((error: unknown) => {
	if (error instanceof GenAIError) {
		console.error(`\nGenAI Error [${error.code}]: ${error.message}`);
		if (error.code === "VALIDATION_ERROR") {
			console.error("  → The response didn't match the expected schema");
			if (error.rawText) {
				console.error(`  → Raw response: ${error.rawText}`);
			}
		}
	} else {
		console.error("\nUnexpected error:", error);
	}
	process.exit(1);
});
