import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { ResolvedConfig } from "./config.js";
import {
	type GenerateContentOptions,
	generateContent,
	responseText,
} from "./content.js";
import { GenAIError } from "./errors.js";
import type { GenerateContentResponse } from "./schemas.js";
import type { GenerationConfig, ResponseSchema } from "./types.js";

const SCHEMA_TYPES = {
	string: "STRING",
	number: "NUMBER",
	integer: "INTEGER",
	boolean: "BOOLEAN",
	array: "ARRAY",
	object: "OBJECT",
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSchemaType(value: unknown): value is keyof typeof SCHEMA_TYPES {
	return typeof value === "string" && Object.hasOwn(SCHEMA_TYPES, value);
}

function strings(value: unknown[]): string[] {
	return value.filter((item): item is string => typeof item === "string");
}

/**
 * Converts a Zod schema to the schema subset accepted as `responseSchema`.
 *
 * @throws {GenAIError} with code 'INVALID_CONFIG' for constructs the API cannot express
 */
export function toResponseSchema(schema: z.ZodTypeAny): ResponseSchema {
	const jsonSchema = zodToJsonSchema(schema, {
		$refStrategy: "none",
		target: "openApi3",
	});
	return convertNode(jsonSchema, "$");
}

function convertNode(node: unknown, path: string): ResponseSchema {
	if (!isRecord(node) || !isSchemaType(node.type)) {
		throw new GenAIError(
			`Schema at ${path} has no type supported by the API`,
			"INVALID_CONFIG",
		);
	}

	const converted: ResponseSchema = { type: SCHEMA_TYPES[node.type] };
	if (typeof node.description === "string") {
		converted.description = node.description;
	}
	if (typeof node.format === "string") {
		converted.format = node.format;
	}
	if (node.nullable === true) {
		converted.nullable = true;
	}
	if (Array.isArray(node.enum)) {
		converted.enum = strings(node.enum);
	}
	if (isRecord(node.properties)) {
		converted.properties = Object.fromEntries(
			Object.entries(node.properties).map(([key, value]) => [
				key,
				convertNode(value, `${path}.${key}`),
			]),
		);
	}
	if (Array.isArray(node.required)) {
		converted.required = strings(node.required);
	}
	if (node.items !== undefined) {
		converted.items = convertNode(node.items, `${path}[]`);
	}
	return converted;
}

/**
 * Generation config that asks for JSON matching `schema`.
 */
export function jsonGenerationConfig(
	schema: z.ZodTypeAny,
	base?: GenerationConfig,
): GenerationConfig {
	return {
		...base,
		responseMimeType: "application/json",
		responseSchema: toResponseSchema(schema),
	};
}

/**
 * Request options for structured object generation.
 */
export interface GenerateObjectOptions<T> extends GenerateContentOptions {
	/** Zod schema defining the expected response structure */
	schema: z.ZodSchema<T>;
}

/**
 * Structured object generation result.
 */
export interface GenerateObjectResult<T> {
	readonly object: T;
	readonly rawText: string;
	readonly response: GenerateContentResponse;
}

/**
 * Generates a structured JSON response.
 * Converts the provided Zod schema into the request's `responseSchema`.
 *
 * @typeParam T - The type of the expected response object, inferred from schema
 * @param config - Resolved client configuration
 * @param options - Request options
 * @returns Object containing parsed and validated response, raw text, and the full response
 * @throws {GenAIError} With code 'INVALID_RESPONSE' if the response text is not JSON
 * @throws {GenAIError} With code 'VALIDATION_ERROR' if response doesn't match schema
 */
export async function generateObject<T>(
	config: ResolvedConfig,
	options: GenerateObjectOptions<T>,
): Promise<GenerateObjectResult<T>> {
	const response = await generateContent(config, {
		...options,
		generationConfig: jsonGenerationConfig(
			options.schema,
			options.generationConfig,
		),
	});

	const rawText = responseText(response);
	return {
		object: parseObjectText(rawText, options.schema),
		rawText,
		response,
	};
}

/**
 * Parses generated JSON text and validates it against `schema`.
 *
 * @throws {GenAIError} With code 'INVALID_RESPONSE' if the text is not JSON
 * @throws {GenAIError} With code 'VALIDATION_ERROR' if the value doesn't match schema
 */
export function parseObjectText<T>(text: string, schema: z.ZodSchema<T>): T {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		throw new GenAIError(
			"Invalid response from API: expected JSON",
			"INVALID_RESPONSE",
			text,
		);
	}

	// Validate the response against the Zod schema
	const parseResult = schema.safeParse(parsed);
	if (!parseResult.success) {
		throw new GenAIError(
			`Response validation failed: ${parseResult.error.message}`,
			"VALIDATION_ERROR",
			text,
		);
	}
	return parseResult.data;
}
