import type { z } from "zod";
import { SerializationError } from "./errors.js";
import {
	type GenerateContentResponse,
	GenerateContentResponseSchema,
} from "./schemas.js";

/**
 * Parses one complete JSON value and validates it against `schema`.
 *
 * The schema is the only decoding configuration; callers pass it explicitly.
 *
 * @throws {SerializationError} if the text is not JSON or does not match the schema
 */
export function decodeJson<Output, Input = Output>(
	text: string,
	schema: z.ZodType<Output, z.ZodTypeDef, Input>,
): Output {
	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch (error) {
		throw new SerializationError(
			`Invalid JSON in response: ${error instanceof Error ? error.message : String(error)}`,
			text,
		);
	}

	const result = schema.safeParse(value);
	if (!result.success) {
		throw new SerializationError(
			`Response does not match the expected schema: ${result.error.message}`,
			text,
		);
	}
	return result.data;
}

/**
 * Decodes a `GenerateContentResponse` from one JSON value.
 */
export function decodeResponse(text: string): GenerateContentResponse {
	return decodeJson(text, GenerateContentResponseSchema);
}

/**
 * TransformStream of JSON value text to decoded values.
 */
export function createValueDecoder<Output, Input = Output>(
	schema: z.ZodType<Output, z.ZodTypeDef, Input>,
): TransformStream<string, Output> {
	return new TransformStream({
		transform(frame, controller) {
			controller.enqueue(decodeJson(frame, schema));
		},
	});
}
