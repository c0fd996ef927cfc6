import { Allow, parse } from "partial-json";
import type { z } from "zod";
import type { ResolvedConfig } from "./config.js";
import { responseText } from "./content.js";
import {
	type GenerateObjectOptions,
	jsonGenerationConfig,
	parseObjectText,
} from "./object.js";
import type { GenerateContentResponse } from "./schemas.js";
import { streamGenerateContent, toIterableStream } from "./stream/index.js";

/**
 * Recursively optional view of `T`, the shape of an object still being generated.
 */
export type DeepPartial<T> = T extends object
	? { [K in keyof T]?: DeepPartial<T[K]> }
	: T;

/**
 * Element of an object stream: partial snapshots as text arrives, then the
 * complete object once it validates.
 */
export type ObjectStreamPart<T> =
	| { readonly type: "partial"; readonly object: DeepPartial<T> }
	| { readonly type: "object"; readonly object: T };

export type ObjectStream<T> = ReadableStream<ObjectStreamPart<T>> &
	AsyncIterable<ObjectStreamPart<T>>;

/**
 * Request options for streaming object generation.
 */
export type StreamObjectOptions<T> = GenerateObjectOptions<T>;

/**
 * Streams a structured JSON response, parsing partial objects as text arrives.
 *
 * @typeParam T - The type of the expected response object, inferred from schema
 * @param config - Resolved client configuration
 * @param options - Request options
 * @returns Stream of partial objects ending with one `object` part
 * @throws {GenAIError} When the request fails before streaming starts
 */
export async function streamObject<T>(
	config: ResolvedConfig,
	options: StreamObjectOptions<T>,
): Promise<ObjectStream<T>> {
	const responses = await streamGenerateContent(config, {
		...options,
		generationConfig: jsonGenerationConfig(
			options.schema,
			options.generationConfig,
		),
	});

	let text = "";
	let lastSnapshot = "";

	const objects = responses.pipeThrough(
		new TransformStream<GenerateContentResponse, ObjectStreamPart<T>>({
			transform(response, controller) {
				const delta = responseText(response);
				if (!delta) return;
				text += delta;

				let partial: unknown;
				try {
					partial = parse(text, Allow.ALL);
				} catch (parseError) {
					// Malformed so far - the final parse reports it
					config.logger.warn("Failed to parse partial object", {
						error:
							parseError instanceof Error
								? parseError.message
								: String(parseError),
						text: text.substring(0, 100),
					});
					return;
				}

				// Skip null/non-object partials (can happen during early JSON parsing)
				if (partial === null || typeof partial !== "object") return;

				const snapshot = JSON.stringify(partial);
				if (snapshot === lastSnapshot) return;
				lastSnapshot = snapshot;

				controller.enqueue({
					type: "partial",
					object: toPartial(partial, options.schema),
				});
			},
			flush(controller) {
				controller.enqueue({
					type: "object",
					object: parseObjectText(text, options.schema),
				});
			},
		}),
	);

	return toIterableStream(objects);
}

/**
 * Partial objects rarely validate; when one does, the validated value is used.
 */
function toPartial<T>(value: object, schema: z.ZodSchema<T>): DeepPartial<T> {
	const result = schema.safeParse(value);
	// Best-effort: an unvalidated snapshot is still shaped like T
	return (result.success ? result.data : value) as DeepPartial<T>;
}
