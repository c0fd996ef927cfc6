import { assertResponseSucceeded } from "./classify.js";
import type { ResolvedConfig } from "./config.js";
import { decodeJson, decodeResponse } from "./decode.js";
import { postRequest, toGenAIError } from "./http.js";
import {
	type GenerationOverrides,
	generateContentBody,
	toContents,
} from "./request.js";
import {
	type CountTokensResponse,
	CountTokensResponseSchema,
	type GenerateContentResponse,
	type Part,
} from "./schemas.js";
import type { ContentInput } from "./types.js";

/**
 * Request options for content generation.
 */
export interface GenerateContentOptions extends GenerationOverrides {
	/** Prompt text or conversation turns */
	contents: ContentInput;
	/** Optional AbortSignal for cancellation */
	signal?: AbortSignal;
}

export interface CountTokensOptions {
	contents: ContentInput;
	signal?: AbortSignal;
}

/**
 * Generates content in one request.
 *
 * @param config - Resolved client configuration
 * @param options - Request options
 * @returns The decoded response
 * @throws {ServerError} When the API answers with a non-2xx status
 * @throws {SerializationError} When the body is not a valid response
 * @throws {PromptBlockedError} When the prompt was blocked
 * @throws {ResponseStoppedError} When generation stopped abnormally
 */
export async function generateContent(
	config: ResolvedConfig,
	options: GenerateContentOptions,
): Promise<GenerateContentResponse> {
	const text = await readBody(
		config,
		await postRequest(
			config,
			{
				kind: "generateContent",
				body: generateContentBody(config, options.contents, options),
			},
			options.signal,
		),
	);
	return assertResponseSucceeded(decodeResponse(text));
}

/**
 * Counts the tokens `contents` would use with the configured model.
 */
export async function countTokens(
	config: ResolvedConfig,
	options: CountTokensOptions,
): Promise<CountTokensResponse> {
	const text = await readBody(
		config,
		await postRequest(
			config,
			{ kind: "countTokens", body: { contents: toContents(options.contents) } },
			options.signal,
		),
	);
	return decodeJson(text, CountTokensResponseSchema);
}

async function readBody(
	config: ResolvedConfig,
	response: Response,
): Promise<string> {
	try {
		return await response.text();
	} catch (error) {
		throw toGenAIError(error, config.timeout, "NETWORK_ERROR");
	}
}

/**
 * Concatenated text of the first candidate, or "" if it has none.
 */
export function responseText(response: GenerateContentResponse): string {
	const parts = response.candidates[0]?.content?.parts ?? [];
	return parts.map((part) => part.text ?? "").join("");
}

/**
 * Function calls requested by the first candidate.
 */
export function functionCalls(
	response: GenerateContentResponse,
): NonNullable<Part["functionCall"]>[] {
	const parts = response.candidates[0]?.content?.parts ?? [];
	return parts.flatMap((part) => (part.functionCall ? [part.functionCall] : []));
}
