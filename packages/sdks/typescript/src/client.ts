import { type ResolvedConfig, resolveConfig } from "./config.js";
import {
	type CountTokensOptions,
	type GenerateContentOptions,
	countTokens as countTokensImpl,
	generateContent as generateContentImpl,
} from "./content.js";
import {
	type GenerateObjectOptions,
	type GenerateObjectResult,
	generateObject as generateObjectImpl,
} from "./object.js";
import type {
	CountTokensResponse,
	GenerateContentResponse,
} from "./schemas.js";
import {
	type ObjectStream,
	type StreamObjectOptions,
	streamObject as streamObjectImpl,
} from "./stream-object.js";
import {
	type GenerateContentStream,
	type StreamGenerateContentOptions,
	streamGenerateContent as streamGenerateContentImpl,
} from "./stream/index.js";
import type { GenAIConfig } from "./types.js";

/**
 * Client bound to one configuration.
 */
export interface GenAIClient {
	/** Resolved configuration, defaults filled in */
	readonly config: ResolvedConfig;
	generateContent(
		options: GenerateContentOptions,
	): Promise<GenerateContentResponse>;
	generateContentStream(
		options: StreamGenerateContentOptions,
	): Promise<GenerateContentStream>;
	countTokens(options: CountTokensOptions): Promise<CountTokensResponse>;
	generateObject<T>(
		options: GenerateObjectOptions<T>,
	): Promise<GenerateObjectResult<T>>;
	streamObject<T>(options: StreamObjectOptions<T>): Promise<ObjectStream<T>>;
}

/**
 * Creates a client with the config validated once, up front.
 *
 * @example
 * ```typescript
 * const genai = createGenAI({ apiKey: 'your-api-key', model: 'gemini-1.5-flash' });
 *
 * const stream = await genai.generateContentStream({ contents: 'Tell me a story' });
 * for await (const chunk of stream) {
 *   process.stdout.write(responseText(chunk));
 * }
 * ```
 *
 * @throws {GenAIError} with code 'INVALID_CONFIG' if config is invalid
 */
export function createGenAI(config: GenAIConfig): GenAIClient {
	const resolved = resolveConfig(config);

	return {
		config: resolved,
		generateContent: (options) => generateContentImpl(resolved, options),
		generateContentStream: (options) =>
			streamGenerateContentImpl(resolved, options),
		countTokens: (options) => countTokensImpl(resolved, options),
		generateObject: (options) => generateObjectImpl(resolved, options),
		streamObject: (options) => streamObjectImpl(resolved, options),
	};
}

/**
 * Generates content in one request.
 * @see GenAIClient.generateContent
 */
export function generateContent(
	config: GenAIConfig,
	options: GenerateContentOptions,
): Promise<GenerateContentResponse> {
	return createGenAI(config).generateContent(options);
}

/**
 * Streams content generation.
 * @see GenAIClient.generateContentStream
 */
export function streamGenerateContent(
	config: GenAIConfig,
	options: StreamGenerateContentOptions,
): Promise<GenerateContentStream> {
	return createGenAI(config).generateContentStream(options);
}

export function countTokens(
	config: GenAIConfig,
	options: CountTokensOptions,
): Promise<CountTokensResponse> {
	return createGenAI(config).countTokens(options);
}

export function generateObject<T>(
	config: GenAIConfig,
	options: GenerateObjectOptions<T>,
): Promise<GenerateObjectResult<T>> {
	return createGenAI(config).generateObject(options);
}

export function streamObject<T>(
	config: GenAIConfig,
	options: StreamObjectOptions<T>,
): Promise<ObjectStream<T>> {
	return createGenAI(config).streamObject(options);
}
