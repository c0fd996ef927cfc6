/**
 * genwire
 *
 * Streaming client for the Generative Language `generateContent` API.
 *
 * @example
 * ```typescript
 * import { createGenAI, responseText } from '@genwire/sdk';
 *
 * const genai = createGenAI({
 *   apiKey: 'your-api-key',
 *   model: 'gemini-1.5-flash',
 * });
 *
 * const stream = await genai.generateContentStream({
 *   contents: 'Hello, how are you?',
 * });
 *
 * for await (const chunk of stream) {
 *   process.stdout.write(responseText(chunk));
 * }
 * ```
 */

// Public types
export type {
	ApiRequest,
	ContentInput,
	CountTokensRequest,
	DynamicRetrievalConfig,
	FunctionDeclaration,
	GenAIConfig,
	GenerateContentRequest,
	GenerationConfig,
	HarmBlockThreshold,
	ResponseSchema,
	SafetySetting,
	Tool,
	ToolConfig,
} from "./types.js";
export type {
	BlockReason,
	Candidate,
	CitationSource,
	Content,
	CountTokensResponse,
	FinishReason,
	GenerateContentResponse,
	HarmCategory,
	HarmProbability,
	Part,
	PromptFeedback,
	SafetyRating,
	UsageMetadata,
} from "./schemas.js";
export {
	CountTokensResponseSchema,
	GenerateContentResponseSchema,
} from "./schemas.js";

// Errors
export {
	GenAIError,
	InvalidApiKeyError,
	PromptBlockedError,
	ResponseStoppedError,
	SerializationError,
	ServerError,
	UnsupportedUserLocationError,
} from "./errors.js";
export type { GenAIErrorCode } from "./errors.js";

// Configuration and logging
export {
	DEFAULT_API_VERSION,
	DEFAULT_BASE_URL,
	DEFAULT_TIMEOUT_MS,
	loadConfigFromEnv,
	resolveConfig,
} from "./config.js";
export type { ResolvedConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { LogLevel, LogMeta, Logger } from "./logger.js";

// Client factory (recommended API)
export { createGenAI } from "./client.js";
export type { GenAIClient } from "./client.js";

// Standalone functions
export {
	countTokens,
	generateContent,
	generateObject,
	streamGenerateContent,
	streamObject,
} from "./client.js";
export type { CountTokensOptions, GenerateContentOptions } from "./content.js";
export type { GenerateObjectOptions, GenerateObjectResult } from "./object.js";
export type {
	DeepPartial,
	ObjectStream,
	ObjectStreamPart,
	StreamObjectOptions,
} from "./stream-object.js";
export type {
	GenerateContentStream,
	ResponseStreamOptions,
	StreamGenerateContentOptions,
} from "./stream/index.js";

// Response helpers
export { functionCalls, responseText } from "./content.js";
export { toResponseSchema } from "./object.js";

// Pipeline stages, for callers that bring their own transport
export { assertResponseSucceeded } from "./classify.js";
export { decodeResponse } from "./decode.js";
export { validateResponse } from "./http.js";
export { createResponseStream } from "./stream/index.js";
export { StreamAccumulator, aggregateResponses } from "./stream/accumulator.js";
export { FrameSplitter, createFrameSplitter } from "./stream/frames.js";
export { createSSEParser } from "./stream/sse.js";
