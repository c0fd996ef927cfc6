import type { Logger } from "./logger.js";
import type { Content, HarmCategory, Part } from "./schemas.js";

/**
 * Configuration for connecting to the generative-content API.
 */
export interface GenAIConfig {
	/** API key sent as `x-goog-api-key` */
	apiKey: string;
	/** Model name, with or without the `models/` prefix (e.g., "gemini-1.5-flash") */
	model: string;
	/** Base URL of the API (default "https://generativelanguage.googleapis.com") */
	baseUrl?: string;
	/** API version path segment (default "v1beta") */
	apiVersion?: string;
	/** Request timeout in milliseconds, covering the whole body read (default 120000) */
	timeout?: number;
	/** Logger for request diagnostics (default: console at warn level) */
	logger?: Logger;
	/** Defaults applied to every generation request */
	generationConfig?: GenerationConfig;
	safetySettings?: SafetySetting[];
	tools?: Tool[];
	toolConfig?: ToolConfig;
	systemInstruction?: string | Content;
}

/**
 * A content input. Strings become a single user turn with one text part.
 */
export type ContentInput = string | Content | Content[];

export interface GenerationConfig {
	temperature?: number;
	topP?: number;
	topK?: number;
	candidateCount?: number;
	maxOutputTokens?: number;
	stopSequences?: string[];
	responseMimeType?: string;
	presencePenalty?: number;
	frequencyPenalty?: number;
	responseSchema?: ResponseSchema;
}

/**
 * The subset of OpenAPI schema the API accepts for structured output and
 * function parameters.
 */
export interface ResponseSchema {
	type: "STRING" | "NUMBER" | "INTEGER" | "BOOLEAN" | "ARRAY" | "OBJECT";
	description?: string;
	format?: string;
	nullable?: boolean;
	enum?: string[];
	properties?: Record<string, ResponseSchema>;
	required?: string[];
	items?: ResponseSchema;
}

export type HarmBlockThreshold =
	| "HARM_BLOCK_THRESHOLD_UNSPECIFIED"
	| "BLOCK_LOW_AND_ABOVE"
	| "BLOCK_MEDIUM_AND_ABOVE"
	| "BLOCK_ONLY_HIGH"
	| "BLOCK_NONE";

export interface SafetySetting {
	category: Exclude<HarmCategory, "UNKNOWN">;
	threshold: HarmBlockThreshold;
}

export interface FunctionDeclaration {
	name: string;
	description: string;
	parameters?: ResponseSchema;
}

export interface DynamicRetrievalConfig {
	mode?: "MODE_UNSPECIFIED" | "MODE_DYNAMIC";
	/** Between 0 and 1; the API picks a default when unset */
	dynamicThreshold?: number;
}

export interface Tool {
	functionDeclarations?: FunctionDeclaration[];
	codeExecution?: Record<string, never>;
	/** Grounds answers in Google Search results */
	googleSearchRetrieval?: {
		dynamicRetrievalConfig?: DynamicRetrievalConfig;
	};
}

export interface ToolConfig {
	functionCallingConfig?: {
		mode?: "MODE_UNSPECIFIED" | "AUTO" | "ANY" | "NONE";
		allowedFunctionNames?: string[];
	};
}

/**
 * Request body of `generateContent` and `streamGenerateContent` (internal).
 */
export interface GenerateContentRequest {
	readonly contents: Content[];
	readonly generationConfig?: GenerationConfig;
	readonly safetySettings?: SafetySetting[];
	readonly tools?: Tool[];
	readonly toolConfig?: ToolConfig;
	readonly systemInstruction?: Content;
}

/**
 * Request body of `countTokens` (internal).
 */
export interface CountTokensRequest {
	readonly contents: Content[];
}

/**
 * Every request the SDK can send. Body construction matches on `kind`.
 */
export type ApiRequest =
	| { readonly kind: "generateContent"; readonly body: GenerateContentRequest }
	| {
			readonly kind: "streamGenerateContent";
			readonly body: GenerateContentRequest;
	  }
	| { readonly kind: "countTokens"; readonly body: CountTokensRequest };

/**
 * Re-exported so callers can build `Content` values without importing schemas.
 */
export type { Content, Part };
