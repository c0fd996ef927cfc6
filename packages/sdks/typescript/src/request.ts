import type { ResolvedConfig } from "./config.js";
import type { Content } from "./schemas.js";
import type {
	ApiRequest,
	ContentInput,
	GenerateContentRequest,
	GenerationConfig,
	SafetySetting,
	Tool,
	ToolConfig,
} from "./types.js";

export const SDK_VERSION = "0.3.0";

/**
 * Prefixes `models/` unless the name already carries a resource path.
 */
export function fullModelName(name: string): string {
	return name.includes("/") ? name : `models/${name}`;
}

/**
 * Normalizes a content input into the request's `contents` list.
 */
export function toContents(input: ContentInput): Content[] {
	if (typeof input === "string") {
		return [{ role: "user", parts: [{ text: input }] }];
	}
	return Array.isArray(input) ? input : [input];
}

function toSystemInstruction(
	input: string | Content | undefined,
): Content | undefined {
	if (input === undefined) return undefined;
	return typeof input === "string"
		? { role: "system", parts: [{ text: input }] }
		: input;
}

/**
 * Per-call options for generation requests; each overrides the client default.
 */
export interface GenerationOverrides {
	generationConfig?: GenerationConfig;
	safetySettings?: SafetySetting[];
	tools?: Tool[];
	toolConfig?: ToolConfig;
	systemInstruction?: string | Content;
}

/**
 * Builds a generation request body from client defaults and call overrides.
 */
export function generateContentBody(
	config: ResolvedConfig,
	contents: ContentInput,
	overrides: GenerationOverrides = {},
): GenerateContentRequest {
	const generationConfig =
		config.generationConfig || overrides.generationConfig
			? { ...config.generationConfig, ...overrides.generationConfig }
			: undefined;

	return {
		contents: toContents(contents),
		generationConfig,
		safetySettings: overrides.safetySettings ?? config.safetySettings,
		tools: overrides.tools ?? config.tools,
		toolConfig: overrides.toolConfig ?? config.toolConfig,
		systemInstruction: toSystemInstruction(
			overrides.systemInstruction ?? config.systemInstruction,
		),
	};
}

/**
 * Resolves the endpoint URL and fetch options for `request`. The caller adds
 * the abort signal.
 */
export function buildRequest(
	config: ResolvedConfig,
	request: ApiRequest,
): { url: string; init: RequestInit } {
	const base = `${config.baseUrl}/${config.apiVersion}/${fullModelName(config.model)}`;

	let url: string;
	switch (request.kind) {
		case "generateContent":
			url = `${base}:generateContent`;
			break;
		case "streamGenerateContent":
			url = `${base}:streamGenerateContent?alt=sse`;
			break;
		case "countTokens":
			url = `${base}:countTokens`;
			break;
		default:
			return assertNever(request);
	}

	return {
		url,
		init: {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				"x-goog-api-key": config.apiKey,
				"x-goog-api-client": `genwire-ts/${SDK_VERSION}`,
			},
			body: JSON.stringify(request.body),
		},
	};
}

function assertNever(value: never): never {
	throw new Error(`Unhandled request kind: ${JSON.stringify(value)}`);
}
