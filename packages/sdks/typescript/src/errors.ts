import type {
	BlockReason,
	FinishReason,
	GenerateContentResponse,
} from "./schemas.js";

/**
 * Known error codes raised by the SDK.
 */
export type GenAIErrorCode =
	// Transport failures
	| "SERVER_ERROR"
	| "RATE_LIMITED"
	| "INVALID_API_KEY"
	| "UNSUPPORTED_USER_LOCATION"
	| "NETWORK_ERROR"
	| "TIMEOUT"
	| "CANCELLED"
	| "NO_RESPONSE_BODY"
	// Payload failures
	| "SERIALIZATION_ERROR"
	| "INVALID_RESPONSE"
	| "VALIDATION_ERROR"
	// Semantic failures
	| "PROMPT_BLOCKED"
	| "RESPONSE_STOPPED"
	// Client usage
	| "INVALID_CONFIG"
	| "STREAM_ERROR"
	| "STREAM_LOCKED";

/**
 * Base class for every error raised by the SDK.
 *
 * @example
 * ```typescript
 * try {
 *   await genai.generateContent({ contents: 'Hello' });
 * } catch (error) {
 *   if (error instanceof GenAIError) {
 *     console.error(`[${error.code}]: ${error.message}`);
 *   }
 * }
 * ```
 */
export class GenAIError extends Error {
	readonly code: GenAIErrorCode;
	readonly rawText?: string;

	constructor(message: string, code: GenAIErrorCode, rawText?: string) {
		super(message);
		// Fix prototype chain for proper instanceof checks in transpiled code
		Object.setPrototypeOf(this, new.target.prototype);
		this.name = "GenAIError";
		this.code = code;
		this.rawText = rawText;
	}
}

/**
 * Non-2xx HTTP response. `message` is the server's error message when the
 * body was a structured error envelope, the raw body otherwise.
 */
export class ServerError extends GenAIError {
	readonly status: number;

	constructor(
		message: string,
		status: number,
		rawText?: string,
		code: GenAIErrorCode = status === 429 ? "RATE_LIMITED" : "SERVER_ERROR",
	) {
		super(message, code, rawText);
		this.name = "ServerError";
		this.status = status;
	}
}

/** The API rejected the configured key. */
export class InvalidApiKeyError extends ServerError {
	constructor(message: string, status: number, rawText?: string) {
		super(message, status, rawText, "INVALID_API_KEY");
		this.name = "InvalidApiKeyError";
	}
}

export class UnsupportedUserLocationError extends ServerError {
	constructor(message: string, status: number, rawText?: string) {
		super(message, status, rawText, "UNSUPPORTED_USER_LOCATION");
		this.name = "UnsupportedUserLocationError";
	}
}

/**
 * Bytes that do not close into a JSON value, a value that does not match the
 * response schema, or a well-formed response with nothing in it.
 */
export class SerializationError extends GenAIError {
	constructor(message: string, rawText?: string) {
		super(message, "SERIALIZATION_ERROR", rawText);
		this.name = "SerializationError";
	}
}

/** The prompt was rejected before any candidate was generated. */
export class PromptBlockedError extends GenAIError {
	readonly blockReason: BlockReason;
	readonly response: GenerateContentResponse;

	constructor(response: GenerateContentResponse, blockReason: BlockReason) {
		super(`Prompt was blocked: ${blockReason}`, "PROMPT_BLOCKED");
		this.name = "PromptBlockedError";
		this.blockReason = blockReason;
		this.response = response;
	}
}

/**
 * A candidate stopped generating for a reason other than natural completion
 * or the token limit.
 *
 * `response` is the response that reported the stop. For streams, `partial`
 * aggregates everything received up to and including it.
 */
export class ResponseStoppedError extends GenAIError {
	readonly finishReason: FinishReason;
	readonly response: GenerateContentResponse;
	readonly partial: GenerateContentResponse;

	constructor(
		response: GenerateContentResponse,
		finishReason: FinishReason,
		partial: GenerateContentResponse = response,
	) {
		super(
			`Content generation stopped. Reason: ${finishReason}`,
			"RESPONSE_STOPPED",
		);
		this.name = "ResponseStoppedError";
		this.finishReason = finishReason;
		this.response = response;
		this.partial = partial;
	}
}
