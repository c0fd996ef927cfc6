import type { ResolvedConfig } from "./config.js";
import {
	GenAIError,
	InvalidApiKeyError,
	ServerError,
	UnsupportedUserLocationError,
} from "./errors.js";
import { buildRequest } from "./request.js";
import { ErrorEnvelopeSchema } from "./schemas.js";
import type { ApiRequest } from "./types.js";

const INVALID_KEY_STATUSES = new Set([400, 401, 403]);

/**
 * Creates an AbortSignal that combines timeout with optional user signal.
 */
export function createAbortSignal(
	timeout: number,
	userSignal?: AbortSignal,
): AbortSignal {
	const timeoutSignal = AbortSignal.timeout(timeout);
	if (!userSignal) {
		return timeoutSignal;
	}
	// Combine signals - abort when either triggers
	return AbortSignal.any([timeoutSignal, userSignal]);
}

/**
 * Maps anything thrown by fetch or a body read to a GenAIError.
 */
export function toGenAIError(
	error: unknown,
	timeout: number,
	fallback: "NETWORK_ERROR" | "STREAM_ERROR",
): GenAIError {
	if (error instanceof GenAIError) {
		return error;
	}
	if (error instanceof DOMException && error.name === "TimeoutError") {
		return new GenAIError(`Request timed out after ${timeout}ms`, "TIMEOUT");
	}
	if (error instanceof DOMException && error.name === "AbortError") {
		return new GenAIError("Request was cancelled", "CANCELLED");
	}
	const message = error instanceof Error ? error.message : String(error);
	if (fallback === "STREAM_ERROR") {
		return new GenAIError(`Stream failed: ${message}`, "STREAM_ERROR");
	}
	if (error instanceof TypeError) {
		// Network errors (DNS failure, connection refused, etc.)
		return new GenAIError(`Network error: ${message}`, "NETWORK_ERROR");
	}
	return new GenAIError(`Request failed: ${message}`, "NETWORK_ERROR");
}

/**
 * Wraps fetch errors in GenAIError for consistent error handling.
 */
export async function safeFetch(
	url: string,
	options: RequestInit,
	timeout: number,
): Promise<Response> {
	try {
		return await fetch(url, options);
	} catch (error) {
		throw toGenAIError(error, timeout, "NETWORK_ERROR");
	}
}

/**
 * Rejects non-2xx responses before any of the body is decoded.
 *
 * Successful responses are returned untouched and their body is not read, so
 * calling this more than once is harmless.
 *
 * @throws {InvalidApiKeyError} when the API rejected the key
 * @throws {UnsupportedUserLocationError} when the API is unavailable in the caller's region
 * @throws {ServerError} for every other non-2xx status
 */
export async function validateResponse(response: Response): Promise<void> {
	if (response.ok) {
		return;
	}

	const text = await response.text();
	const envelope = parseErrorEnvelope(text);
	const message = envelope?.message ?? text;

	if (
		INVALID_KEY_STATUSES.has(response.status) &&
		(message.includes("API key not valid") ||
			envelope?.reasons.includes("API_KEY_INVALID"))
	) {
		throw new InvalidApiKeyError(message, response.status, text);
	}
	if (message.includes("User location is not supported")) {
		throw new UnsupportedUserLocationError(message, response.status, text);
	}
	throw new ServerError(message, response.status, text);
}

/**
 * Extracts message and detail reasons from an error envelope, or null if the
 * body is not one.
 */
function parseErrorEnvelope(
	text: string,
): { message: string; reasons: string[] } | null {
	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch {
		return null;
	}
	const result = ErrorEnvelopeSchema.safeParse(value);
	if (!result.success) {
		return null;
	}
	const { message, details = [] } = result.data.error;
	return {
		message,
		reasons: details.flatMap((detail) =>
			detail.reason === undefined ? [] : [detail.reason],
		),
	};
}

/**
 * Sends `request` and returns the response once its status has been checked.
 *
 * @throws {GenAIError} for network failures, timeouts and non-2xx statuses
 */
export async function postRequest(
	config: ResolvedConfig,
	request: ApiRequest,
	signal?: AbortSignal,
): Promise<Response> {
	const { url, init } = buildRequest(config, request);
	config.logger.debug(`POST ${request.kind}`, { url });

	const response = await safeFetch(
		url,
		{ ...init, signal: createAbortSignal(config.timeout, signal) },
		config.timeout,
	);

	try {
		await validateResponse(response);
	} catch (error) {
		const failure = toGenAIError(error, config.timeout, "NETWORK_ERROR");
		config.logger.warn(`${request.kind} request failed`, {
			status: response.status,
			code: failure.code,
		});
		throw failure;
	}
	return response;
}
