import {
	PromptBlockedError,
	ResponseStoppedError,
	SerializationError,
} from "./errors.js";
import type { FinishReason, GenerateContentResponse } from "./schemas.js";

/**
 * Finish reasons that mean generation ended early. `STOP` and `MAX_TOKENS`
 * are normal completions; unspecified and unrecognised reasons pass through.
 */
const ABNORMAL_FINISH_REASONS = new Set<FinishReason>([
	"SAFETY",
	"RECITATION",
	"LANGUAGE",
	"OTHER",
	"BLOCKLIST",
	"PROHIBITED_CONTENT",
	"SPII",
	"MALFORMED_FUNCTION_CALL",
]);

export function isAbnormalFinish(reason: FinishReason | undefined): boolean {
	return reason !== undefined && ABNORMAL_FINISH_REASONS.has(reason);
}

/**
 * Turns a decoded response whose content signals failure into an error.
 *
 * @param response - The decoded response
 * @param partial - Aggregate of the stream so far, attached to {@link ResponseStoppedError}
 *   (built only when needed)
 * @returns The response unchanged when it represents success
 * @throws {SerializationError} when the response has neither candidates nor a block reason
 * @throws {PromptBlockedError} when the prompt was blocked before generation
 * @throws {ResponseStoppedError} when a candidate stopped abnormally
 */
export function assertResponseSucceeded(
	response: GenerateContentResponse,
	partial?: () => GenerateContentResponse,
): GenerateContentResponse {
	const blockReason = response.promptFeedback?.blockReason;

	if (response.candidates.length === 0) {
		if (blockReason === undefined) {
			throw new SerializationError(
				"Response has no candidates and no block reason",
				JSON.stringify(response),
			);
		}
		throw new PromptBlockedError(response, blockReason);
	}

	const stopped = response.candidates.find((candidate) =>
		isAbnormalFinish(candidate.finishReason),
	);
	if (stopped?.finishReason !== undefined) {
		throw new ResponseStoppedError(
			response,
			stopped.finishReason,
			partial ? partial() : response,
		);
	}

	return response;
}
