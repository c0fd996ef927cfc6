import {
	type Candidate,
	type GenerateContentResponse,
	type Part,
	type PromptFeedback,
	type UsageMetadata,
	deepFreeze,
} from "../schemas.js";

/**
 * Combines streamed response chunks into one response.
 *
 * - Candidates are matched by `index` (absent means 0)
 * - Adjacent text parts are concatenated, other parts appended
 * - Finish reason, safety ratings, usage and model version take the latest value
 * - Citation sources are appended
 * - Prompt feedback is kept from the first chunk that carries it
 * - Built snapshots are deeply frozen
 *
 * @example
 * ```typescript
 * const accumulator = new StreamAccumulator();
 * for await (const chunk of stream) {
 *   accumulator.add(chunk);
 * }
 * console.log(responseText(accumulator.build()));
 * ```
 */
export class StreamAccumulator {
	private readonly candidates = new Map<number, Candidate>();
	private promptFeedback?: PromptFeedback;
	private usageMetadata?: UsageMetadata;
	private modelVersion?: string;

	add(chunk: GenerateContentResponse): void {
		if (chunk.modelVersion !== undefined) {
			this.modelVersion = chunk.modelVersion;
		}
		if (chunk.usageMetadata !== undefined) {
			this.usageMetadata = structuredClone(chunk.usageMetadata);
		}
		if (this.promptFeedback === undefined) {
			this.promptFeedback = structuredClone(chunk.promptFeedback);
		}
		// Copies, so later changes to a chunk never reach the aggregate
		for (const candidate of structuredClone(chunk.candidates)) {
			const index = candidate.index ?? 0;
			const existing = this.candidates.get(index);
			this.candidates.set(
				index,
				existing ? mergeCandidate(existing, candidate) : candidate,
			);
		}
	}

	/**
	 * Returns the aggregate of every chunk added so far.
	 */
	build(): GenerateContentResponse {
		const candidates = [...this.candidates.entries()]
			.sort(([a], [b]) => a - b)
			.map(([, candidate]) => candidate);

		return deepFreeze({
			candidates,
			promptFeedback: this.promptFeedback,
			usageMetadata: this.usageMetadata,
			modelVersion: this.modelVersion,
		});
	}
}

function mergeCandidate(existing: Candidate, incoming: Candidate): Candidate {
	const merged: Candidate = { ...existing };

	if (incoming.content) {
		merged.content = {
			role: incoming.content.role ?? existing.content?.role,
			parts: mergeParts(existing.content?.parts ?? [], incoming.content.parts),
		};
	}
	if (incoming.finishReason !== undefined) {
		merged.finishReason = incoming.finishReason;
	}
	if (incoming.finishMessage !== undefined) {
		merged.finishMessage = incoming.finishMessage;
	}
	if (incoming.safetyRatings.length > 0) {
		merged.safetyRatings = incoming.safetyRatings;
	}
	if (incoming.citationMetadata) {
		merged.citationMetadata = {
			citationSources: [
				...(existing.citationMetadata?.citationSources ?? []),
				...incoming.citationMetadata.citationSources,
			],
		};
	}
	if (incoming.tokenCount !== undefined) {
		merged.tokenCount = incoming.tokenCount;
	}
	return merged;
}

function mergeParts(existing: Part[], incoming: Part[]): Part[] {
	const parts = [...existing];
	for (const part of incoming) {
		const last = parts[parts.length - 1];
		if (isTextOnly(part) && last !== undefined && isTextOnly(last)) {
			parts[parts.length - 1] = { text: `${last.text}${part.text}` };
		} else {
			parts.push(part);
		}
	}
	return parts;
}

function isTextOnly(part: Part): part is Part & { text: string } {
	return (
		part.text !== undefined &&
		Object.keys(part).every((key) => key === "text")
	);
}

/**
 * Aggregates a list of streamed responses.
 */
export function aggregateResponses(
	responses: Iterable<GenerateContentResponse>,
): GenerateContentResponse {
	const accumulator = new StreamAccumulator();
	for (const response of responses) {
		accumulator.add(response);
	}
	return accumulator.build();
}
