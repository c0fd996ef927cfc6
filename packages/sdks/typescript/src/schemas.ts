import { z } from "zod";

/**
 * Wire schemas for API responses.
 *
 * Objects are non-strict so fields added by the server are dropped instead of
 * failing the decode. Enumerations are open: a value this SDK does not know
 * decodes to `"UNKNOWN"`.
 */

/**
 * String enumeration that maps unrecognised values to `"UNKNOWN"`.
 */
function openEnum<T extends string>(values: readonly T[]) {
	const known = new Set<string>(values);
	const isKnown = (value: string): value is T => known.has(value);
	return z
		.string()
		.transform((value): T | "UNKNOWN" => (isKnown(value) ? value : "UNKNOWN"));
}

export const FINISH_REASONS = [
	"FINISH_REASON_UNSPECIFIED",
	"STOP",
	"MAX_TOKENS",
	"SAFETY",
	"RECITATION",
	"LANGUAGE",
	"OTHER",
	"BLOCKLIST",
	"PROHIBITED_CONTENT",
	"SPII",
	"MALFORMED_FUNCTION_CALL",
] as const;

export const BLOCK_REASONS = [
	"BLOCK_REASON_UNSPECIFIED",
	"SAFETY",
	"OTHER",
	"BLOCKLIST",
	"PROHIBITED_CONTENT",
] as const;

export const HARM_CATEGORIES = [
	"HARM_CATEGORY_UNSPECIFIED",
	"HARM_CATEGORY_HARASSMENT",
	"HARM_CATEGORY_HATE_SPEECH",
	"HARM_CATEGORY_SEXUALLY_EXPLICIT",
	"HARM_CATEGORY_DANGEROUS_CONTENT",
	"HARM_CATEGORY_CIVIC_INTEGRITY",
] as const;

export const HARM_PROBABILITIES = [
	"HARM_PROBABILITY_UNSPECIFIED",
	"NEGLIGIBLE",
	"LOW",
	"MEDIUM",
	"HIGH",
] as const;

const OUTCOMES = [
	"OUTCOME_UNSPECIFIED",
	"OUTCOME_OK",
	"OUTCOME_FAILED",
	"OUTCOME_DEADLINE_EXCEEDED",
] as const;

const LANGUAGES = ["LANGUAGE_UNSPECIFIED", "PYTHON"] as const;

export const FinishReasonSchema = openEnum(FINISH_REASONS);
export const BlockReasonSchema = openEnum(BLOCK_REASONS);
export const HarmCategorySchema = openEnum(HARM_CATEGORIES);
export const HarmProbabilitySchema = openEnum(HARM_PROBABILITIES);

export const PartSchema = z.object({
	text: z.string().optional(),
	inlineData: z.object({ mimeType: z.string(), data: z.string() }).optional(),
	fileData: z.object({ mimeType: z.string(), fileUri: z.string() }).optional(),
	functionCall: z
		.object({
			name: z.string(),
			args: z.record(z.unknown()).optional(),
		})
		.optional(),
	functionResponse: z
		.object({
			name: z.string(),
			response: z.record(z.unknown()),
		})
		.optional(),
	executableCode: z
		.object({ language: openEnum(LANGUAGES), code: z.string() })
		.optional(),
	codeExecutionResult: z
		.object({ outcome: openEnum(OUTCOMES), output: z.string().optional() })
		.optional(),
});

export const ContentSchema = z.object({
	role: z.string().optional(),
	parts: z.array(PartSchema).default([]),
});

export const SafetyRatingSchema = z.object({
	category: HarmCategorySchema,
	probability: HarmProbabilitySchema,
	blocked: z.boolean().optional(),
	probabilityScore: z.number().optional(),
	severity: z.string().optional(),
	severityScore: z.number().optional(),
});

export const CitationSourceSchema = z.object({
	startIndex: z.number().int().optional(),
	endIndex: z.number().int().optional(),
	uri: z.string().optional(),
	license: z.string().optional(),
});

export const CandidateSchema = z.object({
	index: z.number().int().optional(),
	content: ContentSchema.optional(),
	finishReason: FinishReasonSchema.optional(),
	finishMessage: z.string().optional(),
	safetyRatings: z.array(SafetyRatingSchema).default([]),
	citationMetadata: z
		.object({ citationSources: z.array(CitationSourceSchema).default([]) })
		.optional(),
	tokenCount: z.number().int().optional(),
});

export const PromptFeedbackSchema = z.object({
	blockReason: BlockReasonSchema.optional(),
	safetyRatings: z.array(SafetyRatingSchema).default([]),
});

export const UsageMetadataSchema = z.object({
	promptTokenCount: z.number().int().optional(),
	candidatesTokenCount: z.number().int().optional(),
	cachedContentTokenCount: z.number().int().optional(),
	totalTokenCount: z.number().int().optional(),
});

export const GenerateContentResponseSchema = z
	.object({
		candidates: z.array(CandidateSchema).default([]),
		promptFeedback: PromptFeedbackSchema.optional(),
		usageMetadata: UsageMetadataSchema.optional(),
		modelVersion: z.string().optional(),
	})
	.readonly()
	.transform((response) => deepFreeze(response));

/**
 * Freezes `value` and every object and array reachable from it.
 */
export function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null) {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}

export const CountTokensResponseSchema = z.object({
	totalTokens: z.number().int(),
});

/**
 * `{"error": {"message": ...}}` body returned with non-2xx statuses.
 */
export const ErrorEnvelopeSchema = z.object({
	error: z.object({
		code: z.number().int().optional(),
		message: z.string(),
		status: z.string().optional(),
		details: z
			.array(z.object({ reason: z.string().optional() }).passthrough())
			.optional(),
	}),
});

export type FinishReason = z.infer<typeof FinishReasonSchema>;
export type BlockReason = z.infer<typeof BlockReasonSchema>;
export type HarmCategory = z.infer<typeof HarmCategorySchema>;
export type HarmProbability = z.infer<typeof HarmProbabilitySchema>;
export type Part = z.infer<typeof PartSchema>;
export type Content = z.infer<typeof ContentSchema>;
export type SafetyRating = z.infer<typeof SafetyRatingSchema>;
export type CitationSource = z.infer<typeof CitationSourceSchema>;
export type Candidate = z.infer<typeof CandidateSchema>;
export type PromptFeedback = z.infer<typeof PromptFeedbackSchema>;
export type UsageMetadata = z.infer<typeof UsageMetadataSchema>;
export type GenerateContentResponse = z.infer<
	typeof GenerateContentResponseSchema
>;
export type CountTokensResponse = z.infer<typeof CountTokensResponseSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
