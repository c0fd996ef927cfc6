import { assertResponseSucceeded } from "../classify.js";
import { DEFAULT_TIMEOUT_MS, type ResolvedConfig } from "../config.js";
import { createValueDecoder } from "../decode.js";
import { GenAIError } from "../errors.js";
import { postRequest, toGenAIError } from "../http.js";
import { type Logger, silentLogger } from "../logger.js";
import { type GenerationOverrides, generateContentBody } from "../request.js";
import {
	type GenerateContentResponse,
	GenerateContentResponseSchema,
} from "../schemas.js";
import type { ContentInput } from "../types.js";
import { StreamAccumulator } from "./accumulator.js";
import { createFrameSplitter } from "./frames.js";
import { createSSEParser } from "./sse.js";

/**
 * Stream of decoded responses. Supports both ReadableStream methods and async
 * iteration; it can be read once, by one consumer.
 */
export type GenerateContentStream = ReadableStream<GenerateContentResponse> &
	AsyncIterable<GenerateContentResponse>;

/**
 * Request options for streaming content generation.
 */
export interface StreamGenerateContentOptions extends GenerationOverrides {
	/** Prompt text or conversation turns */
	contents: ContentInput;
	/** Optional AbortSignal for cancellation */
	signal?: AbortSignal;
}

export interface ResponseStreamOptions {
	/** Body is `text/event-stream`; otherwise it is read as raw JSON text (default true) */
	eventStream?: boolean;
	/** Timeout reported in TIMEOUT errors */
	timeout?: number;
	logger?: Logger;
}

/**
 * Streams content generation from the API.
 *
 * The HTTP status is checked before this resolves, so a failed request never
 * yields a partial stream. Items arrive in the order the server produced
 * them; the stream ends with at most one error.
 *
 * @param config - Resolved client configuration
 * @param options - Request options
 * @returns Stream of responses (async iterable)
 * @throws {GenAIError} When the request fails before streaming starts
 */
export async function streamGenerateContent(
	config: ResolvedConfig,
	options: StreamGenerateContentOptions,
): Promise<GenerateContentStream> {
	const response = await postRequest(
		config,
		{
			kind: "streamGenerateContent",
			body: generateContentBody(config, options.contents, options),
		},
		options.signal,
	);

	if (!response.body) {
		throw new GenAIError("No response body from API", "NO_RESPONSE_BODY");
	}

	const contentType = response.headers.get("content-type") ?? "";
	return createResponseStream(response.body, {
		eventStream: contentType.includes("text/event-stream"),
		timeout: config.timeout,
		logger: config.logger,
	});
}

/**
 * Decodes a response body into a stream of checked responses.
 *
 * body → SSE payloads (or UTF-8 text) → JSON values → decoded responses →
 * semantic check. Reads are driven by the consumer: nothing is pulled from
 * the body until the next item is requested. Cancelling the returned stream
 * cancels the body.
 */
export function createResponseStream(
	body: ReadableStream<Uint8Array>,
	options: ResponseStreamOptions = {},
): GenerateContentStream {
	const {
		eventStream = true,
		timeout = DEFAULT_TIMEOUT_MS,
		logger = silentLogger,
	} = options;

	const text = eventStream
		? body.pipeThrough(createSSEParser())
		: body.pipeThrough(createUtf8Decoder());

	const reader = text
		.pipeThrough(createFrameSplitter())
		.pipeThrough(createValueDecoder(GenerateContentResponseSchema))
		.pipeThrough(createResponseChecker())
		.getReader();

	let delivered = 0;

	const stream = new ReadableStream<GenerateContentResponse>(
		{
			async pull(controller) {
				let result: ReadableStreamReadResult<GenerateContentResponse>;
				try {
					result = await reader.read();
				} catch (error) {
					const failure = toGenAIError(error, timeout, "STREAM_ERROR");
					logger.warn("Response stream failed", {
						code: failure.code,
						delivered,
					});
					controller.error(failure);
					return;
				}

				if (result.done) {
					logger.debug("Response stream complete", { delivered });
					controller.close();
					return;
				}
				delivered++;
				controller.enqueue(result.value);
			},
			cancel(reason) {
				logger.debug("Response stream cancelled", { delivered });
				return reader.cancel(reason);
			},
		},
		{ highWaterMark: 0 },
	);

	return toIterableStream(stream);
}

/**
 * Runs the semantic check on every response, attaching the aggregate of the
 * stream so far to ResponseStoppedError.
 */
function createResponseChecker(): TransformStream<
	GenerateContentResponse,
	GenerateContentResponse
> {
	const accumulator = new StreamAccumulator();

	return new TransformStream({
		transform(response, controller) {
			accumulator.add(response);
			controller.enqueue(
				assertResponseSucceeded(response, () => accumulator.build()),
			);
		},
	});
}

function createUtf8Decoder(): TransformStream<Uint8Array, string> {
	const decoder = new TextDecoder();

	return new TransformStream({
		transform(chunk, controller) {
			const text = decoder.decode(chunk, { stream: true });
			if (text) controller.enqueue(text);
		},
		flush(controller) {
			const text = decoder.decode();
			if (text) controller.enqueue(text);
		},
	});
}

/**
 * Augments a stream with a single-use async iterator. Leaving a `for await`
 * loop early cancels the stream.
 */
export function toIterableStream<T>(
	stream: ReadableStream<T>,
): ReadableStream<T> & AsyncIterable<T> {
	return Object.assign(stream, {
		async *[Symbol.asyncIterator](): AsyncGenerator<T> {
			if (stream.locked) {
				throw new GenAIError("Stream is already being read", "STREAM_LOCKED");
			}
			const reader = stream.getReader();
			let settled = false;
			try {
				while (true) {
					const { done, value } = await reader.read();
					if (done) {
						settled = true;
						return;
					}
					yield value;
				}
			} catch (error) {
				settled = true;
				throw error;
			} finally {
				if (!settled) {
					await reader.cancel();
				}
				reader.releaseLock();
			}
		},
	});
}
