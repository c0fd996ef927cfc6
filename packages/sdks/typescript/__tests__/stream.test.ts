/**
 * Tests for streamGenerateContent and the response stream pipeline.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { streamGenerateContent } from "../src/client.js";
import { responseText } from "../src/content.js";
import {
	GenAIError,
	InvalidApiKeyError,
	PromptBlockedError,
	ResponseStoppedError,
	SerializationError,
} from "../src/errors.js";
import { createResponseStream } from "../src/stream/index.js";
import {
	BASE_URL,
	collect,
	createChunkedStream,
	createMockLogger,
	createMockResponse,
	createMockSSEResponse,
	originalFetch,
	splitAt,
	splitEvery,
	sseBody,
	testConfig,
	textChunk,
} from "./helpers.js";

const FIRST =
	'{"candidates":[{"content":{"parts":[{"text":"Hel"}]},"finishReason":"STOP"}]}';
const SECOND =
	'{"candidates":[{"content":{"parts":[{"text":"lo"}]},"finishReason":"STOP"}]}';

describe("streamGenerateContent", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	afterEach(() => {
		global.fetch = originalFetch;
	});

	it("should make POST request to the streaming endpoint", async () => {
		const mockFetch = vi
			.fn()
			.mockResolvedValue(createMockSSEResponse([sseBody([textChunk("Hi")])]));
		global.fetch = mockFetch;

		await streamGenerateContent(testConfig, { contents: "Say hello" });

		expect(mockFetch).toHaveBeenCalledTimes(1);
		const [url, options] = mockFetch.mock.calls[0];

		expect(url).toBe(`${BASE_URL}:streamGenerateContent?alt=sse`);
		expect(options.method).toBe("POST");
		expect(options.headers["Content-Type"]).toBe("application/json");
		expect(options.headers["x-goog-api-key"]).toBe("test-secret");
		expect(options.headers["x-goog-api-client"]).toBe("genwire-ts/0.3.0");
		expect(options.signal).toBeInstanceOf(AbortSignal);

		expect(JSON.parse(options.body)).toEqual({
			contents: [{ role: "user", parts: [{ text: "Say hello" }] }],
		});
	});

	it("should deliver every response of an array split across chunks", async () => {
		// The outer array arrives as the payload of three SSE events
		const array = `[${FIRST},${SECOND}]`;
		const events = splitAt(array, [5, 40, 100]).map(
			(piece) => `data: ${piece}\n\n`,
		);
		global.fetch = vi.fn().mockResolvedValue(createMockSSEResponse(events));

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const { items, error } = await collect(stream);

		expect(error).toBeUndefined();
		expect(items.map(responseText)).toEqual(["Hel", "lo"]);
		expect(items.map((item) => item.candidates[0]?.finishReason)).toEqual([
			"STOP",
			"STOP",
		]);
	});

	it("should deliver one response per event", async () => {
		const body = sseBody([textChunk("Hel"), textChunk("lo", "STOP")]);
		global.fetch = vi
			.fn()
			.mockResolvedValue(createMockSSEResponse(splitEvery(body, 7)));

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const { items, error } = await collect(stream);

		expect(error).toBeUndefined();
		expect(items.map(responseText)).toEqual(["Hel", "lo"]);
	});

	it("should read a body that is not an event stream as raw JSON", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(createMockResponse(`[${FIRST},\r\n${SECOND}]`));

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const { items } = await collect(stream);

		expect(items.map(responseText)).toEqual(["Hel", "lo"]);
	});

	it("should stop after the successful items when generation stops", async () => {
		const logger = createMockLogger();
		global.fetch = vi
			.fn()
			.mockResolvedValue(
				createMockSSEResponse([
					sseBody([textChunk("Hello")]),
					sseBody([textChunk(" there", "SAFETY")]),
				]),
			);

		const stream = await streamGenerateContent(
			{ ...testConfig, logger },
			{ contents: "test" },
		);
		const { items, error } = await collect(stream);

		expect(items.map(responseText)).toEqual(["Hello"]);
		expect(error).toBeInstanceOf(ResponseStoppedError);
		expect(error).toMatchObject({
			code: "RESPONSE_STOPPED",
			finishReason: "SAFETY",
		});
		if (error instanceof ResponseStoppedError) {
			expect(responseText(error.response)).toBe(" there");
			expect(responseText(error.partial)).toBe("Hello there");
			expect(error.partial.candidates[0]?.finishReason).toBe("SAFETY");
		}
		expect(logger.warn).toHaveBeenCalledWith("Response stream failed", {
			code: "RESPONSE_STOPPED",
			delivered: 1,
		});
	});

	it("should keep delivered responses unchanged for the stopped aggregate", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(
				createMockSSEResponse([
					sseBody([textChunk("a")]),
					sseBody([textChunk("b", "SAFETY")]),
				]),
			);

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		let error: unknown;
		try {
			for await (const chunk of stream) {
				const part = chunk.candidates[0]?.content?.parts[0];
				expect(() => {
					if (part) part.text = "changed";
				}).toThrow(TypeError);
			}
		} catch (caught) {
			error = caught;
		}

		expect(error).toBeInstanceOf(ResponseStoppedError);
		if (error instanceof ResponseStoppedError) {
			expect(error.partial.candidates[0]?.content?.parts).toEqual([
				{ text: "ab" },
			]);
		}
	});

	it("should fail a blocked prompt without delivering items", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(
				createMockSSEResponse([
					sseBody([{ promptFeedback: { blockReason: "SAFETY" } }]),
				]),
			);

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const { items, error } = await collect(stream);

		expect(items).toEqual([]);
		expect(error).toBeInstanceOf(PromptBlockedError);
		expect(error).toMatchObject({ blockReason: "SAFETY" });
	});

	it("should fail a response with neither candidates nor a block reason", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(
				createMockSSEResponse(['data: {"candidates":[]}\n\n']),
			);

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const { items, error } = await collect(stream);

		expect(items).toEqual([]);
		expect(error).toBeInstanceOf(SerializationError);
	});

	it("should fail when the body ends inside a response", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(
				createMockSSEResponse([
					sseBody([textChunk("ok")]),
					'data: {"candidates":[{"index":0\n\n',
				]),
			);

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const { error } = await collect(stream);

		expect(error).toBeInstanceOf(SerializationError);
		expect(error).toMatchObject({
			message: "Stream ended in the middle of a JSON value",
		});
	});

	it("should throw before streaming on HTTP error", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(
				createMockResponse(
					{ error: { code: 400, message: "API key not valid" } },
					{ status: 400 },
				),
			);

		await expect(
			streamGenerateContent(testConfig, { contents: "test" }),
		).rejects.toBeInstanceOf(InvalidApiKeyError);
	});

	it("should throw GenAIError when response body is null", async () => {
		global.fetch = vi.fn().mockResolvedValue(new Response(null));

		await expect(
			streamGenerateContent(testConfig, { contents: "test" }),
		).rejects.toMatchObject({
			message: "No response body from API",
			code: "NO_RESPONSE_BODY",
		});
	});

	it("should handle network errors", async () => {
		global.fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

		await expect(
			streamGenerateContent(testConfig, { contents: "test" }),
		).rejects.toMatchObject({
			message: "Network error: fetch failed",
			code: "NETWORK_ERROR",
		});
	});

	it("should report timeouts", async () => {
		global.fetch = vi
			.fn()
			.mockRejectedValue(
				new DOMException("The operation timed out.", "TimeoutError"),
			);

		await expect(
			streamGenerateContent(testConfig, { contents: "test" }),
		).rejects.toMatchObject({
			message: "Request timed out after 30000ms",
			code: "TIMEOUT",
		});
	});

	it("should cancel the body when the consumer stops early", async () => {
		const onCancel = vi.fn();
		const events = Array.from({ length: 50 }, (_, i) =>
			sseBody([textChunk(`chunk ${i}`)]),
		);
		global.fetch = vi
			.fn()
			.mockResolvedValue(createMockSSEResponse(events, { onCancel }));

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const received: string[] = [];
		for await (const chunk of stream) {
			received.push(responseText(chunk));
			break;
		}

		expect(received).toEqual(["chunk 0"]);
		await vi.waitFor(() => expect(onCancel).toHaveBeenCalled());
	});

	it("should not allow a second reader", async () => {
		global.fetch = vi
			.fn()
			.mockResolvedValue(createMockSSEResponse([sseBody([textChunk("Hi")])]));

		const stream = await streamGenerateContent(testConfig, {
			contents: "test",
		});
		const reader = stream.getReader();
		const { error } = await collect(stream);

		expect(error).toBeInstanceOf(GenAIError);
		expect(error).toMatchObject({ code: "STREAM_LOCKED" });
		await reader.cancel();
	});
});

describe("createResponseStream", () => {
	it("should pull from the body only as items are consumed", async () => {
		let pulls = 0;
		const encoder = new TextEncoder();
		const body = new ReadableStream<Uint8Array>({
			pull(controller) {
				pulls++;
				controller.enqueue(
					encoder.encode(sseBody([textChunk(`chunk ${pulls}`)])),
				);
			},
		});

		const stream = createResponseStream(body);
		const reader = stream.getReader();
		const first = await reader.read();

		expect(first.done).toBe(false);
		expect(pulls).toBeLessThan(50);
		await reader.cancel();
	});

	it("should map an aborted body read to CANCELLED", async () => {
		const encoder = new TextEncoder();
		let sent = false;
		const body = new ReadableStream<Uint8Array>({
			pull(controller) {
				if (sent) {
					controller.error(new DOMException("Aborted", "AbortError"));
					return;
				}
				sent = true;
				controller.enqueue(encoder.encode(sseBody([textChunk("Hi")])));
			},
		});

		const { error } = await collect(createResponseStream(body));

		expect(error).toMatchObject({
			message: "Request was cancelled",
			code: "CANCELLED",
		});
	});

	it("should wrap other body errors as STREAM_ERROR", async () => {
		const body = new ReadableStream<Uint8Array>({
			pull(controller) {
				controller.error(new Error("socket hang up"));
			},
		});

		const { error } = await collect(createResponseStream(body));

		expect(error).toMatchObject({
			message: "Stream failed: socket hang up",
			code: "STREAM_ERROR",
		});
	});

	it("should decode an empty body as no items", async () => {
		const { items, error } = await collect(
			createResponseStream(createChunkedStream([])),
		);

		expect(items).toEqual([]);
		expect(error).toBeUndefined();
	});
});
