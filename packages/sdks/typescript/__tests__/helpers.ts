/**
 * Shared test utilities for SDK tests.
 */

import { vi } from "vitest";
import { decodeResponse } from "../src/decode.js";
import { type Logger, silentLogger } from "../src/logger.js";
import type { GenerateContentResponse } from "../src/schemas.js";
import type { GenAIConfig } from "../src/types.js";

// Store original fetch to restore later
export const originalFetch = global.fetch;

// Default test config
export const testConfig: GenAIConfig = {
	apiKey: "test-secret",
	model: "test-model",
	baseUrl: "http://localhost:3100",
	timeout: 30_000,
	logger: silentLogger,
};

export const BASE_URL = "http://localhost:3100/v1beta/models/test-model";

/**
 * Logger whose methods are spies.
 */
export function createMockLogger(): Logger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

/**
 * A one-candidate response JSON with the given text.
 */
export function textChunk(
	text: string,
	finishReason?: string,
): Record<string, unknown> {
	return {
		candidates: [
			{
				index: 0,
				content: { role: "model", parts: [{ text }] },
				...(finishReason ? { finishReason } : {}),
			},
		],
	};
}

/**
 * Decodes a plain object the way the SDK decodes a response frame.
 */
export function decoded(value: unknown): GenerateContentResponse {
	return decodeResponse(JSON.stringify(value));
}

/**
 * Byte stream that emits each string as one chunk, then closes.
 * `onCancel` runs if the consumer cancels before the end.
 */
export function createChunkedStream(
	chunks: string[],
	onCancel?: () => void,
): ReadableStream<Uint8Array> {
	const encoder = new TextEncoder();
	let index = 0;

	return new ReadableStream<Uint8Array>({
		pull(controller) {
			if (index < chunks.length) {
				controller.enqueue(encoder.encode(chunks[index]));
				index++;
			} else {
				controller.close();
			}
		},
		cancel() {
			onCancel?.();
		},
	});
}

/**
 * Cuts `text` into pieces of at most `size` characters.
 */
export function splitEvery(text: string, size: number): string[] {
	const pieces: string[] = [];
	for (let i = 0; i < text.length; i += size) {
		pieces.push(text.slice(i, i + size));
	}
	return pieces;
}

/**
 * Cuts `text` at the given offsets.
 */
export function splitAt(text: string, offsets: number[]): string[] {
	const pieces: string[] = [];
	let start = 0;
	for (const offset of offsets) {
		pieces.push(text.slice(start, offset));
		start = offset;
	}
	pieces.push(text.slice(start));
	return pieces;
}

/**
 * SSE body in the `alt=sse` dialect: one `data:` event per response object.
 */
export function sseBody(responses: unknown[]): string {
	return responses
		.map((response) => `data: ${JSON.stringify(response)}\r\n\r\n`)
		.join("");
}

// Helper to create Response objects with a JSON or text body
export function createMockResponse(
	body: unknown,
	options: { status?: number; contentType?: string } = {},
): Response {
	const { status = 200, contentType = "application/json" } = options;
	const bodyText = typeof body === "string" ? body : JSON.stringify(body);

	return new Response(bodyText, {
		status,
		headers: { "Content-Type": contentType },
	});
}

/**
 * Creates a Response whose body streams `chunks` as `text/event-stream`.
 */
export function createMockSSEResponse(
	chunks: string[],
	options: { status?: number; onCancel?: () => void } = {},
): Response {
	const { status = 200, onCancel } = options;

	return new Response(createChunkedStream(chunks, onCancel), {
		status,
		headers: { "Content-Type": "text/event-stream" },
	});
}

/**
 * Drains an async iterable, returning the items received and the error that
 * ended it, if any.
 */
export async function collect<T>(
	iterable: AsyncIterable<T>,
): Promise<{ items: T[]; error: unknown }> {
	const items: T[] = [];
	try {
		for await (const item of iterable) {
			items.push(item);
		}
	} catch (error) {
		return { items, error };
	}
	return { items, error: undefined };
}

/**
 * Reads a stream to the end with a reader.
 */
export async function readAll<T>(stream: ReadableStream<T>): Promise<T[]> {
	const reader = stream.getReader();
	const values: T[] = [];
	while (true) {
		const { done, value } = await reader.read();
		if (done) return values;
		values.push(value);
	}
}

/**
 * Stream of the given values, closed after the last one.
 */
export function streamOf<T>(values: T[]): ReadableStream<T> {
	return new ReadableStream<T>({
		start(controller) {
			for (const value of values) {
				controller.enqueue(value);
			}
			controller.close();
		},
	});
}
