import { SerializationError } from "../errors.js";

/**
 * Whether the stream wraps its values in an outer `[...]`.
 * Decided by the first non-whitespace character.
 */
type EnvelopeState = "pending" | "none" | "open" | "closed";

const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

/**
 * Splits concatenated JSON text into complete top-level values.
 *
 * Streaming responses arrive either as one JSON array whose elements are
 * emitted one at a time (`[{...},\r\n{...}]`), or as a plain sequence of
 * objects. Text may be cut anywhere, including inside strings and escapes,
 * so the splitter tracks nesting depth and string state across calls to
 * {@link push}.
 *
 * @example
 * ```typescript
 * const splitter = new FrameSplitter();
 * splitter.push('[{"candidates":[{"content"'); // []
 * splitter.push(':{"parts":[{"text":"Hi"}]}}]}'); // ['{"candidates":[...]}']
 * splitter.push(']');
 * splitter.end();
 * ```
 */
export class FrameSplitter {
	private depth = 0;
	private inString = false;
	private escaped = false;
	private envelope: EnvelopeState = "pending";
	/** Text of the value in progress that arrived in earlier pushes. */
	private pending = "";

	/**
	 * Feeds the next piece of text and returns the values it completed, in order.
	 * @throws {SerializationError} on text that cannot belong to a response stream
	 */
	push(text: string): string[] {
		const frames: string[] = [];
		let start = this.inValue() ? 0 : -1;

		for (let i = 0; i < text.length; i++) {
			const char = text[i];

			if (this.inString) {
				if (this.escaped) {
					this.escaped = false;
				} else if (char === "\\") {
					this.escaped = true;
				} else if (char === '"') {
					this.inString = false;
				}
				continue;
			}

			if (this.inValue()) {
				switch (char) {
					case '"':
						this.inString = true;
						break;
					case "{":
					case "[":
						this.depth++;
						break;
					case "}":
					case "]":
						this.depth--;
						if (this.depth === this.baseDepth()) {
							frames.push(this.pending + text.slice(start, i + 1));
							this.pending = "";
							start = -1;
						}
						break;
				}
				continue;
			}

			// Between values
			if (WHITESPACE.has(char)) continue;

			if (this.envelope === "closed") {
				throw new SerializationError(
					`Unexpected '${char}' after the end of the response array`,
				);
			}

			switch (char) {
				case ",":
					if (this.envelope === "pending") {
						throw new SerializationError("Response stream starts with ','");
					}
					break;
				case "[":
					if (this.envelope === "pending") {
						this.envelope = "open";
						this.depth = 1;
					} else {
						start = i;
						this.depth++;
					}
					break;
				case "{":
					if (this.envelope === "pending") {
						this.envelope = "none";
					}
					start = i;
					this.depth++;
					break;
				case "]":
					if (this.envelope !== "open") {
						throw new SerializationError("Unexpected ']' outside a JSON value");
					}
					this.envelope = "closed";
					this.depth = 0;
					break;
				default:
					throw new SerializationError(
						`Unexpected '${char}' between JSON values`,
					);
			}
		}

		if (start !== -1) {
			this.pending += text.slice(start);
		}
		return frames;
	}

	/**
	 * Signals end of input.
	 * @throws {SerializationError} if a value or the outer array is still open
	 */
	end(): void {
		if (this.inValue()) {
			throw new SerializationError(
				"Stream ended in the middle of a JSON value",
				this.pending,
			);
		}
		if (this.envelope === "open") {
			throw new SerializationError(
				"Stream ended before the response array was closed",
			);
		}
	}

	private baseDepth(): number {
		return this.envelope === "open" ? 1 : 0;
	}

	private inValue(): boolean {
		return this.inString || this.depth > this.baseDepth();
	}
}

/**
 * Wraps a {@link FrameSplitter} in a TransformStream of text to JSON values.
 */
export function createFrameSplitter(): TransformStream<string, string> {
	const splitter = new FrameSplitter();

	return new TransformStream({
		transform(chunk, controller) {
			for (const frame of splitter.push(chunk)) {
				controller.enqueue(frame);
			}
		},
		flush() {
			splitter.end();
		},
	});
}
