/**
 * Extracts the data payload of each SSE event from a byte stream.
 * SSE format: "data: <payload>\n\n", optionally over several `data:` lines.
 *
 * Payloads are emitted as-is; they are fragments of a larger JSON text and
 * need not be complete values.
 */
export function createSSEParser(): TransformStream<Uint8Array, string> {
	let buffer = "";
	// Reuse decoder with stream mode to correctly handle multi-byte UTF-8 chars spanning chunks
	const decoder = new TextDecoder();

	return new TransformStream({
		transform(chunk, controller) {
			buffer += decoder.decode(chunk, { stream: true });
			// A trailing \r may be the first half of \r\n
			const tail = buffer.endsWith("\r") ? "\r" : "";
			const text = (tail ? buffer.slice(0, -1) : buffer).replace(
				/\r\n?/g,
				"\n",
			);

			// SSE events are separated by blank lines
			const events = text.split("\n\n");
			// Keep the last potentially incomplete event in the buffer
			buffer = (events.pop() ?? "") + tail;

			for (const event of events) {
				const data = eventData(event);
				if (data !== undefined) {
					controller.enqueue(data);
				}
			}
		},
		flush(controller) {
			buffer += decoder.decode();
			const data = eventData(buffer.replace(/\r\n?/g, "\n"));
			if (data !== undefined) {
				controller.enqueue(data);
			}
		},
	});
}

/**
 * Joins the `data:` lines of one event. Comments and other fields are ignored.
 */
function eventData(event: string): string | undefined {
	const lines: string[] = [];
	for (const line of event.split("\n")) {
		if (line === "data") {
			lines.push("");
		} else if (line.startsWith("data:")) {
			const value = line.slice(5);
			lines.push(value.startsWith(" ") ? value.slice(1) : value);
		}
	}
	return lines.length > 0 ? lines.join("\n") : undefined;
}
