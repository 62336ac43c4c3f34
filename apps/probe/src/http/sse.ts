import type { ReadableStream } from "node:stream/web";

export interface SseEvent {
  event?: string;
  data: string;
}

/**
 * Decode a `text/event-stream` body into events. Frames end at a blank line;
 * multiple `data:` lines are joined with "\n"; comment lines are skipped.
 */
export async function* parseSseStream(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<SseEvent> {
  const reader = body.getReader();
  const decoder = new TextDecoder();

  let buffer = "";
  let eventName: string | undefined;
  let dataLines: string[] = [];
  let finished = false;

  // Returns a complete event when `line` terminates one
  const feed = (line: string): SseEvent | undefined => {
    if (line === "") {
      if (dataLines.length === 0) {
        eventName = undefined;
        return undefined;
      }
      const event: SseEvent = { event: eventName, data: dataLines.join("\n") };
      eventName = undefined;
      dataLines = [];
      return event;
    }

    if (line.startsWith(":")) return undefined;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "event") {
      eventName = value;
    } else if (field === "data") {
      dataLines.push(value);
    }
    return undefined;
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const event = feed(line);
        if (event) yield event;
      }
    }

    finished = true;
    buffer += decoder.decode();

    // Stream ended without the trailing blank line
    for (const line of [...buffer.split(/\r?\n/), ""]) {
      const event = feed(line);
      if (event) yield event;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
