/**
 * Server-Sent Events codec for GenerationEvents.
 *
 * Each event is one `data: <json>\n\n` frame. The outbound stream is
 * pull-driven: the next event is requested only when the consumer reads, and
 * cancelling the stream returns the underlying iterator.
 */

import type { GenerationEvent } from "./types";

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

export function sseEncode(event: GenerationEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function toEventStream(
  events: AsyncIterable<GenerationEvent>
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const iterator = events[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const { done, value } = await iterator.next();
      if (done) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(sseEncode(value)));
    },
    async cancel() {
      await iterator.return?.();
    },
  });
}

function isGenerationEvent(value: unknown): value is GenerationEvent {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  switch (value.type) {
    case "fragment":
      return "text" in value && typeof value.text === "string";
    case "error":
      return "message" in value && typeof value.message === "string";
    case "done":
      return true;
    default:
      return false;
  }
}

function decodeFrame(frame: string): GenerationEvent | null {
  const dataLine = frame.trim();
  if (!dataLine.startsWith("data: ")) return null;

  try {
    const parsed: unknown = JSON.parse(dataLine.slice(6));
    return isGenerationEvent(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Decode an SSE response body back into GenerationEvents.
 * Frames that are not `data:` lines or do not hold an event are skipped.
 */
export async function* parseEventStream(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<GenerationEvent, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const frames = buffer.split("\n\n");
      buffer = frames.pop() ?? "";

      for (const frame of frames) {
        const event = decodeFrame(frame);
        if (event) yield event;
      }
    }

    buffer += decoder.decode();
    const trailing = decodeFrame(buffer);
    if (trailing) yield trailing;
  } finally {
    reader.releaseLock();
  }
}
