/**
 * Event relay: turns a fragment sequence into GenerationEvents.
 *
 * Every generation ends with exactly one terminal event, `done` or `error`.
 * Fragments already relayed before a failure stay valid.
 */

import { TransportError, describeError } from "./errors";
import type { GenerationEvent } from "./types";

export async function* relay(
  fragments: AsyncIterable<string>
): AsyncGenerator<GenerationEvent, void, undefined> {
  try {
    for await (const text of fragments) {
      yield { type: "fragment", text };
    }
  } catch (error) {
    yield { type: "error", message: describeError(error) };
    return;
  }
  yield { type: "done" };
}

export function isTerminal(event: GenerationEvent): boolean {
  return event.type === "done" || event.type === "error";
}

/**
 * Concatenate the fragments of an event stream into the full document.
 * Rejects with a TransportError if the stream ends in an error event.
 */
export async function collectDocument(
  events: AsyncIterable<GenerationEvent>
): Promise<string> {
  let document = "";

  for await (const event of events) {
    switch (event.type) {
      case "fragment":
        document += event.text;
        break;
      case "error":
        throw new TransportError(event.message);
      case "done":
        return document;
    }
  }

  throw new TransportError("Event stream ended without a terminal event");
}
