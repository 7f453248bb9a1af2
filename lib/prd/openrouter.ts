/**
 * OpenRouter client — streams a PRD through the Vercel AI SDK pointed at the
 * OpenRouter endpoint.
 *
 * One call to `streamDocument` opens exactly one upstream stream. Fragments are
 * yielded as they arrive; a failure ends the sequence with a TransportError and
 * nothing is replayed.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { streamText, type CoreUserMessage } from "ai";
import { TransportError, describeError } from "./errors";
import { requireApiKey } from "./config";
import type { ModelConfig, PromptRequest, UserContent } from "./types";

function getOpenRouterProvider(config: ModelConfig) {
  return createOpenAI({
    baseURL: config.baseURL,
    apiKey: requireApiKey(config),
  });
}

/**
 * Map the assembled content onto the SDK's user message shape.
 */
export function toUserMessage(content: UserContent): CoreUserMessage {
  switch (content.kind) {
    case "text_only":
      return { role: "user", content: content.text };
    case "with_attachments":
      return {
        role: "user",
        content: content.parts.map((part) =>
          part.type === "text"
            ? { type: "text" as const, text: part.text }
            : {
                type: "image" as const,
                image: part.image,
                mimeType: part.mediaType,
              }
        ),
      };
  }
}

/**
 * Stream a document for an assembled request.
 *
 * The upstream request is aborted when the sequence ends for any reason:
 * normal completion, failure, the consumer stopping early, or `signal` firing.
 */
export async function* streamDocument(
  request: PromptRequest,
  config: ModelConfig,
  signal?: AbortSignal
): AsyncGenerator<string, void, undefined> {
  const provider = getOpenRouterProvider(config);
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);

  if (signal?.aborted) {
    throw new TransportError("Generation aborted before the stream opened");
  }
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const result = streamText({
      model: provider.chat(config.model),
      system: request.system,
      messages: [toUserMessage(request.content)],
      maxTokens: config.maxTokens,
      abortSignal: controller.signal,
    });

    for await (const part of result.fullStream) {
      if (part.type === "text-delta") {
        if (part.textDelta) yield part.textDelta;
      } else if (part.type === "error") {
        throw new TransportError(describeError(part.error), {
          cause: part.error,
        });
      }
    }
  } catch (error) {
    console.error(`[openrouter] Error streaming ${config.model}:`, error);
    if (error instanceof TransportError) throw error;
    throw new TransportError(describeError(error), { cause: error });
  } finally {
    signal?.removeEventListener("abort", onAbort);
    controller.abort();
  }
}
