import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock the AI SDK so no request leaves the process
vi.mock("ai", () => ({
  streamText: vi.fn(),
}));

import { streamText } from "ai";
import { streamDocument, toUserMessage } from "@/lib/prd/openrouter";
import { TransportError } from "@/lib/prd/errors";
import type { ModelConfig, PromptRequest } from "@/lib/prd/types";

const mockStreamText = vi.mocked(streamText);

const TEST_CONFIG: ModelConfig = {
  apiKey: "test-key",
  model: "test/model",
  maxTokens: 1000,
  baseURL: "https://openrouter.test/api/v1",
};

const TEXT_REQUEST: PromptRequest = {
  system: "You are a PM.",
  content: { kind: "text_only", text: "Write the PRD." },
};

type StreamPart =
  | { type: "text-delta"; textDelta: string }
  | { type: "error"; error: unknown }
  | { type: "finish" };

function mockParts(parts: StreamPart[], thrown?: Error) {
  async function* fullStream() {
    for (const part of parts) yield part;
    if (thrown) throw thrown;
  }
  mockStreamText.mockReturnValue({
    fullStream: fullStream(),
  } as unknown as ReturnType<typeof streamText>);
}

function abortSignalOfCall(): AbortSignal | undefined {
  return mockStreamText.mock.calls[0][0].abortSignal;
}

async function collect(gen: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const text of gen) out.push(text);
  return out;
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// Message mapping
// ---------------------------------------------------------------------------

describe("toUserMessage", () => {
  it("sends text-only content as a plain string", () => {
    expect(toUserMessage({ kind: "text_only", text: "hello" })).toEqual({
      role: "user",
      content: "hello",
    });
  });

  it("maps attachments to text and image parts in order", () => {
    const png = new Uint8Array([1, 2]);
    const jpg = new Uint8Array([3, 4]);

    expect(
      toUserMessage({
        kind: "with_attachments",
        parts: [
          { type: "text", text: "intro" },
          { type: "image", image: png, mediaType: "image/png" },
          { type: "image", image: jpg, mediaType: "image/jpeg" },
          { type: "text", text: "prompt" },
        ],
      })
    ).toEqual({
      role: "user",
      content: [
        { type: "text", text: "intro" },
        { type: "image", image: png, mimeType: "image/png" },
        { type: "image", image: jpg, mimeType: "image/jpeg" },
        { type: "text", text: "prompt" },
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

describe("streamDocument", () => {
  it("yields text deltas in order and skips empty ones", async () => {
    mockParts([
      { type: "text-delta", textDelta: "# Checkout" },
      { type: "text-delta", textDelta: "" },
      { type: "text-delta", textDelta: " Express" },
      { type: "finish" },
    ]);

    const fragments = await collect(streamDocument(TEXT_REQUEST, TEST_CONFIG));
    expect(fragments).toEqual(["# Checkout", " Express"]);
  });

  it("opens exactly one stream with the request and config", async () => {
    mockParts([{ type: "text-delta", textDelta: "x" }]);

    await collect(streamDocument(TEXT_REQUEST, TEST_CONFIG));

    expect(mockStreamText).toHaveBeenCalledTimes(1);
    expect(mockStreamText).toHaveBeenCalledWith(
      expect.objectContaining({
        system: "You are a PM.",
        messages: [{ role: "user", content: "Write the PRD." }],
        maxTokens: 1000,
      })
    );
  });

  it("does not open a stream until the first fragment is requested", () => {
    mockParts([]);
    streamDocument(TEXT_REQUEST, TEST_CONFIG);
    expect(mockStreamText).not.toHaveBeenCalled();
  });

  it("raises a TransportError on a stream error part", async () => {
    mockParts([
      { type: "text-delta", textDelta: "partial" },
      { type: "error", error: new Error("upstream 529 overloaded") },
      { type: "text-delta", textDelta: "never seen" },
    ]);

    const seen: string[] = [];
    let caught: unknown;
    try {
      for await (const text of streamDocument(TEXT_REQUEST, TEST_CONFIG)) {
        seen.push(text);
      }
    } catch (error) {
      caught = error;
    }

    expect(seen).toEqual(["partial"]);
    expect(caught).toBeInstanceOf(TransportError);
    expect(caught).toHaveProperty("message", "upstream 529 overloaded");
  });

  it("wraps thrown stream failures in a TransportError", async () => {
    mockParts([{ type: "text-delta", textDelta: "a" }], new Error("socket hang up"));

    await expect(
      collect(streamDocument(TEXT_REQUEST, TEST_CONFIG))
    ).rejects.toThrow(new TransportError("socket hang up"));
  });

  it("aborts the upstream request when the consumer stops early", async () => {
    mockParts([
      { type: "text-delta", textDelta: "a" },
      { type: "text-delta", textDelta: "b" },
    ]);

    const gen = streamDocument(TEXT_REQUEST, TEST_CONFIG);
    await gen.next();
    const upstream = abortSignalOfCall();
    expect(upstream?.aborted).toBe(false);

    await gen.return();
    expect(upstream?.aborted).toBe(true);
  });

  it("forwards a caller abort to the upstream request", async () => {
    mockParts([
      { type: "text-delta", textDelta: "a" },
      { type: "text-delta", textDelta: "b" },
    ]);
    const caller = new AbortController();

    const gen = streamDocument(TEXT_REQUEST, TEST_CONFIG, caller.signal);
    await gen.next();
    const upstream = abortSignalOfCall();

    caller.abort();
    expect(upstream?.aborted).toBe(true);
    await gen.return();
  });

  it("refuses to open a stream for an already aborted signal", async () => {
    const caller = new AbortController();
    caller.abort();

    await expect(
      collect(streamDocument(TEXT_REQUEST, TEST_CONFIG, caller.signal))
    ).rejects.toThrow(TransportError);
    expect(mockStreamText).not.toHaveBeenCalled();
  });
});
