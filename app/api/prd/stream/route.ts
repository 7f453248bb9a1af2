/**
 * SSE streaming endpoint for PRD generation.
 *
 * POST /api/prd/stream
 *
 * Accepts: { product_name, problem_statement, target_users, proposed_solution,
 *            business_goals?, timeline?, additional_context?, format?, model?,
 *            images?: [{ data: <base64>, media_type? }] }
 *
 * Emits one `fragment` event per generated chunk, then exactly one `done` or
 * `error` event.
 */

import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/prd/config";
import { ConfigurationError, ValidationError } from "@/lib/prd/errors";
import { startGeneration } from "@/lib/prd/generator";
import { SSE_HEADERS, toEventStream } from "@/lib/prd/sse";
import { GenerationRequestSchema } from "@/lib/prd/validation";
import { WIRE_FIELD_NAMES } from "@/lib/prd/types";

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json(
      { error: "Request body must be valid JSON" },
      { status: 400 }
    );
  }

  const parsed = GenerationRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: parsed.error.flatten().fieldErrors },
      { status: 400 }
    );
  }

  const { inputs, format, images, model } = parsed.data;

  try {
    const events = startGeneration(
      { inputs, format, images },
      loadConfig(),
      { model, signal: request.signal }
    );

    return new Response(toEventStream(events), { headers: SSE_HEADERS });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error("[prd/stream] Configuration error:", error.message);
      return NextResponse.json({ error: error.message }, { status: 500 });
    }
    if (error instanceof ValidationError) {
      return NextResponse.json(
        {
          error: error.message,
          missingFields: error.missingFields.map(
            (field) => WIRE_FIELD_NAMES[field]
          ),
        },
        { status: 422 }
      );
    }
    throw error;
  }
}
