/**
 * GET /api/health — liveness plus the active model and available formats.
 */

import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/prd/config";
import { FORMAT_REGISTRY } from "@/lib/prd/templates";

export async function GET() {
  const config = loadConfig();

  return NextResponse.json({
    status: "ok",
    model: config.model,
    configured: config.apiKey !== null,
    formats: Object.values(FORMAT_REGISTRY),
  });
}
