/**
 * Command-line PRD generation.
 *
 *   npm run generate -- [inputs.json] [--format one_page] [--model <id>] [--out prd.md]
 *
 * Inputs use the same JSON shape as POST /api/prd/stream. Without an inputs
 * file the bundled sample is used. Output streams to stdout unless --out is
 * given.
 */

import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import { config as loadEnv } from "dotenv";
import { loadConfig } from "../lib/prd/config";
import { describeError } from "../lib/prd/errors";
import { isTerminal } from "../lib/prd/events";
import { generateDocument, startGeneration } from "../lib/prd/generator";
import { isDocumentFormat } from "../lib/prd/templates";
import { GenerationRequestSchema } from "../lib/prd/validation";

loadEnv({ path: ".env.local" });

const SAMPLE_INPUTS = path.join(__dirname, "sample-inputs.json");

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      format: { type: "string", short: "f" },
      model: { type: "string", short: "m" },
      out: { type: "string", short: "o" },
    },
  });

  const inputsPath = positionals[0] ?? SAMPLE_INPUTS;
  const raw: unknown = JSON.parse(readFileSync(inputsPath, "utf8"));
  const parsed = GenerationRequestSchema.parse({
    ...(typeof raw === "object" && raw !== null ? raw : {}),
    ...(values.format ? { format: values.format } : {}),
  });

  if (values.format && !isDocumentFormat(values.format)) {
    console.warn(
      `[generate-prd] Unknown format "${values.format}", using ${parsed.format}`
    );
  }

  const request = {
    inputs: parsed.inputs,
    format: parsed.format,
    images: parsed.images,
  };
  const options = { model: values.model ?? parsed.model };
  const config = loadConfig();

  if (values.out) {
    const document = await generateDocument(request, config, options);
    writeFileSync(values.out, document);
    console.log(`Wrote ${parsed.format} PRD to ${values.out}`);
    return;
  }

  for await (const event of startGeneration(request, config, options)) {
    if (event.type === "fragment") {
      process.stdout.write(event.text);
    } else if (event.type === "error") {
      throw new Error(event.message);
    }
    if (isTerminal(event)) break;
  }
  process.stdout.write("\n");
}

main().catch((error: unknown) => {
  console.error(`[generate-prd] ${describeError(error)}`);
  process.exit(1);
});
