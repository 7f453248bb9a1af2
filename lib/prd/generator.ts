/**
 * PRD generation service.
 *
 * Configuration and input validation happen synchronously in
 * `startGeneration`, before any model stream exists. Everything after that is
 * reported through the event stream.
 */

import { requireApiKey } from "./config";
import { collectDocument, relay } from "./events";
import { streamDocument } from "./openrouter";
import { buildPromptRequest } from "./prompts";
import type {
  DocumentFormat,
  GenerationEvent,
  GenerationInputs,
  ModelConfig,
  ReferenceImage,
} from "./types";
import { DEFAULT_FORMAT } from "./types";

export interface GenerationRequest {
  inputs: GenerationInputs;
  format?: DocumentFormat;
  images?: readonly ReferenceImage[];
}

export interface GenerationOptions {
  /** Overrides the configured model for this request. */
  model?: string;
  signal?: AbortSignal;
  now?: Date;
}

/**
 * Validate, assemble and start a generation.
 *
 * @throws ConfigurationError when no API key is configured
 * @throws ValidationError when required inputs are blank
 */
export function startGeneration(
  request: GenerationRequest,
  config: ModelConfig,
  options: GenerationOptions = {}
): AsyncGenerator<GenerationEvent, void, undefined> {
  requireApiKey(config);

  const prompt = buildPromptRequest(
    request.inputs,
    request.format ?? DEFAULT_FORMAT,
    request.images ?? [],
    options.now
  );
  const modelConfig: ModelConfig = options.model
    ? { ...config, model: options.model }
    : config;

  return relay(streamDocument(prompt, modelConfig, options.signal));
}

/**
 * Generate a complete document and return it as a single string.
 */
export async function generateDocument(
  request: GenerationRequest,
  config: ModelConfig,
  options: GenerationOptions = {}
): Promise<string> {
  return collectDocument(startGeneration(request, config, options));
}
