/**
 * Model configuration.
 *
 * Resolution order: config.json in the working directory, then environment
 * variables, then defaults. A missing API key is not an error here; callers
 * that need to reach the model use `requireApiKey`.
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  OPENROUTER_BASE_URL,
  type ModelConfig,
} from "./types";

export const CONFIG_FILE_NAME = "config.json";

const ConfigFileSchema = z.object({
  api_key: z.string().optional(),
  model: z.string().optional(),
  max_tokens: z.number().int().positive().optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(cwd: string): ConfigFile {
  const filePath = path.join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(filePath)) return {};

  try {
    const parsed = ConfigFileSchema.safeParse(
      JSON.parse(readFileSync(filePath, "utf8"))
    );
    if (parsed.success) return parsed.data;
    console.warn(
      `[config] Ignoring ${CONFIG_FILE_NAME}:`,
      parsed.error.flatten().fieldErrors
    );
  } catch (error) {
    console.warn(`[config] Could not read ${CONFIG_FILE_NAME}:`, error);
  }
  return {};
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseMaxTokens(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

export function loadConfig(options: LoadConfigOptions = {}): ModelConfig {
  const env = options.env ?? process.env;
  const file = readConfigFile(options.cwd ?? process.cwd());

  return {
    apiKey:
      nonEmpty(file.api_key) ?? nonEmpty(env.OPENROUTER_API_KEY) ?? null,
    model: nonEmpty(file.model) ?? nonEmpty(env.PRD_MODEL) ?? DEFAULT_MODEL,
    maxTokens:
      file.max_tokens ??
      parseMaxTokens(env.PRD_MAX_TOKENS) ??
      DEFAULT_MAX_TOKENS,
    baseURL: OPENROUTER_BASE_URL,
  };
}

export function requireApiKey(config: ModelConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError(
      `OpenRouter API key not found. Add "api_key" to ${CONFIG_FILE_NAME} or set the OPENROUTER_API_KEY environment variable.`
    );
  }
  return config.apiKey;
}
