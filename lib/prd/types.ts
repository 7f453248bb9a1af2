/**
 * Core type definitions for the PRD generation pipeline.
 *
 * Pipeline:
 *   inputs + format → PromptRequest → model stream → GenerationEvent stream
 */

// ---------------------------------------------------------------------------
// Document formats
// ---------------------------------------------------------------------------

export type DocumentFormat =
  | "standard"
  | "one_page"
  | "agile_epic"
  | "feature_brief";

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = [
  "standard",
  "one_page",
  "agile_epic",
  "feature_brief",
] as const;

export const DEFAULT_FORMAT: DocumentFormat = "standard";

export interface FormatDefinition {
  id: DocumentFormat;
  name: string;
  description: string;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface GenerationInputs {
  productName: string;
  problemStatement: string;
  targetUsers: string;
  proposedSolution: string;
  businessGoals?: string;
  timeline?: string;
  additionalContext?: string;
}

export type InputField = keyof GenerationInputs;

export const REQUIRED_FIELDS = [
  "productName",
  "problemStatement",
  "targetUsers",
  "proposedSolution",
] as const satisfies readonly InputField[];

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/** Field names as they appear on the wire (request body, error payloads). */
export const WIRE_FIELD_NAMES: Record<InputField, string> = {
  productName: "product_name",
  problemStatement: "problem_statement",
  targetUsers: "target_users",
  proposedSolution: "proposed_solution",
  businessGoals: "business_goals",
  timeline: "timeline",
  additionalContext: "additional_context",
};

export interface ReferenceImage {
  data: Uint8Array;
  mediaType: string; // e.g. "image/png"
}

// ---------------------------------------------------------------------------
// Assembled request
// ---------------------------------------------------------------------------

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; image: Uint8Array; mediaType: string };

export type UserContent =
  | { kind: "text_only"; text: string }
  | { kind: "with_attachments"; parts: readonly ContentPart[] };

export interface PromptRequest {
  readonly system: string;
  readonly content: UserContent;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type GenerationEvent =
  | { type: "fragment"; text: string }
  | { type: "error"; message: string }
  | { type: "done" };

// ---------------------------------------------------------------------------
// Model configuration
// ---------------------------------------------------------------------------

export interface ModelConfig {
  apiKey: string | null;
  model: string;
  maxTokens: number;
  baseURL: string;
}

export const DEFAULT_MODEL = "anthropic/claude-sonnet-4-6";
export const DEFAULT_MAX_TOKENS = 4096;
export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
