/**
 * Prompt assembly for PRD generation.
 *
 * Merges the product inputs with the chosen skeleton and, when reference
 * images are supplied, wraps the result in a multimodal content list:
 *   [intro text, image 1, …, image N, prompt text]
 */

import { ValidationError } from "./errors";
import { skeletonFor } from "./templates";
import {
  REQUIRED_FIELDS,
  type ContentPart,
  type DocumentFormat,
  type GenerationInputs,
  type PromptRequest,
  type ReferenceImage,
  type RequiredField,
  type UserContent,
} from "./types";

export const TBD_FALLBACK = "To be determined";
export const NONE_FALLBACK = "None provided";

// ---------------------------------------------------------------------------
// System prompt
// ---------------------------------------------------------------------------

export const SYSTEM_PROMPT = `You are a Principal Product Manager with 15 years of experience shipping products used by millions of people. Your Product Requirements Documents are the reference other teams copy.

Your PRDs are:
- **Specific**: concrete details instead of vague descriptions
- **Measurable**: every goal carries a numeric target
- **Actionable**: engineers can build directly from the requirements
- **Complete**: no section is left as a placeholder
- **Realistic**: timelines, estimates and metrics hold up to scrutiny

Rules you always follow:
1. Fill every section with specific, realistic content drawn from the product inputs
2. Write believable success metrics (e.g. "Raise checkout conversion from 64% to 78%")
3. Write 4–6 concrete user stories, each with an acceptance criteria checklist
4. List at least 6 functional requirements ranked P0/P1/P2
5. Name 3–5 risks, each with a specific mitigation
6. Propose a realistic week-by-week timeline with clear milestones
7. Always state explicit out-of-scope items
8. Use clean, professional Markdown throughout
9. Never write "[describe here]", "[add details]" or any other placeholder text`;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function findMissingFields(inputs: Partial<GenerationInputs>): RequiredField[] {
  return REQUIRED_FIELDS.filter((field) => !(inputs[field] ?? "").trim());
}

export function assertRequiredFields(inputs: Partial<GenerationInputs>): void {
  const missing = findMissingFields(inputs);
  if (missing.length > 0) {
    throw new ValidationError(missing);
  }
}

function orFallback(value: string | undefined, fallback: string): string {
  const trimmed = (value ?? "").trim();
  return trimmed || fallback;
}

// ---------------------------------------------------------------------------
// Prompt text
// ---------------------------------------------------------------------------

/**
 * Build the text prompt: product inputs, filled skeleton and the closing
 * directive to replace every placeholder.
 */
export function buildPrompt(
  inputs: GenerationInputs,
  format: DocumentFormat,
  now: Date = new Date()
): string {
  const productName = inputs.productName.trim();
  const skeleton = skeletonFor(format, now).replaceAll(
    "{product_name}",
    () => productName
  );

  return `## Product Inputs

**Product / Feature Name**: ${productName}

**Problem Statement**:
${inputs.problemStatement.trim()}

**Target Users**:
${inputs.targetUsers.trim()}

**Proposed Solution**:
${inputs.proposedSolution.trim()}

**Business Goals & Expected Impact**:
${orFallback(inputs.businessGoals, TBD_FALLBACK)}

**Timeline**:
${orFallback(inputs.timeline, TBD_FALLBACK)}

**Additional Context**:
${orFallback(inputs.additionalContext, NONE_FALLBACK)}

---

${skeleton}

Write the complete PRD now. Replace every placeholder and bracketed instruction with specific, realistic, actionable content derived from the product inputs above.`;
}

/**
 * Build the instruction block that precedes attached reference images.
 */
export function buildImageIntro(count: number): string {
  const plural = count === 1 ? "" : "s";

  return `I'm attaching ${count} visual reference${plural} (mockup${plural} / wireframe${plural}) to inform this PRD.

Please:
1. Analyze each visual carefully and identify the key screens, user flows and UI patterns it shows.
2. Cite specific observations from the visuals in the relevant PRD sections (Design & UX, User Stories, Functional Requirements).
3. Use the visuals to make acceptance criteria and functional requirements more precise and implementation-ready.

`;
}

// ---------------------------------------------------------------------------
// Request assembly
// ---------------------------------------------------------------------------

export function buildPromptRequest(
  inputs: GenerationInputs,
  format: DocumentFormat,
  images: readonly ReferenceImage[] = [],
  now: Date = new Date()
): PromptRequest {
  assertRequiredFields(inputs);

  const prompt = buildPrompt(inputs, format, now);

  if (images.length === 0) {
    const content: UserContent = { kind: "text_only", text: prompt };
    return Object.freeze({ system: SYSTEM_PROMPT, content: Object.freeze(content) });
  }

  const parts: ContentPart[] = [
    { type: "text", text: buildImageIntro(images.length) },
    ...images.map(
      (img): ContentPart => ({
        type: "image",
        image: img.data,
        mediaType: img.mediaType,
      })
    ),
    { type: "text", text: prompt },
  ];
  const content: UserContent = {
    kind: "with_attachments",
    parts: Object.freeze(parts),
  };

  return Object.freeze({ system: SYSTEM_PROMPT, content: Object.freeze(content) });
}
