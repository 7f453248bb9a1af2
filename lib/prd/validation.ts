/**
 * Request body schema for the PRD stream endpoint.
 *
 * The schema checks the body's shape only. Required fields may still arrive
 * blank; that is reported as a ValidationError by the prompt builder so the
 * missing-field list stays in one place.
 */

import { z } from "zod";
import { resolveFormat } from "./templates";
import type {
  DocumentFormat,
  GenerationInputs,
  ReferenceImage,
} from "./types";

export const SUPPORTED_IMAGE_TYPES = [
  "image/png",
  "image/jpeg",
  "image/gif",
  "image/webp",
] as const;

export const MAX_IMAGES = 10;

const DATA_URL_PREFIX = /^data:[\w.+-]+\/[\w.+-]+;base64,/;

const ImageSchema = z.object({
  // Accepts raw base64 or a `data:<type>;base64,` URL as produced by FileReader
  data: z
    .string()
    .trim()
    .transform((value) => value.replace(DATA_URL_PREFIX, ""))
    .pipe(
      z
        .string()
        .min(1, "Image data is required")
        .base64("Image data must be base64")
    ),
  media_type: z.enum(SUPPORTED_IMAGE_TYPES).default("image/png"),
});

export const GenerationRequestSchema = z
  .object({
    product_name: z.string().default(""),
    problem_statement: z.string().default(""),
    target_users: z.string().default(""),
    proposed_solution: z.string().default(""),
    business_goals: z.string().optional(),
    timeline: z.string().optional(),
    additional_context: z.string().optional(),
    format: z.string().optional(),
    format_type: z.string().optional(),
    model: z.string().optional(),
    images: z
      .array(ImageSchema)
      .max(MAX_IMAGES, `At most ${MAX_IMAGES} images are allowed`)
      .default([]),
  })
  .transform((body): ParsedGenerationRequest => ({
    inputs: {
      productName: body.product_name,
      problemStatement: body.problem_statement,
      targetUsers: body.target_users,
      proposedSolution: body.proposed_solution,
      businessGoals: body.business_goals,
      timeline: body.timeline,
      additionalContext: body.additional_context,
    },
    format: resolveFormat(body.format ?? body.format_type),
    model: body.model?.trim() || undefined,
    images: body.images.map((img) => ({
      data: Buffer.from(img.data, "base64"),
      mediaType: img.media_type,
    })),
  }));

export interface ParsedGenerationRequest {
  inputs: GenerationInputs;
  format: DocumentFormat;
  model?: string;
  images: ReferenceImage[];
}
