/**
 * Error taxonomy for the generation pipeline.
 *
 * ValidationError and ConfigurationError are raised before a model stream is
 * opened. TransportError is raised by the stream adapter and converted into a
 * terminal `error` event by the relay.
 */

import { WIRE_FIELD_NAMES, type RequiredField } from "./types";

export class PrdError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends PrdError {
  readonly missingFields: RequiredField[];

  constructor(missingFields: RequiredField[]) {
    const names = missingFields.map((field) => WIRE_FIELD_NAMES[field]);
    super(`Missing required fields: ${names.join(", ")}`);
    this.missingFields = missingFields;
  }
}

export class ConfigurationError extends PrdError {}

export class TransportError extends PrdError {}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error) return error;
  return "Unknown error";
}
