/**
 * Structured-output checking with AJV.
 * An OutputShape is compiled to a JSON schema requiring every field.
 */

import AjvModule, { type ValidateFunction } from 'ajv';
import type { OutputShape } from './types.js';

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true });
const compiled = new WeakMap<OutputShape, ValidateFunction>();

export function shapeToJsonSchema(shape: OutputShape): Record<string, unknown> {
  const properties: Record<string, { type: string }> = {};
  for (const [field, type] of Object.entries(shape)) {
    properties[field] = { type };
  }
  return {
    type: 'object',
    properties,
    required: Object.keys(shape),
  };
}

export type ShapeCheck =
  | { ok: true; fields: Record<string, unknown> }
  | { ok: false; errors: string };

/**
 * Validate a parsed JSON value against a shape.
 * Extra fields are allowed; missing or mistyped ones are reported.
 */
export function checkShape(value: unknown, shape: OutputShape): ShapeCheck {
  let validate = compiled.get(shape);
  if (!validate) {
    validate = ajv.compile(shapeToJsonSchema(shape));
    compiled.set(shape, validate);
  }
  if (validate(value) && isRecord(value)) {
    return { ok: true, fields: value };
  }
  const errors = validate.errors
    ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    .join('; ');
  return { ok: false, errors: errors ?? 'Unknown validation error' };
}

/**
 * Extract JSON from text that may carry markdown fences or chatter around it.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
