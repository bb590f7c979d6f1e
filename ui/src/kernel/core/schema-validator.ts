/**
 * Lightweight JSON Schema validator for dropdown options.
 *
 * Supports the subset the option schema needs: type, properties, enum,
 * minimum, exclusiveMinimum. Unknown properties are ignored so
 * callback options (functions) can sit next to the validated scalars.
 */

import type { JsonSchema } from "../types.ts";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateValue(schema: JsonSchema, value: unknown): ValidationResult {
  const errors: string[] = [];
  validate(schema, value, "", errors);
  return { valid: errors.length === 0, errors };
}

function validate(schema: JsonSchema, value: unknown, path: string, errors: string[]): void {
  const label = path || "root";

  if (!checkType(schema.type, value)) {
    errors.push(`${label}: expected type "${schema.type}", got ${typeLabel(value)}`);
    return;
  }

  if (schema.enum && !schema.enum.some((v) => v === value)) {
    errors.push(`${label}: value not in enum`);
  }

  if (typeof value === "number") {
    if (schema.minimum !== undefined && value < schema.minimum) {
      errors.push(`${label}: must be >= ${schema.minimum}, got ${value}`);
    }
    if (schema.exclusiveMinimum !== undefined && value <= schema.exclusiveMinimum) {
      errors.push(`${label}: must be > ${schema.exclusiveMinimum}, got ${value}`);
    }
  }

  if (schema.type === "object" && schema.properties && isRecord(value)) {
    for (const [key, propSchema] of Object.entries(schema.properties)) {
      if (value[key] !== undefined) {
        validate(propSchema, value[key], path ? `${path}.${key}` : key, errors);
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkType(type: string, value: unknown): boolean {
  switch (type) {
    case "string": return typeof value === "string";
    case "number": return typeof value === "number" && Number.isFinite(value);
    case "integer": return typeof value === "number" && Number.isInteger(value);
    case "boolean": return typeof value === "boolean";
    case "object": return isRecord(value);
    case "array": return Array.isArray(value);
    case "null": return value === null;
    case "function": return typeof value === "function";
    default: return true;
  }
}

function typeLabel(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
