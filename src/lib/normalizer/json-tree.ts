/**
 * Validation of untyped input into JSON-like trees
 */

import type { JsonObject, JsonValue } from "../../types/data-model.js";
import { MalformedDocumentError } from "../../utils/errors.js";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isScalar(value: JsonValue): value is string | number | boolean | null {
  return value === null || typeof value !== "object";
}

/**
 * Check an untyped value is a JSON tree and return it typed.
 * Throws MalformedDocumentError naming the first offending path.
 */
export function toJsonValue(value: unknown, path = "$"): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new MalformedDocumentError(`Non-finite number at ${path}`, path);
    }
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => toJsonValue(item, `${path}[${index}]`));
  }

  if (isPlainObject(value)) {
    const result: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = toJsonValue(child, `${path}.${key}`);
    }
    return result;
  }

  throw new MalformedDocumentError(
    `Unsupported value of type ${describe(value)} at ${path}`,
    path,
  );
}

/**
 * Parse and validate a document body whose root must be an object
 */
export function toJsonObject(value: unknown): JsonObject {
  const tree = toJsonValue(typeof value === "string" ? parseJson(value) : value);
  if (!isJsonObject(tree)) {
    throw new MalformedDocumentError(
      `Document root must be an object, got ${tree === null ? "null" : Array.isArray(tree) ? "array" : typeof tree}`,
      "$",
    );
  }
  return tree;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedDocumentError("Document body is not valid JSON", "$", {
      cause: error,
    });
  }
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}
