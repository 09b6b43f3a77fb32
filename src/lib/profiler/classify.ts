/**
 * Leaf classification into type tags
 */

import type { JsonPrimitive, TypeTag } from "../../types/data-model.js";

const INTEGER_STRING = /^-?\d+$/;
const FLOAT_STRING = /^-?(\d+\.\d*|\.\d+|\d+(\.\d*)?[eE][-+]?\d+)$/;
const BOOLEAN_STRING = /^(true|false)$/i;

/**
 * Classify a leaf value
 *
 * @param value - Leaf value
 * @param castStrings - When true, strings spelling a number or boolean are classified as such
 *
 * @example
 * classifyValue(3) // Returns: "integer"
 * classifyValue("3", true) // Returns: "integer"
 * classifyValue("3") // Returns: "string"
 */
export function classifyValue(value: JsonPrimitive, castStrings = false): TypeTag {
  if (value === null) return "null";
  if (typeof value === "boolean") return "boolean";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float";
  }
  if (castStrings) {
    return classifyString(value);
  }
  return "string";
}

function classifyString(value: string): TypeTag {
  if (INTEGER_STRING.test(value)) {
    return Number.isSafeInteger(Number(value)) ? "integer" : "string";
  }
  if (FLOAT_STRING.test(value)) return "float";
  if (BOOLEAN_STRING.test(value)) return "boolean";
  return "string";
}
