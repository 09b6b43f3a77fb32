/**
 * Path and table naming shared by schema mode and row mode
 */

import type { ProfileNode } from "../../types/data-model.js";
import { isShapeConflict } from "../merger/index.js";
import { VALUE_KEY } from "../normalizer/index.js";

/**
 * Map key for a relative path; segments may contain any character
 */
export function pathKey(segments: string[]): string {
  return JSON.stringify(segments);
}

export function joinPath(base: string, segments: string[]): string {
  return [base, ...segments].join(".");
}

/**
 * A list position that becomes its own table
 */
export function isTableList(node: ProfileNode): boolean {
  return node.listCount > 0 && !isShapeConflict(node);
}

/**
 * A dict position that is flattened into the parent's columns
 */
export function isFlattenedObject(node: ProfileNode): boolean {
  return node.objectCount > 0 && !isShapeConflict(node);
}

/**
 * Name the table extracted from the list at `key`.
 * Wrapper keys and names equal to the root take the parent table as prefix.
 *
 * @example
 * tableNameFor("Phones", "Individual", "Listings") // Returns: "Phones"
 * tableNameFor("Value", "Tags", "Listings") // Returns: "TagsValue"
 */
export function tableNameFor(key: string, parentTable: string, rootTable: string): string {
  if (key === VALUE_KEY || key === rootTable) {
    return `${parentTable}${key}`;
  }
  return key;
}
