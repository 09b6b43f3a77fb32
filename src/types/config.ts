/**
 * Configuration types for relationalizer
 */

import type { LinkMode, SqlType, TypePolicy } from "./data-model.js";

/**
 * FieldRule - effect applied to a key while normalizing.
 * Keys of the rule table are bare key names (any depth) or exact paths
 * such as "$.Property.Parking" or "$.Individual.[].Organization".
 * A key starting with "*" matches every key ending with the rest ("*DateUTC").
 *
 * isoDate formats are built from YYYY, MM, DD, HH, hh, mm, ss and A (AM/PM),
 * or are "ticks" for 100ns ticks counted from 0001-01-01.
 */
export type FieldRule =
  | { effect: "drop" }
  | { effect: "pluck"; property: string }
  | { effect: "wrap" }
  | { effect: "first"; omit?: string[] }
  | { effect: "digits" }
  | { effect: "isoDate"; format: string };

export type FieldEffect = FieldRule["effect"];

export interface MinimalConfig {
  /** Root table columns to keep, empty keeps all */
  columns: string[];
  /** Keep only the root table */
  rootOnly: boolean;
}

export interface RelationalizerConfig {
  /** Name of the table holding top-level documents */
  rootTableName: string;
  /** Scalar lists up to this length are collapsed into one string */
  collapseThreshold: number;
  /** Joins collapsed and plucked list values */
  delimiter: string;
  /** Joins nested dict keys into column names */
  columnSeparator: string;
  /** Keys removed from every document */
  noiseKeys: string[];
  fieldRules: Record<string, FieldRule>;
  linkMode: LinkMode;
  typePolicy: TypePolicy;
  /** Per-column SQL type overrides, keyed by "Table.Column" or "Column" */
  columnTypes: Record<string, SqlType>;
  /** Classify numeric and boolean-looking strings by the type they spell */
  castStrings: boolean;
  minimal: MinimalConfig | null;
}

/** Minimal mode when enabled without explicit settings */
export const DEFAULT_MINIMAL: MinimalConfig = {
  columns: [],
  rootOnly: true,
};

export const DEFAULT_CONFIG: RelationalizerConfig = {
  rootTableName: "Listings",
  collapseThreshold: 3,
  delimiter: ",",
  columnSeparator: "_",
  noiseKeys: [],
  fieldRules: {},
  linkMode: "embedded",
  typePolicy: "text",
  columnTypes: {},
  castStrings: false,
  minimal: null,
};
