/**
 * Table splitter module types
 */

import type { RelationalizerConfig } from "../../types/config.js";

export type SplitterOptions = Pick<
  RelationalizerConfig,
  "columnSeparator" | "linkMode" | "typePolicy" | "columnTypes"
>;

export interface RestrictOptions {
  /** Root table columns to keep, empty keeps all */
  columns: string[];
  /** Drop every table but the root */
  rootOnly: boolean;
}
