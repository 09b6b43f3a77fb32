/**
 * Field rule resolution and application
 */

import type { FieldRule } from "../../types/config.js";
import type { JsonValue } from "../../types/data-model.js";
import { isJsonObject } from "./json-tree.js";

export interface RuleTable {
  byPath: Map<string, FieldRule>;
  byKey: Map<string, FieldRule>;
  /** Suffix rules, longest suffix first */
  bySuffix: Array<[string, FieldRule]>;
}

/**
 * Split rule keys into exact path rules ("$.Property.Parking"), suffix rules ("*DateUTC")
 * and bare key rules ("Distance").
 * Noise keys become drop rules unless a rule for the same key is configured.
 */
export function compileRules(
  fieldRules: Record<string, FieldRule>,
  noiseKeys: string[],
): RuleTable {
  const table: RuleTable = { byPath: new Map(), byKey: new Map(), bySuffix: [] };
  const suffixes = new Map<string, FieldRule>();

  const add = (key: string, rule: FieldRule): void => {
    if (key === "$" || key.startsWith("$.")) {
      table.byPath.set(key, rule);
    } else if (key.startsWith("*") && key.length > 1) {
      suffixes.set(key.slice(1), rule);
    } else {
      table.byKey.set(key, rule);
    }
  };

  for (const key of noiseKeys) {
    add(key, { effect: "drop" });
  }
  for (const [key, rule] of Object.entries(fieldRules)) {
    add(key, rule);
  }
  table.bySuffix = [...suffixes].sort(([a], [b]) => b.length - a.length);
  return table;
}

/**
 * Find the rule for a key: path rules, then key rules, then suffix rules
 */
export function resolveRule(
  table: RuleTable,
  key: string,
  path: string,
): FieldRule | undefined {
  const exact = table.byPath.get(path) ?? table.byKey.get(key);
  if (exact !== undefined) return exact;
  return table.bySuffix.find(([suffix]) => key.endsWith(suffix))?.[1];
}

/**
 * Apply a non-drop rule to a value. Values of the wrong shape pass through unchanged.
 */
export function applyRule(
  rule: Exclude<FieldRule, { effect: "drop" }>,
  value: JsonValue,
  delimiter: string,
): JsonValue {
  switch (rule.effect) {
    case "pluck":
      if (!Array.isArray(value)) return value;
      return value
        .map((item) => {
          const picked = isJsonObject(item) ? item[rule.property] : item;
          return picked === undefined || picked === null ? "" : scalarText(picked);
        })
        .join(delimiter);
    case "wrap":
      return isJsonObject(value) ? [value] : value;
    case "first": {
      if (!Array.isArray(value)) return value;
      const head = value[0] ?? null;
      const omit = rule.omit ?? [];
      if (!isJsonObject(head) || omit.length === 0) return head;
      return Object.fromEntries(Object.entries(head).filter(([name]) => !omit.includes(name)));
    }
    case "digits":
      return typeof value === "string" ? onlyDigits(value) : value;
    case "isoDate":
      if (typeof value !== "string") return value;
      return (rule.format === "ticks" ? ticksToIso(value) : parseDate(value, rule.format)) ?? value;
  }
}

function scalarText(value: JsonValue): string {
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * "MLS® R2754123" becomes 2754123. Digit runs too long for a safe integer stay text.
 */
export function onlyDigits(value: string): number | string | null {
  const digits = value.replace(/[^0-9]/g, "");
  if (digits === "") return null;
  const parsed = Number(digits);
  return Number.isSafeInteger(parsed) ? parsed : digits;
}

// Seconds between 0001-01-01 and 1970-01-01
const TICKS_EPOCH_OFFSET = 62135596800;

/**
 * The first 11 digits of a tick count are whole seconds since 0001-01-01
 */
export function ticksToIso(value: string): string | null {
  if (!/^\d{12,}$/.test(value)) return null;
  const seconds = Number(value.slice(0, 11)) - TICKS_EPOCH_OFFSET;
  return isoText(new Date(seconds * 1000));
}

type DateToken = "YYYY" | "MM" | "DD" | "HH" | "hh" | "mm" | "ss" | "A";

const TOKEN_PATTERNS: Record<DateToken, string> = {
  YYYY: "(\\d{4})",
  MM: "(\\d{1,2})",
  DD: "(\\d{1,2})",
  HH: "(\\d{1,2})",
  hh: "(\\d{1,2})",
  mm: "(\\d{2})",
  ss: "(\\d{2})",
  A: "(AM|PM)",
};

const DATE_TOKENS: readonly DateToken[] = ["YYYY", "MM", "DD", "HH", "hh", "mm", "ss", "A"];

function isDateToken(value: string): value is DateToken {
  return DATE_TOKENS.some((token) => token === value);
}

interface CompiledFormat {
  pattern: RegExp;
  tokens: DateToken[];
}

const compiledFormats = new Map<string, CompiledFormat>();

function compileFormat(format: string): CompiledFormat {
  const cached = compiledFormats.get(format);
  if (cached) return cached;

  const tokens: DateToken[] = [];
  let source = "";
  for (const part of format.split(/(YYYY|MM|DD|HH|hh|mm|ss|A)/)) {
    if (isDateToken(part)) {
      tokens.push(part);
      source += TOKEN_PATTERNS[part];
    } else {
      source += part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    }
  }
  const compiled = { pattern: new RegExp(`^${source}$`, "i"), tokens };
  compiledFormats.set(format, compiled);
  return compiled;
}

/**
 * Parse a wall-clock date against a format such as "YYYY-MM-DD hh:mm:ss A".
 * Returns null when the text does not match or names an impossible date.
 */
export function parseDate(value: string, format: string): string | null {
  const { pattern, tokens } = compileFormat(format);
  const match = pattern.exec(value.trim());
  if (!match) return null;

  const parts = { year: 0, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
  let meridiem: string | null = null;
  for (const [index, token] of tokens.entries()) {
    const text = match[index + 1] ?? "";
    const number = Number(text);
    if (token === "YYYY") parts.year = number;
    else if (token === "MM") parts.month = number;
    else if (token === "DD") parts.day = number;
    else if (token === "HH" || token === "hh") parts.hour = number;
    else if (token === "mm") parts.minute = number;
    else if (token === "ss") parts.second = number;
    else meridiem = text.toUpperCase();
  }

  if (tokens.includes("hh")) {
    if (parts.hour < 1 || parts.hour > 12) return null;
    parts.hour %= 12;
    if (meridiem === "PM") parts.hour += 12;
  }

  const date = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second),
  );
  if (
    date.getUTCFullYear() !== parts.year ||
    date.getUTCMonth() !== parts.month - 1 ||
    date.getUTCDate() !== parts.day ||
    date.getUTCHours() !== parts.hour ||
    date.getUTCMinutes() !== parts.minute ||
    date.getUTCSeconds() !== parts.second
  ) {
    return null;
  }
  return isoText(date);
}

function isoText(date: Date): string {
  return date.toISOString().slice(0, 19);
}
