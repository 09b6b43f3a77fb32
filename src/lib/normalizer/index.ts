/**
 * Normalizer module - rewrites raw documents into a canonical, hashable shape
 */

import type {
  DocumentFailure,
  JsonObject,
  JsonValue,
  NormalizedDocument,
  RawDocument,
} from "../../types/data-model.js";
import { DEFAULT_CONFIG } from "../../types/config.js";
import { contentHash } from "../../utils/content-hash.js";
import { RelationalizerError, toRelationalizerError } from "../../utils/errors.js";
import { generatedIdKey, naturalIdKeys } from "../../utils/key-patterns.js";
import { logger } from "../../utils/logger.js";
import { applyRule, compileRules, resolveRule, type RuleTable } from "./field-rules.js";
import { isJsonObject, isScalar, toJsonObject } from "./json-tree.js";
import type { NormalizedEntry, NormalizerOptions, NormalizerResult } from "./types.js";

export * from "./types.js";
export * from "./json-tree.js";
export * from "./field-rules.js";

/** Key used when non-object list members are wrapped into rows */
export const VALUE_KEY = "Value";

export const LIST_SEGMENT = "[]";

const DEFAULT_OPTIONS: NormalizerOptions = {
  rootTableName: DEFAULT_CONFIG.rootTableName,
  collapseThreshold: DEFAULT_CONFIG.collapseThreshold,
  delimiter: DEFAULT_CONFIG.delimiter,
  noiseKeys: DEFAULT_CONFIG.noiseKeys,
  fieldRules: DEFAULT_CONFIG.fieldRules,
};

interface NormalizeContext {
  options: NormalizerOptions;
  rules: RuleTable;
}

/**
 * Key holding the identity of a row object, or null when it has none yet
 *
 * @param row - Row object (document root or list member)
 * @param owner - List key the row belongs to, null for the root
 */
export function identityKeyOf(row: JsonObject, owner: string | null, rootTableName: string): string | null {
  const candidates = [generatedIdKey(owner ?? rootTableName), ...naturalIdKeys(owner)];
  for (const key of candidates) {
    const value = row[key];
    if (value !== undefined && value !== null && isScalar(value)) {
      return key;
    }
  }
  return null;
}

/**
 * Normalize a single document body
 *
 * @throws MalformedDocumentError when the body is not a JSON object tree
 */
export function normalizeDocument(
  body: unknown,
  options: Partial<NormalizerOptions> = {},
): NormalizedDocument {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const ctx: NormalizeContext = {
    options: opts,
    rules: compileRules(opts.fieldRules, opts.noiseKeys),
  };

  const tree = toJsonObject(body);
  return normalizeObject(tree, ["$"], null, true, ctx);
}

function normalizeObject(
  source: JsonObject,
  path: string[],
  owner: string | null,
  isRow: boolean,
  ctx: NormalizeContext,
): JsonObject {
  const result: JsonObject = {};

  for (const [key, original] of Object.entries(source)) {
    const childPath = [...path, key];
    const rule = resolveRule(ctx.rules, key, childPath.join("."));

    if (rule && rule.effect === "drop") {
      continue;
    }

    const value =
      rule
        ? applyRule(rule, original, ctx.options.delimiter)
        : original;
    result[key] = normalizeValue(value, childPath, key, ctx);
  }

  if (!isRow) {
    return result;
  }

  if (identityKeyOf(result, owner, ctx.options.rootTableName) === null) {
    const idKey = generatedIdKey(owner ?? ctx.options.rootTableName);
    delete result[idKey];
    result[idKey] = contentHash(result);
  }

  return result;
}

function normalizeValue(
  value: JsonValue,
  path: string[],
  key: string,
  ctx: NormalizeContext,
): JsonValue {
  if (Array.isArray(value)) {
    return normalizeList(value, path, key, ctx);
  }
  if (isJsonObject(value)) {
    return normalizeObject(value, path, key, false, ctx);
  }
  return value;
}

function normalizeList(
  items: JsonValue[],
  path: string[],
  key: string,
  ctx: NormalizeContext,
): JsonValue {
  const { collapseThreshold, delimiter } = ctx.options;

  if (
    items.length > 0 &&
    items.length <= collapseThreshold &&
    items.every(isScalar)
  ) {
    return items.map((item) => (item === null ? "" : String(item))).join(delimiter);
  }

  const elementPath = [...path, LIST_SEGMENT];
  return items.map((item) => {
    const row: JsonObject = isJsonObject(item) ? item : { [VALUE_KEY]: item };
    return normalizeObject(row, elementPath, key, true, ctx);
  });
}

/**
 * Normalize an array of raw documents, skipping malformed ones
 */
export function normalizeDocuments(
  documents: RawDocument[],
  options: Partial<NormalizerOptions> = {},
): NormalizerResult {
  logger.info("Normalizing documents", { count: documents.length });

  const normalizer = new Normalizer(options);
  const normalized: NormalizedEntry[] = [];

  for (const raw of documents) {
    const entry = normalizer.normalizeOne(raw);
    if (entry) {
      normalized.push(entry);
    }
  }

  logger.info("Normalization complete", {
    documentsNormalized: normalized.length,
    documentsSkipped: normalizer.getFailures().length,
  });

  return {
    documents: normalized,
    failures: normalizer.getFailures(),
  };
}

/**
 * Main normalizer class
 */
export class Normalizer {
  private options: NormalizerOptions;
  private failures: DocumentFailure[] = [];

  constructor(options: Partial<NormalizerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Normalize one raw document, recording a failure instead of throwing
   */
  normalizeOne(raw: RawDocument): NormalizedEntry | null {
    try {
      return { raw, document: normalizeDocument(raw.body, this.options) };
    } catch (error) {
      const failure = toRelationalizerError(error);
      if (!(error instanceof RelationalizerError)) {
        logger.error("Unexpected normalization error", { documentId: raw.id, error: failure.message });
      }
      this.failures.push({
        documentId: raw.id,
        code: failure.code,
        message: failure.message,
        details: failure.details,
      });
      logger.warn("Skipping malformed document", { documentId: raw.id, reason: failure.message });
      return null;
    }
  }

  /**
   * Normalize an async stream of documents
   */
  async *normalizeStream(
    documents: AsyncIterable<RawDocument> | Iterable<RawDocument>,
  ): AsyncIterableIterator<NormalizedEntry> {
    for await (const raw of documents) {
      const entry = this.normalizeOne(raw);
      if (entry) {
        yield entry;
      }
    }
  }

  /**
   * Failures collected so far
   */
  getFailures(): DocumentFailure[] {
    return [...this.failures];
  }
}
