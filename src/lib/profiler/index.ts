/**
 * Profiler module - replaces every leaf of a normalized document with a type observation
 */

import type {
  JsonValue,
  NormalizedDocument,
  ProfileNode,
  TypeProfile,
} from "../../types/data-model.js";
import {
  emptyProfile,
  findShapeConflicts,
  mergeProfiles,
} from "../merger/index.js";
import { isJsonObject } from "../normalizer/json-tree.js";
import { logger } from "../../utils/logger.js";
import { classifyValue } from "./classify.js";
import type { ProfilerOptions, ProfilerResult } from "./types.js";

export * from "./types.js";
export * from "./classify.js";

const DEFAULT_OPTIONS: ProfilerOptions = {
  castStrings: false,
};

/**
 * Profile one value. Lists are profiled as repeated instances of one schema.
 */
export function profileValue(
  value: JsonValue,
  options: Partial<ProfilerOptions> = {},
): ProfileNode {
  const castStrings = options.castStrings ?? DEFAULT_OPTIONS.castStrings;
  const node = emptyProfile();

  if (Array.isArray(value)) {
    node.listCount = 1;
    node.emptyListCount = value.length === 0 ? 1 : 0;
    for (const item of value) {
      const itemProfile = profileValue(item, options);
      node.element = node.element ? mergeProfiles(node.element, itemProfile) : itemProfile;
    }
    return node;
  }

  if (isJsonObject(value)) {
    node.objectCount = 1;
    for (const key of Object.keys(value).sort()) {
      const child = value[key];
      if (child !== undefined) {
        node.fields[key] = profileValue(child, options);
      }
    }
    return node;
  }

  node.types[classifyValue(value, castStrings)] = 1;
  return node;
}

/**
 * Profile a normalized document
 */
export function profileDocument(
  doc: NormalizedDocument,
  options: Partial<ProfilerOptions> = {},
): TypeProfile {
  return profileValue(doc, options);
}

function countPaths(node: ProfileNode): { fields: number; lists: number } {
  let fields = 0;
  let lists = node.listCount > 0 ? 1 : 0;
  for (const child of Object.values(node.fields)) {
    const counted = countPaths(child);
    fields += 1 + counted.fields;
    lists += counted.lists;
  }
  if (node.element) {
    const counted = countPaths(node.element);
    fields += counted.fields;
    lists += counted.lists;
  }
  return { fields, lists };
}

/**
 * Main profiler class - accumulates an aggregate schema one document at a time
 */
export class Profiler {
  private options: ProfilerOptions;
  private aggregate: ProfileNode = emptyProfile();
  private documentCount = 0;

  constructor(options: Partial<ProfilerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Observe a single document
   */
  observe(doc: NormalizedDocument): void {
    this.aggregate = mergeProfiles(this.aggregate, profileDocument(doc, this.options));
    this.documentCount++;
  }

  /**
   * Profile a stream of documents
   */
  async profileStream(
    documents: AsyncIterable<NormalizedDocument> | Iterable<NormalizedDocument>,
  ): Promise<ProfilerResult> {
    logger.info("Starting profile stream", { castStrings: this.options.castStrings });

    for await (const doc of documents) {
      this.observe(doc);
    }

    return this.getProfileResult();
  }

  profile(documents: NormalizedDocument[]): ProfilerResult {
    for (const doc of documents) {
      this.observe(doc);
    }
    return this.getProfileResult();
  }

  /**
   * Get the aggregate schema observed so far
   */
  getProfileResult(): ProfilerResult {
    const conflicts = findShapeConflicts(this.aggregate);
    const paths = countPaths(this.aggregate);

    const metadata = {
      documentsAnalyzed: this.documentCount,
      fieldPathsFound: paths.fields,
      listPathsFound: paths.lists,
      shapeConflicts: conflicts.length,
    };

    logger.info("Profiling complete", metadata);
    for (const conflict of conflicts) {
      logger.warn("Shape conflict", conflict);
    }

    return { schema: this.aggregate, conflicts, metadata };
  }
}
