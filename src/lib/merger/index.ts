/**
 * Schema merger - folds type profiles into one aggregate schema tree.
 * mergeProfiles is pure, commutative and associative: counts are summed and
 * field keys come out sorted, so merge order never changes the result.
 */

import {
  TYPE_TAGS,
  type AggregateSchema,
  type ProfileNode,
  type ShapeConflict,
  type TypeCounts,
} from "../../types/data-model.js";

export function emptyProfile(): ProfileNode {
  return {
    types: {},
    objectCount: 0,
    listCount: 0,
    emptyListCount: 0,
    fields: {},
    element: null,
  };
}

export function mergeTypeCounts(a: TypeCounts, b: TypeCounts): TypeCounts {
  const merged: TypeCounts = {};
  for (const tag of TYPE_TAGS) {
    const count = (a[tag] ?? 0) + (b[tag] ?? 0);
    if (count > 0) {
      merged[tag] = count;
    }
  }
  return merged;
}

/**
 * Merge two profiles observed at the same tree position
 */
export function mergeProfiles(a: ProfileNode, b: ProfileNode): ProfileNode {
  const fields: Record<string, ProfileNode> = {};
  const keys = new Set([...Object.keys(a.fields), ...Object.keys(b.fields)]);

  for (const key of [...keys].sort()) {
    const left = a.fields[key];
    const right = b.fields[key];
    // Absent on one side: carried through, absence is never counted
    const carried = left ?? right;
    if (left && right) {
      fields[key] = mergeProfiles(left, right);
    } else if (carried) {
      fields[key] = carried;
    }
  }

  let element: ProfileNode | null;
  if (a.element && b.element) {
    element = mergeProfiles(a.element, b.element);
  } else {
    element = a.element ?? b.element;
  }

  return {
    types: mergeTypeCounts(a.types, b.types),
    objectCount: a.objectCount + b.objectCount,
    listCount: a.listCount + b.listCount,
    emptyListCount: a.emptyListCount + b.emptyListCount,
    fields,
    element,
  };
}

/**
 * Reduce a corpus of per-document profiles into one aggregate.
 * An empty corpus yields the empty aggregate.
 */
export function aggregateProfiles(profiles: Iterable<ProfileNode>): AggregateSchema {
  let aggregate = emptyProfile();
  for (const profile of profiles) {
    aggregate = mergeProfiles(aggregate, profile);
  }
  return aggregate;
}

export function sumCounts(types: TypeCounts): number {
  let total = 0;
  for (const tag of TYPE_TAGS) {
    total += types[tag] ?? 0;
  }
  return total;
}

/**
 * Number of observations at a node, whatever their shape
 */
export function presenceOf(node: ProfileNode): number {
  return sumCounts(node.types) + node.objectCount + node.listCount;
}

/**
 * Observations that were not null
 */
export function nonNullPresenceOf(node: ProfileNode): number {
  return presenceOf(node) - (node.types.null ?? 0);
}

/**
 * Non-null leaf observations
 */
export function scalarCountOf(node: ProfileNode): number {
  return sumCounts(node.types) - (node.types.null ?? 0);
}

/**
 * A node is in conflict when more than one of scalar, object and list was observed
 */
export function isShapeConflict(node: ProfileNode): boolean {
  const shapes = [scalarCountOf(node), node.objectCount, node.listCount].filter(
    (count) => count > 0,
  );
  return shapes.length > 1;
}

/**
 * Every path observed with incompatible shapes, depth first in key order
 */
export function findShapeConflicts(schema: AggregateSchema, path = "$"): ShapeConflict[] {
  const conflicts: ShapeConflict[] = [];

  if (isShapeConflict(schema)) {
    conflicts.push({
      path,
      scalarCount: scalarCountOf(schema),
      objectCount: schema.objectCount,
      listCount: schema.listCount,
      types: schema.types,
    });
  }

  for (const [key, child] of Object.entries(schema.fields)) {
    conflicts.push(...findShapeConflicts(child, `${path}.${key}`));
  }
  if (schema.element) {
    conflicts.push(...findShapeConflicts(schema.element, `${path}.[]`));
  }

  return conflicts;
}
