/**
 * Shared documents and graph builders for tests
 */

import type { JsonObject, RawDocument, TableGraph } from '../../src/types/data-model.js';
import type { SplitterOptions } from '../../src/lib/splitter/types.js';
import { normalizeDocument } from '../../src/lib/normalizer/index.js';
import { Profiler } from '../../src/lib/profiler/index.js';
import { splitSchema } from '../../src/lib/splitter/index.js';

export const LISTING_A: JsonObject = { Id: 'A', Phones: [{ PhoneNumber: '555', PhonesGeneratedId: null }] };
export const LISTING_B: JsonObject = { Id: 'B', Phones: [] };

export const RAW_LISTINGS: RawDocument[] = [
  { id: '1', body: JSON.stringify(LISTING_A), lastUpdated: '2024-01-01' },
  { id: '2', body: JSON.stringify(LISTING_B), lastUpdated: '2024-01-02' },
];

export const LISTINGS_DDL = [
  'CREATE TABLE IF NOT EXISTS "Phones" ("PhoneNumber" TEXT, "PhonesGeneratedId" INTEGER PRIMARY KEY);',
  'CREATE TABLE IF NOT EXISTS "Listings" ("Id" TEXT PRIMARY KEY NOT NULL, "Phones" TEXT NOT NULL);',
];

/**
 * Normalize, profile and split documents the way discovery does
 */
export function graphFor(
  docs: JsonObject[],
  options: Partial<SplitterOptions> = {},
  rootName = 'Listings',
): TableGraph {
  const normalized = docs.map((doc) => normalizeDocument(doc, { rootTableName: rootName }));
  const { schema } = new Profiler().profile(normalized);
  return splitSchema(schema, rootName, options);
}
