/**
 * Document sources for the pipeline
 */

import type { RawDocument } from "../../types/data-model.js";
import type { RawReadOptions } from "../store/types.js";
import type { DocumentSource } from "./types.js";

/**
 * Source over documents already in memory, honoring the same read options as the raw store
 */
export function fromDocuments(documents: RawDocument[], name = "memory"): DocumentSource {
  return {
    name,
    *documents(options: RawReadOptions = {}): Generator<RawDocument> {
      let yielded = 0;
      for (const doc of documents) {
        if (options.limit !== undefined && yielded >= options.limit) return;
        if (options.since && doc.lastUpdated <= options.since) continue;
        yielded++;
        yield doc;
      }
    },
  };
}
