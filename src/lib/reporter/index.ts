/**
 * Reporter module - schema reports and run manifests
 */

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { RelationalizerConfig } from "../../types/config.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { DiscoveryResult } from "../pipeline/types.js";
import type { RunManifest, RunPhase, SchemaReport } from "./types.js";

export type {
  ArtifactRecord,
  ColumnReport,
  RunManifest,
  RunPhase,
  SchemaReport,
  TableReport,
} from "./types.js";

export const TOOL_NAME = "relationalizer";
export const TOOL_VERSION = "0.1.0";

/**
 * Describe a discovery run: tables, shape conflicts and skipped documents
 */
export function buildSchemaReport(discovery: DiscoveryResult): SchemaReport {
  return {
    generatedAt: new Date().toISOString(),
    documentsAnalyzed: discovery.metadata.documentsAnalyzed,
    rootTable: discovery.graph.rootTable,
    linkMode: discovery.graph.linkMode,
    tables: discovery.graph.tables.map((table) => ({
      name: table.name,
      paths: table.paths,
      parents: table.parents,
      depth: table.depth,
      primaryKey: table.primaryKey,
      alwaysPresent: table.alwaysPresent,
      columns: table.columns.map((column) => ({
        name: column.name,
        path: column.path.join("."),
        sqlType: column.sqlType,
        nullable: column.nullable,
        primaryKey: column.isPrimaryKey,
        kind: column.kind,
        ...(column.references ? { references: column.references } : {}),
      })),
    })),
    conflicts: discovery.conflicts,
    failures: discovery.failures,
  };
}

/**
 * Write a JSON artifact, creating its directory
 *
 * @throws FileIOError when the file cannot be written
 */
export async function writeJsonArtifact(filePath: string, data: unknown): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to write ${filePath}`, { filePath }, { cause: error });
  }
}

/**
 * RunReporter generates run manifests with artifact hashes for auditability
 */
export class RunReporter {
  private _manifest: RunManifest;

  constructor(phase: RunPhase, config: RelationalizerConfig, sources: string[]) {
    this._manifest = {
      version: "1.0.0",
      tool: {
        name: TOOL_NAME,
        version: TOOL_VERSION,
      },
      run: {
        id: crypto.randomBytes(8).toString("hex"),
        timestamp: new Date().toISOString(),
        phase,
      },
      config: {
        rootTableName: config.rootTableName,
        linkMode: config.linkMode,
        typePolicy: config.typePolicy,
        collapseThreshold: config.collapseThreshold,
        minimal: config.minimal,
      },
      sources,
      artifacts: {},
      summary: {},
    };
  }

  /**
   * Calculate SHA-256 hash of a file
   */
  async calculateFileHash(filePath: string): Promise<string> {
    const fileBuffer = await fs.readFile(filePath);
    return crypto.createHash("sha256").update(fileBuffer).digest("hex");
  }

  /**
   * Record a produced file under a name, with its hash and size
   */
  async addArtifact(name: string, filePath: string): Promise<void> {
    const [hash, stats] = await Promise.all([
      this.calculateFileHash(filePath),
      fs.stat(filePath),
    ]);
    this._manifest.artifacts[name] = { path: filePath, hash, size: stats.size };
    logger.debug("Artifact recorded", { name, path: filePath, hash });
  }

  setSummary(summary: Record<string, unknown>): void {
    this._manifest.summary = { ...summary };
  }

  /**
   * Get a deep copy of the current manifest
   */
  getManifest(): RunManifest {
    return structuredClone(this._manifest);
  }

  /**
   * Save manifest to a JSON file beside the given output
   *
   * @returns Path of the manifest
   */
  async save(outputPath: string): Promise<string> {
    const manifestPath = `${outputPath}.manifest.json`;
    await writeJsonArtifact(manifestPath, this._manifest);
    logger.info("Run manifest saved", { path: manifestPath });
    return manifestPath;
  }
}
