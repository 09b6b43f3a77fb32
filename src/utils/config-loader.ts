/**
 * Configuration loader
 * Precedence: CLI > config file > defaults. Everything is validated before use.
 */

import AjvModule from "ajv";
import type { ErrorObject } from "ajv";
import {
  DEFAULT_CONFIG,
  type RelationalizerConfig,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

const Ajv = AjvModule.default;

/** An option only the given effect takes */
function effectOption(effect: string, option: string, required: boolean) {
  return {
    if: { properties: { effect: { const: effect } } },
    then: required ? { required: [option] } : {},
    else: { not: { required: [option] } },
  };
}

const FIELD_RULE_SCHEMA = {
  type: "object",
  required: ["effect"],
  properties: {
    effect: { enum: ["drop", "pluck", "wrap", "first", "digits", "isoDate"] },
    property: { type: "string", minLength: 1 },
    omit: { type: "array", items: { type: "string", minLength: 1 } },
    format: { type: "string", pattern: "^(ticks|.*YYYY.*)$" },
  },
  additionalProperties: false,
  allOf: [
    effectOption("pluck", "property", true),
    effectOption("first", "omit", false),
    effectOption("isoDate", "format", true),
  ],
};

/**
 * JSON Schema for a partial configuration, as found in a file or on the command line
 */
export const CONFIG_SCHEMA = {
  type: "object",
  properties: {
    rootTableName: { type: "string", minLength: 1 },
    collapseThreshold: { type: "integer", minimum: 0 },
    delimiter: { type: "string" },
    columnSeparator: { type: "string", minLength: 1 },
    noiseKeys: { type: "array", items: { type: "string" } },
    fieldRules: { type: "object", additionalProperties: FIELD_RULE_SCHEMA },
    linkMode: { enum: ["embedded", "foreignKey"] },
    typePolicy: { enum: ["text", "auto"] },
    columnTypes: {
      type: "object",
      additionalProperties: { enum: ["INTEGER", "REAL", "TEXT"] },
    },
    castStrings: { type: "boolean" },
    minimal: {
      anyOf: [
        { type: "null" },
        {
          type: "object",
          properties: {
            columns: { type: "array", items: { type: "string" } },
            rootOnly: { type: "boolean" },
          },
          additionalProperties: false,
        },
      ],
    },
  },
  additionalProperties: false,
};

export type ConfigInput = Partial<Omit<RelationalizerConfig, "minimal">> & {
  minimal?: Partial<NonNullable<RelationalizerConfig["minimal"]>> | null;
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateInput = ajv.compile<ConfigInput>(CONFIG_SCHEMA);

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath || "/";
    return `${path} ${error.message ?? "is invalid"}`;
  });
}

function withoutUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

/**
 * Validate a partial configuration
 *
 * @param source - Where the configuration came from, for error messages
 * @throws ConfigError when the value does not match CONFIG_SCHEMA
 */
export function validateConfig(value: unknown, source: string): ConfigInput {
  if (validateInput(value)) {
    return value;
  }
  const problems = formatErrors(validateInput.errors);
  throw new ConfigError(`Invalid configuration in ${source}: ${problems.join("; ")}`, {
    source,
    problems,
  });
}

/**
 * Load configuration with precedence CLI > config file > defaults
 *
 * @param cliOptions - Values given on the command line; undefined entries are ignored
 * @param fileContent - Parsed configuration file, if any
 *
 * @example
 * const config = loadConfig({ linkMode: "foreignKey" }, { linkMode: "embedded", collapseThreshold: 5 });
 * // Returns: config with linkMode "foreignKey" and collapseThreshold 5
 */
export function loadConfig(
  cliOptions: Record<string, unknown> = {},
  fileContent?: unknown,
  fileName = "config file",
): RelationalizerConfig {
  const fromFile = fileContent === undefined ? {} : validateConfig(fileContent, fileName);
  const fromCli = validateConfig(withoutUndefined(cliOptions), "command line options");

  const merged = { ...DEFAULT_CONFIG, ...fromFile, ...fromCli };
  const minimalInput = fromCli.minimal === undefined ? fromFile.minimal : fromCli.minimal;

  const config: RelationalizerConfig = {
    ...merged,
    minimal: minimalInput
      ? {
          columns: minimalInput.columns ?? [],
          rootOnly: minimalInput.rootOnly ?? false,
        }
      : null,
  };

  if (config.delimiter === config.columnSeparator && config.delimiter !== "") {
    logger.warn("Delimiter equals the column separator", { value: config.delimiter });
  }

  logger.debug("Configuration loaded", {
    rootTableName: config.rootTableName,
    linkMode: config.linkMode,
    typePolicy: config.typePolicy,
    minimal: config.minimal !== null,
  });

  return config;
}
