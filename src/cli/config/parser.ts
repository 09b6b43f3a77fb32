/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse configuration file (JSON or YAML). The content is validated by the config loader.
 */
export function parseConfigFile(filePath: string): unknown {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  try {
    const parsed: unknown = isYaml ? parseYaml(content) : JSON.parse(content);
    logger.debug("Configuration file parsed", { filePath });
    return parsed ?? {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
}
