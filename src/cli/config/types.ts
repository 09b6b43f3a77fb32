/**
 * CLI configuration types
 */

/**
 * Options shared by every command
 */
export interface CommonCommandOptions {
  config?: string;
  rootTable?: string;
  linkMode?: string;
  typePolicy?: string;
  logLevel?: string;
}

export interface AnalyzeCommandOptions extends CommonCommandOptions {
  printSql?: boolean;
  report?: string;
  limit?: number;
}

export interface ConvertCommandOptions extends CommonCommandOptions {
  output: string;
  update?: boolean;
  skipExisting?: boolean;
  minimal?: boolean;
  sql?: string;
  manifest?: boolean;
}
