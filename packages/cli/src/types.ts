/**
 * Type definitions for CLI
 */

/**
 * Retarget configuration file (retarget.json)
 */
export type RetargetConfig = {
  readonly $schema?: string;
  readonly targets?: readonly string[];
  readonly outputDirectory?: string;
  readonly indent?: number;
  readonly entryClassName?: string;
  readonly header?: boolean;
  readonly strict?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  targets?: string[];
  out?: string;
  indent?: number;
  entryClassName?: string;
  noHeader?: boolean;
  strict?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing retarget.json, or the working directory */
  readonly projectRoot: string;
  readonly targets: readonly string[];
  readonly outputDirectory: string;
  readonly indent: number;
  readonly entryClassName: string | undefined;
  readonly header: boolean;
  readonly strict: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

export type ParsedArgs = {
  readonly command: string;
  /** Positional arguments after the command */
  readonly files: readonly string[];
  readonly options: CliOptions;
  /** Usage problems found while parsing */
  readonly errors: readonly string[];
};
