import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { DocsConfig, Logger } from './types.js';
import { fileExists } from './templates/files.js';
import { DEFAULT_MIN_CODE_EXAMPLES } from './templates/validator.js';
import { DEFAULT_DOC_VERSION } from './templates/generator.js';

export const CONFIG_FILENAME = 'api-docs.config.yaml';
export const TEMPLATE_FILENAME = 'api-docs-template.md';
export const OUTPUT_FILENAME = 'endpoints.md';
export const REPORT_FILENAME = 'validation-report.json';

export const DEFAULT_TEMPLATE_DIR = 'docs/templates';
export const DEFAULT_OUTPUT_DIR = 'docs/api';

/**
 * Zod schema for the optional YAML config file
 */
export const ConfigFileSchema = z
  .object({
    templateDir: z.string().min(1),
    outputDir: z.string().min(1),
    templatePath: z.string().min(1),
    outputPath: z.string().min(1),
    reportPath: z.string().min(1),
    metadataPlacement: z.enum(['after-title', 'append']),
    docVersion: z.string().min(1),
    includeMetadata: z.boolean(),
    minCodeExamples: z.number().int().nonnegative(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Custom error for unusable configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}

export interface LoadConfigOptions {
  /** Directory relative paths are resolved against */
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Values that win over the config file, typically from CLI flags */
  overrides?: ConfigFile;
  logger?: Logger;
}

/**
 * Build the effective configuration
 *
 * Precedence, lowest first: defaults, config file, overrides. File paths left
 * unspecified are derived from the template and output directories, and every
 * path is resolved against `cwd`.
 *
 * @throws ConfigError if the config file is missing, unparsable or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DocsConfig> {
  const cwd = options.cwd ?? process.cwd();
  const fromFile = await readConfigFile(cwd, options.configPath, options.logger);
  const overrides = options.overrides ?? {};
  const pick = <K extends keyof ConfigFile>(key: K): ConfigFile[K] => overrides[key] ?? fromFile[key];

  const templateDir = pick('templateDir') ?? DEFAULT_TEMPLATE_DIR;
  const outputDir = pick('outputDir') ?? DEFAULT_OUTPUT_DIR;

  return {
    templateDir: resolve(cwd, templateDir),
    outputDir: resolve(cwd, outputDir),
    templatePath: resolve(cwd, pick('templatePath') ?? join(templateDir, TEMPLATE_FILENAME)),
    outputPath: resolve(cwd, pick('outputPath') ?? join(outputDir, OUTPUT_FILENAME)),
    reportPath: resolve(cwd, pick('reportPath') ?? join(outputDir, REPORT_FILENAME)),
    metadataPlacement: pick('metadataPlacement') ?? 'append',
    docVersion: pick('docVersion') ?? DEFAULT_DOC_VERSION,
    includeMetadata: pick('includeMetadata') ?? true,
    minCodeExamples: pick('minCodeExamples') ?? DEFAULT_MIN_CODE_EXAMPLES,
    logLevel: pick('logLevel') ?? 'info',
  };
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError if the YAML is malformed or fails the schema
 */
export function parseConfig(yamlContent: string, source = CONFIG_FILENAME): ConfigFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config ${source}: ${error instanceof Error ? error.message : 'Unknown'}`
    );
  }

  // An empty file or one holding only comments parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config ${source}`, result.error);
  }

  return result.data;
}

async function readConfigFile(
  cwd: string,
  configPath: string | undefined,
  logger?: Logger
): Promise<ConfigFile> {
  const path = resolve(cwd, configPath ?? CONFIG_FILENAME);

  if (!(await fileExists(path))) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read config ${path}: ${error instanceof Error ? error.message : 'Unknown'}`
    );
  }

  logger?.debug(`Loaded config from ${path}`);
  return parseConfig(content, path);
}
