import { parseArgs } from 'util';
import type { ConfigFile } from '../config.js';
import { isLogLevel } from '../logger.js';
import type { PipelineMode } from '../pipeline.js';
import type { LogLevel, MetadataPlacement } from '../types.js';

export const USAGE = `Usage: api-docs [mode] [options]

Modes (default: generate, validate and write the report):
  --generate               Validate the template and generate the document, no report
  --validate               Validate the template only
  --validate-output        Validate an existing generated document and write the report
  --health                 Check that template and output paths exist

Options:
  --template <path>        Template file (default: docs/templates/api-docs-template.md)
  --output <path>          Generated document (default: docs/api/endpoints.md)
  --report <path>          Validation report (default: docs/api/validation-report.json)
  --template-dir <dir>     Template directory (default: docs/templates)
  --output-dir <dir>       Output directory (default: docs/api)
  --placement <where>      Metadata placement: after-title | append (default: append)
  --doc-version <version>  Version stamped into the document (default: 1.0.0)
  --no-metadata            Write the template without generation metadata
  --min-code-examples <n>  Warn below this many example blocks (default: 5)
  --config <path>          YAML config file (default: api-docs.config.yaml if present)
  --log-level <level>      error | warn | info | debug (default: info)
  -h, --help               Show this message`;

export interface CliArgs {
  mode: PipelineMode;
  help: boolean;
  configPath?: string;
  overrides: ConfigFile;
}

/**
 * Custom error for unusable command-line arguments
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const MODE_FLAGS = ['generate', 'validate', 'validate-output', 'health'] as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        generate: { type: 'boolean' },
        validate: { type: 'boolean' },
        'validate-output': { type: 'boolean' },
        health: { type: 'boolean' },
        template: { type: 'string' },
        output: { type: 'string' },
        report: { type: 'string' },
        'template-dir': { type: 'string' },
        'output-dir': { type: 'string' },
        placement: { type: 'string' },
        'doc-version': { type: 'string' },
        'no-metadata': { type: 'boolean' },
        'min-code-examples': { type: 'string' },
        config: { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : 'Invalid arguments');
  }
}

/**
 * Parse command-line arguments into a mode and config overrides
 *
 * @throws CliUsageError on unknown flags, conflicting modes or bad values
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values = readFlags(argv);

  const modes: PipelineMode[] = MODE_FLAGS.filter((flag) => values[flag] === true);
  if (modes.length > 1) {
    throw new CliUsageError(`Choose one mode, got: ${modes.map((m) => `--${m}`).join(', ')}`);
  }

  const overrides: ConfigFile = {
    templatePath: values.template,
    outputPath: values.output,
    reportPath: values.report,
    templateDir: values['template-dir'],
    outputDir: values['output-dir'],
    docVersion: values['doc-version'],
    metadataPlacement: parsePlacement(values.placement),
    minCodeExamples: parseCount(values['min-code-examples']),
    logLevel: parseLogLevel(values['log-level']),
  };

  if (values['no-metadata']) {
    overrides.includeMetadata = false;
  }

  return {
    mode: modes[0] ?? 'full',
    help: values.help === true,
    configPath: values.config,
    overrides,
  };
}

function parsePlacement(value: string | undefined): MetadataPlacement | undefined {
  if (value === undefined) return undefined;
  if (value === 'after-title' || value === 'append') return value;
  throw new CliUsageError(`Invalid --placement: ${value} (expected after-title or append)`);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (isLogLevel(value)) return value;
  throw new CliUsageError(`Invalid --log-level: ${value} (expected error, warn, info or debug)`);
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new CliUsageError(`Invalid --min-code-examples: ${value} (expected a non-negative integer)`);
  }
  return count;
}
