/**
 * API Docs Generator
 *
 * Validates Markdown API documentation templates, stamps them with generation
 * metadata and writes a JSON validation report
 */

export { DocsPipeline } from './pipeline.js';
export type {
  PipelineMode,
  PipelineStage,
  PipelineEvents,
  PipelineOptions,
  PipelineOutcome,
  PipelinePayload,
  ProgressEvent,
  RunSummary,
} from './pipeline.js';

export {
  loadConfig,
  parseConfig,
  ConfigError,
  ConfigFileSchema,
  CONFIG_FILENAME,
  type ConfigFile,
  type LoadConfigOptions,
} from './config.js';

export { createConsoleLogger } from './logger.js';

export { runCli, type CliIO } from './cli/run.js';
export { parseCliArgs, CliUsageError, type CliArgs } from './cli/args.js';

export type {
  DocsConfig,
  GeneratedDocumentChecks,
  GeneratedValidationResult,
  GenerationMetadata,
  GenerationResult,
  HealthStatus,
  LogLevel,
  Logger,
  MetadataPlacement,
  ReportSummary,
  TemplateValidationResult,
  ValidationReport,
} from './types.js';

// Export template system
export * from './templates/index.js';
