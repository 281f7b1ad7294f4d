/**
 * Template System - template loading, validation, generation, reporting and health checks
 */

export {
  REQUIRED_SECTIONS,
  DEFAULT_MIN_CODE_EXAMPLES,
  validateTemplate,
  hasSectionHeading,
  type RequiredSection,
  type TemplateValidatorOptions,
} from './validator.js';

export { TemplateLoader } from './loader.js';

export {
  DocumentGenerator,
  DEFAULT_DOC_VERSION,
  injectMetadata,
  inspectGeneratedContent,
  type GeneratorOptions,
} from './generator.js';

export {
  TOTAL_CHECKS,
  buildReport,
  countPassedChecks,
  readReport,
  serializeReport,
  type BuildReportInput,
} from './report.js';

export { ValidationReportSchema, ReportFormatError } from './schema.js';

export { checkHealth, type HealthCheckPaths } from './health.js';

export {
  TemplateNotFoundError,
  TemplateReadError,
  ValidationFailedError,
  WriteError,
  ReportWriteError,
} from './errors.js';
