/**
 * Core types for the API docs generator
 */

// ============================================================================
// Validation Types
// ============================================================================

/**
 * Outcome of validating a template before generation.
 * `valid` is true iff no required section is missing.
 */
export interface TemplateValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  sectionsFound: string[];
}

export interface GeneratedDocumentChecks {
  hasOverview: boolean;
  hasAuthentication: boolean;
  hasEndpoints: boolean;
  hasExamples: boolean;
  hasErrorCodes: boolean;
  hasHttpExample: boolean;
  hasJsonExample: boolean;
}

/**
 * Outcome of re-reading a written document.
 * `validationPassed` is true iff every check holds and `errors` is empty.
 */
export interface GeneratedValidationResult {
  validationPassed: boolean;
  errors: string[];
  warnings: string[];
  sectionsFound: string[];
  lineCount: number;
  wordCount: number;
  checks: GeneratedDocumentChecks;
}

// ============================================================================
// Generation Types
// ============================================================================

export type MetadataPlacement = 'after-title' | 'append';

export interface GenerationMetadata {
  generatedAt: Date;
  version?: string;
}

export interface GenerationResult {
  success: boolean;
  message: string;
  outputFile: string;
  error?: Error;
}

// ============================================================================
// Report Types
// ============================================================================

export interface ReportSummary {
  checksPassed: number;
  checksTotal: number;
}

export interface ValidationReport {
  timestamp: string;
  templateFile: string;
  outputFile: string;
  templateValidation?: TemplateValidationResult;
  result: GeneratedValidationResult;
  summary: ReportSummary;
}

// ============================================================================
// Health Types
// ============================================================================

export interface HealthStatus {
  healthy: boolean;
  issues: string[];
  templateExists: boolean;
  templateDirExists: boolean;
  outputDirExists: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface DocsConfig {
  templateDir: string;
  outputDir: string;
  templatePath: string;
  outputPath: string;
  reportPath: string;
  metadataPlacement: MetadataPlacement;
  docVersion: string;
  includeMetadata: boolean;
  minCodeExamples: number;
  logLevel: LogLevel;
}

// ============================================================================
// Logger Interface
// ============================================================================

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}
