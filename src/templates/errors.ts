import type { TemplateValidationResult } from '../types.js';

/**
 * Custom error for a template (or generated document) path that does not exist
 */
export class TemplateNotFoundError extends Error {
  public readonly path: string;

  constructor(path: string, label = 'Template file') {
    super(`${label} not found: ${path}`);
    this.name = 'TemplateNotFoundError';
    this.path = path;
  }
}

/**
 * Custom error for any other failure reading a document from disk
 */
export class TemplateReadError extends Error {
  public readonly path: string;
  public override readonly cause?: unknown;

  constructor(path: string, cause?: unknown) {
    super(`Error reading ${path}: ${describeCause(cause)}`);
    this.name = 'TemplateReadError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Raised when a template is missing required sections
 */
export class ValidationFailedError extends Error {
  public readonly validation: TemplateValidationResult;

  constructor(validation: TemplateValidationResult) {
    super('Template validation failed');
    this.name = 'ValidationFailedError';
    this.validation = validation;
  }
}

export class WriteError extends Error {
  public readonly path: string;
  public override readonly cause?: unknown;

  constructor(path: string, cause?: unknown) {
    super(`Error writing ${path}: ${describeCause(cause)}`);
    this.name = 'WriteError';
    this.path = path;
    this.cause = cause;
  }
}

export class ReportWriteError extends Error {
  public readonly path: string;
  public override readonly cause?: unknown;

  constructor(path: string, cause?: unknown) {
    super(`Error writing validation report ${path}: ${describeCause(cause)}`);
    this.name = 'ReportWriteError';
    this.path = path;
    this.cause = cause;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : 'Unknown';
}
