import { readFile } from 'fs/promises';
import type {
  GeneratedDocumentChecks,
  GeneratedValidationResult,
  TemplateValidationResult,
  ValidationReport,
} from '../types.js';
import { ChecksSchema, ReportFormatError, ValidationReportSchema } from './schema.js';

/**
 * Number of boolean checks run against a generated document
 */
export const TOTAL_CHECKS = Object.keys(ChecksSchema.shape).length;

export interface BuildReportInput {
  templateFile: string;
  outputFile: string;
  result: GeneratedValidationResult;
  templateValidation?: TemplateValidationResult;
  timestamp?: Date;
}

/**
 * Assemble a validation report with its passed/total summary
 */
export function buildReport(input: BuildReportInput): ValidationReport {
  const report: ValidationReport = {
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    templateFile: input.templateFile,
    outputFile: input.outputFile,
    result: input.result,
    summary: {
      checksPassed: countPassedChecks(input.result.checks),
      checksTotal: TOTAL_CHECKS,
    },
  };

  if (input.templateValidation) {
    report.templateValidation = input.templateValidation;
  }

  return report;
}

export function countPassedChecks(checks: GeneratedDocumentChecks): number {
  return Object.values(checks).filter(Boolean).length;
}

export function serializeReport(report: ValidationReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Read a report back from disk and check its shape
 *
 * @throws ReportFormatError if the file is not valid JSON or does not match the report schema
 */
export async function readReport(reportPath: string): Promise<ValidationReport> {
  const raw = await readFile(reportPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ReportFormatError(
      `Failed to parse report ${reportPath}: ${error instanceof Error ? error.message : 'Unknown'}`
    );
  }

  const result = ValidationReportSchema.safeParse(parsed);
  if (!result.success) {
    throw new ReportFormatError(`Report ${reportPath} does not match the report format`, result.error);
  }

  return result.data;
}
