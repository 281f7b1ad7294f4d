import { z } from 'zod';

/**
 * Zod schemas for the validation report written next to generated docs
 */

const TemplateValidationSchema = z.object({
  valid: z.boolean(),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  sectionsFound: z.array(z.string()),
});

export const ChecksSchema = z.object({
  hasOverview: z.boolean(),
  hasAuthentication: z.boolean(),
  hasEndpoints: z.boolean(),
  hasExamples: z.boolean(),
  hasErrorCodes: z.boolean(),
  hasHttpExample: z.boolean(),
  hasJsonExample: z.boolean(),
});

const GeneratedValidationSchema = z.object({
  validationPassed: z.boolean(),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  sectionsFound: z.array(z.string()),
  lineCount: z.number().int().nonnegative(),
  wordCount: z.number().int().nonnegative(),
  checks: ChecksSchema,
});

export const ValidationReportSchema = z.object({
  timestamp: z.string().datetime(),
  templateFile: z.string(),
  outputFile: z.string(),
  templateValidation: TemplateValidationSchema.optional(),
  result: GeneratedValidationSchema,
  summary: z.object({
    checksPassed: z.number().int().nonnegative(),
    checksTotal: z.number().int().positive(),
  }),
});

/**
 * Custom error for a report file that does not match the report schema
 */
export class ReportFormatError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'ReportFormatError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}
