import type { TemplateValidationResult } from '../types.js';

/**
 * Sections every API documentation template must carry as `## <Section>`,
 * in the order they are checked.
 */
export const REQUIRED_SECTIONS = [
  'Overview',
  'Authentication',
  'Endpoints',
  'Request/Response Examples',
  'Error Codes',
] as const;

export type RequiredSection = (typeof REQUIRED_SECTIONS)[number];

export const DEFAULT_MIN_CODE_EXAMPLES = 5;

export interface TemplateValidatorOptions {
  /** Fewer fenced http/json/bash/python blocks than this raises a warning */
  minCodeExamples?: number;
}

const HTTP_BLOCK = /```http\n([\s\S]*?)\n```/g;
const JSON_BLOCK = /```json\n([\s\S]*?)\n```/g;
const CODE_BLOCK = /```(?:http|json|bash|python)\n([\s\S]*?)\n```/g;
const TABLE_ROW = /\|.*\|.*\|/;

/**
 * Validate raw template Markdown for structural completeness
 *
 * Missing required sections are errors and make the template invalid.
 * Everything else (example blocks, malformed JSON, tables) is reported as a
 * warning and never affects `valid`.
 *
 * @param content - Template Markdown already in memory
 * @returns Validation result
 *
 * @example
 * ```typescript
 * const result = validateTemplate(await loader.load('docs/templates/api-docs-template.md'));
 * if (!result.valid) console.error(result.errors.join('\n'));
 * ```
 */
export function validateTemplate(
  content: string,
  options?: TemplateValidatorOptions
): TemplateValidationResult {
  const text = normalizeLineEndings(content);
  const minCodeExamples = options?.minCodeExamples ?? DEFAULT_MIN_CODE_EXAMPLES;

  const result: TemplateValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    sectionsFound: [],
  };

  for (const section of REQUIRED_SECTIONS) {
    if (hasSectionHeading(text, section)) {
      result.sectionsFound.push(section);
    } else {
      result.valid = false;
      result.errors.push(`Missing required section: ${section}`);
    }
  }

  if (extractBlocks(text, HTTP_BLOCK).length === 0) {
    result.warnings.push('No HTTP examples found in template');
  }

  extractBlocks(text, JSON_BLOCK).forEach((block, index) => {
    try {
      JSON.parse(block);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown';
      result.warnings.push(`Invalid JSON in example #${index + 1}: ${reason}`);
    }
  });

  if (extractBlocks(text, CODE_BLOCK).length < minCodeExamples) {
    result.warnings.push('Few code examples found - consider adding more');
  }

  if (!TABLE_ROW.test(text)) {
    result.warnings.push('No tables found - consider adding tables for error codes or parameters');
  }

  return result;
}

/**
 * Check for a second-level heading line with exactly this title
 */
export function hasSectionHeading(content: string, section: string): boolean {
  const pattern = new RegExp(`^## ${escapeRegExp(section)}[ \\t]*$`, 'm');
  return pattern.test(normalizeLineEndings(content));
}

/**
 * Bodies of every fenced block matched by a global pattern
 */
export function extractBlocks(content: string, pattern: RegExp): string[] {
  return Array.from(content.matchAll(pattern), (match) => match[1] ?? '');
}

function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n/g, '\n');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
