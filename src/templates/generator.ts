import { readFile } from 'fs/promises';
import type {
  GeneratedDocumentChecks,
  GeneratedValidationResult,
  GenerationMetadata,
  GenerationResult,
  Logger,
  MetadataPlacement,
  ValidationReport,
} from '../types.js';
import { ReportWriteError, TemplateNotFoundError, TemplateReadError, WriteError } from './errors.js';
import { writeTextFile } from './files.js';
import { serializeReport } from './report.js';

export const DEFAULT_DOC_VERSION = '1.0.0';

/**
 * Document generation options
 */
export interface GeneratorOptions {
  logger?: Logger;
  metadataPlacement?: MetadataPlacement;
}

/**
 * Substrings checked in a generated document, keyed by check name
 */
const SECTION_CHECKS: Array<[keyof GeneratedDocumentChecks, string]> = [
  ['hasOverview', 'Overview'],
  ['hasAuthentication', 'Authentication'],
  ['hasEndpoints', 'Endpoints'],
  ['hasExamples', 'Request/Response Examples'],
  ['hasErrorCodes', 'Error Codes'],
];

const BLOCK_CHECKS: Array<[keyof GeneratedDocumentChecks, 'http' | 'json']> = [
  ['hasHttpExample', 'http'],
  ['hasJsonExample', 'json'],
];

/**
 * Document Generator - Stamps template content with generation metadata,
 * writes it out and verifies the written file.
 *
 * @example
 * ```typescript
 * const generator = new DocumentGenerator({ logger, metadataPlacement: 'after-title' });
 *
 * const result = await generator.generate(content, 'docs/api/endpoints.md', {
 *   generatedAt: new Date(),
 *   version: '2.1.0',
 * });
 *
 * if (result.success) {
 *   const validation = await generator.validateGenerated(result.outputFile);
 *   console.log(validation.validationPassed);
 * }
 * ```
 */
export class DocumentGenerator {
  private logger?: Logger;
  private placement: MetadataPlacement;

  constructor(options?: GeneratorOptions) {
    this.logger = options?.logger;
    this.placement = options?.metadataPlacement ?? 'append';
  }

  /**
   * Write a document generated from template content
   *
   * Failures are returned in the result, never thrown.
   *
   * @param content - Template content
   * @param outputPath - Destination file, overwritten if present
   * @param metadata - Generation metadata to inject, if any
   */
  async generate(
    content: string,
    outputPath: string,
    metadata?: GenerationMetadata
  ): Promise<GenerationResult> {
    const document = metadata ? injectMetadata(content, metadata, this.placement) : content;

    try {
      await writeTextFile(outputPath, document);
    } catch (error) {
      const writeError = new WriteError(outputPath, error);
      this.logger?.error('Generation error', { error: writeError.message });

      return {
        success: false,
        message: `Error generating documentation: ${writeError.message}`,
        outputFile: outputPath,
        error: writeError,
      };
    }

    this.logger?.info(`API documentation generated: ${outputPath}`);

    return {
      success: true,
      message: `API documentation generated successfully: ${outputPath}`,
      outputFile: outputPath,
    };
  }

  /**
   * Re-read a generated document and check it textually
   *
   * @param outputPath - Generated document to inspect
   * @throws TemplateNotFoundError if the file does not exist
   * @throws TemplateReadError if the file cannot be read
   */
  async validateGenerated(outputPath: string): Promise<GeneratedValidationResult> {
    let content: string;
    try {
      content = await readFile(outputPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new TemplateNotFoundError(outputPath, 'Generated document');
      }
      throw new TemplateReadError(outputPath, error);
    }

    const result = inspectGeneratedContent(content);

    this.logger?.debug(`Validated generated document: ${outputPath}`, {
      passed: result.validationPassed,
      lineCount: result.lineCount,
      wordCount: result.wordCount,
    });

    return result;
  }

  /**
   * Persist a validation report as 2-space indented JSON
   *
   * @throws ReportWriteError if the report cannot be written
   */
  async writeReport(report: ValidationReport, reportPath: string): Promise<void> {
    try {
      await writeTextFile(reportPath, serializeReport(report));
    } catch (error) {
      this.logger?.error('Error generating validation report', {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw new ReportWriteError(reportPath, error);
    }

    this.logger?.info(`Validation report generated: ${reportPath}`);
  }
}

/**
 * Insert the generation metadata block into document content
 *
 * `append` adds a footer after a horizontal rule. `after-title` adds an HTML
 * comment on the line after the first `# ` title outside code fences, or at
 * the top when the document has no title line. The document's line ending is kept.
 */
export function injectMetadata(
  content: string,
  metadata: GenerationMetadata,
  placement: MetadataPlacement
): string {
  const timestamp = metadata.generatedAt.toISOString();
  const version = metadata.version ?? DEFAULT_DOC_VERSION;

  if (placement === 'append') {
    return `${content}\n\n---\n\n*Generated on ${timestamp} by API Documentation Generator (version ${version})*`;
  }

  const comment = `<!-- Generated on ${timestamp} | Version: ${version} -->`;
  const lines = content.split('\n');
  const titleIndex = findTitleLine(lines);

  if (titleIndex === -1) {
    return `${comment}${content.includes('\r\n') ? '\r\n' : '\n'}${content}`;
  }

  const title = lines[titleIndex] ?? '';
  lines.splice(titleIndex + 1, 0, title.endsWith('\r') ? `${comment}\r` : comment);
  return lines.join('\n');
}

/**
 * Index of the first `# ` line outside fenced code blocks, or -1
 */
function findTitleLine(lines: readonly string[]): number {
  let inFence = false;

  for (const [index, line] of lines.entries()) {
    if (line.trimStart().startsWith('```')) {
      inFence = !inFence;
    } else if (!inFence && line.startsWith('# ')) {
      return index;
    }
  }

  return -1;
}

/**
 * Compute the seven substring checks plus line and word counts
 */
export function inspectGeneratedContent(content: string): GeneratedValidationResult {
  const checks: GeneratedDocumentChecks = {
    hasOverview: false,
    hasAuthentication: false,
    hasEndpoints: false,
    hasExamples: false,
    hasErrorCodes: false,
    hasHttpExample: false,
    hasJsonExample: false,
  };
  const errors: string[] = [];
  const sectionsFound: string[] = [];

  for (const [key, section] of SECTION_CHECKS) {
    checks[key] = content.includes(`## ${section}`);
    if (checks[key]) {
      sectionsFound.push(section);
    } else {
      errors.push(`Missing required section in generated document: ${section}`);
    }
  }

  for (const [key, language] of BLOCK_CHECKS) {
    checks[key] = content.includes('```' + language);
    if (!checks[key]) {
      errors.push(`Missing ${language} example block in generated document`);
    }
  }

  return {
    validationPassed: errors.length === 0 && Object.values(checks).every(Boolean),
    errors,
    warnings: [],
    sectionsFound,
    lineCount: content.split('\n').length,
    wordCount: content.split(/\s+/).filter((token) => token.length > 0).length,
    checks,
  };
}
