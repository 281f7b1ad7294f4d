import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { TOTAL_CHECKS, buildReport, countPassedChecks, readReport, serializeReport } from '../report.js';
import { inspectGeneratedContent } from '../generator.js';
import { validateTemplate } from '../validator.js';
import { ReportFormatError } from '../schema.js';
import { COMPLETE_TEMPLATE, makeTempDir, removeDir } from '../../__tests__/test-helpers.js';

describe('buildReport', () => {
  it('should summarise seven checks', () => {
    expect(TOTAL_CHECKS).toBe(7);
  });

  it('should count passed checks for a complete document', () => {
    const report = buildReport({
      templateFile: 'in.md',
      outputFile: 'out.md',
      result: inspectGeneratedContent(COMPLETE_TEMPLATE),
      timestamp: new Date('2026-03-04T05:06:07.000Z'),
    });

    expect(report.timestamp).toBe('2026-03-04T05:06:07.000Z');
    expect(report.summary).toEqual({ checksPassed: 7, checksTotal: 7 });
    expect(report).not.toHaveProperty('templateValidation');
  });

  it('should count passed checks for a partial document', () => {
    const result = inspectGeneratedContent('## Overview\n## Endpoints\n```json\n{}\n```');

    expect(countPassedChecks(result.checks)).toBe(3);
    expect(
      buildReport({ templateFile: 'in.md', outputFile: 'out.md', result }).summary
    ).toEqual({ checksPassed: 3, checksTotal: 7 });
  });

  it('should carry the template validation when given', () => {
    const templateValidation = validateTemplate(COMPLETE_TEMPLATE);
    const report = buildReport({
      templateFile: 'in.md',
      outputFile: 'out.md',
      result: inspectGeneratedContent(COMPLETE_TEMPLATE),
      templateValidation,
    });

    expect(report.templateValidation).toEqual(templateValidation);
  });
});

describe('readReport', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it('should read back a serialized report', async () => {
    const report = buildReport({
      templateFile: 'in.md',
      outputFile: 'out.md',
      result: inspectGeneratedContent(COMPLETE_TEMPLATE),
      templateValidation: validateTemplate(COMPLETE_TEMPLATE),
    });
    const reportPath = join(testDir, 'report.json');
    await writeFile(reportPath, serializeReport(report), 'utf-8');

    expect(await readReport(reportPath)).toEqual(report);
  });

  it('should reject malformed JSON', async () => {
    const reportPath = join(testDir, 'report.json');
    await writeFile(reportPath, '{"timestamp": ', 'utf-8');

    await expect(readReport(reportPath)).rejects.toThrow(ReportFormatError);
  });

  it('should reject a report missing its summary', async () => {
    const reportPath = join(testDir, 'report.json');
    const { summary: _summary, ...withoutSummary } = buildReport({
      templateFile: 'in.md',
      outputFile: 'out.md',
      result: inspectGeneratedContent(''),
    });
    await writeFile(reportPath, JSON.stringify(withoutSummary), 'utf-8');

    const error = await readReport(reportPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReportFormatError);
    expect((error as ReportFormatError).getDetails()).toBe('summary: Required');
  });
});
