import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { checkHealth } from '../health.js';
import { directoryExists } from '../files.js';
import { makeTempDir, removeDir } from '../../__tests__/test-helpers.js';

describe('checkHealth', () => {
  let testDir: string;
  let templateDir: string;
  let outputDir: string;
  let templatePath: string;

  beforeEach(async () => {
    testDir = await makeTempDir();
    templateDir = join(testDir, 'docs', 'templates');
    outputDir = join(testDir, 'docs', 'api');
    templatePath = join(templateDir, 'api-docs-template.md');
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it('should be healthy when every path exists', async () => {
    await mkdir(templateDir, { recursive: true });
    await mkdir(outputDir, { recursive: true });
    await writeFile(templatePath, '# API', 'utf-8');

    const health = await checkHealth({ templatePath, templateDir, outputDir });

    expect(health).toEqual({
      healthy: true,
      issues: [],
      templateExists: true,
      templateDirExists: true,
      outputDirExists: true,
    });
  });

  it('should list every issue in order when nothing exists', async () => {
    const health = await checkHealth({ templatePath, templateDir, outputDir });

    expect(health).toEqual({
      healthy: false,
      issues: [
        'Template directory does not exist',
        'Output directory does not exist',
        'Template file does not exist',
      ],
      templateExists: false,
      templateDirExists: false,
      outputDirExists: false,
    });
  });

  it('should report a missing template file only', async () => {
    await mkdir(templateDir, { recursive: true });
    await mkdir(outputDir, { recursive: true });

    const health = await checkHealth({ templatePath, templateDir, outputDir });

    expect(health.healthy).toBe(false);
    expect(health.issues).toEqual(['Template file does not exist']);
  });

  it('should not count a directory as the template file', async () => {
    await mkdir(templatePath, { recursive: true });
    await mkdir(outputDir, { recursive: true });

    const health = await checkHealth({ templatePath, templateDir, outputDir });

    expect(health.templateExists).toBe(false);
    expect(health.templateDirExists).toBe(true);
  });

  it('should not count a file as the output directory', async () => {
    await mkdir(join(testDir, 'docs'), { recursive: true });
    await writeFile(outputDir, 'not a directory', 'utf-8');

    const health = await checkHealth({ templatePath, templateDir, outputDir });

    expect(health.outputDirExists).toBe(false);
  });

  it('should never create directories', async () => {
    await checkHealth({ templatePath, templateDir, outputDir });

    expect(await directoryExists(templateDir)).toBe(false);
    expect(await directoryExists(outputDir)).toBe(false);
  });
});
