import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { runCli } from '../run.js';
import { USAGE } from '../args.js';
import { fileExists } from '../../templates/files.js';
import type { Logger } from '../../types.js';
import { COMPLETE_TEMPLATE, makeTempDir, removeDir } from '../../__tests__/test-helpers.js';

const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

describe('runCli', () => {
  let cwd: string;
  let stdout: string[];
  let stderr: string[];

  function run(argv: string[]): Promise<number> {
    return runCli(argv, {
      cwd,
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      logger: silentLogger,
    });
  }

  async function writeTemplate(path = 'docs/templates/api-docs-template.md'): Promise<void> {
    const fullPath = join(cwd, path);
    await mkdir(join(fullPath, '..'), { recursive: true });
    await writeFile(fullPath, COMPLETE_TEMPLATE, 'utf-8');
  }

  beforeEach(async () => {
    cwd = await makeTempDir();
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await removeDir(cwd);
  });

  it('should generate with defaults and exit 0', async () => {
    await writeTemplate();

    const exitCode = await run([]);

    expect(exitCode).toBe(0);
    expect(stdout).toHaveLength(1);
    expect(JSON.parse(stdout[0] ?? '')).toMatchObject({
      success: true,
      outputFile: join(cwd, 'docs/api/endpoints.md'),
      reportFile: join(cwd, 'docs/api/validation-report.json'),
      summary: { checksPassed: 7, checksTotal: 7 },
    });
    expect(await fileExists(join(cwd, 'docs/api/validation-report.json'))).toBe(true);
  });

  it('should print the payload as 2-space JSON', async () => {
    await writeTemplate();

    await run(['--validate']);

    expect(stdout[0]).toBe(
      JSON.stringify(
        {
          valid: true,
          errors: [],
          warnings: [],
          sectionsFound: [
            'Overview',
            'Authentication',
            'Endpoints',
            'Request/Response Examples',
            'Error Codes',
          ],
        },
        null,
        2
      )
    );
  });

  it('should exit 1 without writing anything when the template is missing', async () => {
    const exitCode = await run([]);

    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout[0] ?? '')).toEqual({
      success: false,
      message: `Template file not found: ${join(cwd, 'docs/templates/api-docs-template.md')}`,
    });
    expect(await fileExists(join(cwd, 'docs/api/endpoints.md'))).toBe(false);
    expect(await fileExists(join(cwd, 'docs/api/validation-report.json'))).toBe(false);
  });

  it('should honour path and placement overrides', async () => {
    await writeTemplate('src/api.md');

    const exitCode = await run([
      '--generate',
      '--template',
      'src/api.md',
      '--output',
      'site/api.md',
      '--placement',
      'after-title',
      '--doc-version',
      '4.0.0',
    ]);

    expect(exitCode).toBe(0);
    const written = await readFile(join(cwd, 'site/api.md'), 'utf-8');
    expect(written.split('\n')[0]).toBe('# Smart Home API');
    expect(written.split('\n')[1]).toMatch(/^<!-- Generated on .+ \| Version: 4\.0\.0 -->$/);
  });

  it('should report health', async () => {
    const exitCode = await run(['--health']);

    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout[0] ?? '')).toMatchObject({
      healthy: false,
      issues: [
        'Template directory does not exist',
        'Output directory does not exist',
        'Template file does not exist',
      ],
    });
  });

  it('should read settings from the config file', async () => {
    await writeTemplate();
    await writeFile(join(cwd, 'api-docs.config.yaml'), 'includeMetadata: false\n', 'utf-8');

    await run(['--generate']);

    expect(await readFile(join(cwd, 'docs/api/endpoints.md'), 'utf-8')).toBe(COMPLETE_TEMPLATE);
  });

  it('should print config errors as a failed payload', async () => {
    await writeFile(join(cwd, 'api-docs.config.yaml'), 'minCodeExamples: many\n', 'utf-8');

    const exitCode = await run([]);

    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout[0] ?? '')).toMatchObject({ success: false });
    expect(JSON.parse(stdout[0] ?? '').message).toMatch(/^Invalid config .+: minCodeExamples: /);
  });

  it('should print usage and exit 1 on bad arguments', async () => {
    const exitCode = await run(['--unknown']);

    expect(exitCode).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr[0]?.endsWith(USAGE)).toBe(true);
  });

  it('should print usage for --help', async () => {
    const exitCode = await run(['--help']);

    expect(exitCode).toBe(0);
    expect(stdout).toEqual([USAGE]);
  });
});
