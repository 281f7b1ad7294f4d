import type { HealthStatus, Logger } from '../types.js';
import { directoryExists, fileExists } from './files.js';

export interface HealthCheckPaths {
  templatePath: string;
  templateDir: string;
  outputDir: string;
}

/**
 * Pre-flight probe of the paths a generation run depends on.
 * Never creates anything on disk.
 */
export async function checkHealth(paths: HealthCheckPaths, logger?: Logger): Promise<HealthStatus> {
  const templateDirExists = await directoryExists(paths.templateDir);
  const outputDirExists = await directoryExists(paths.outputDir);
  const templateExists = await fileExists(paths.templatePath);

  const issues: string[] = [];
  if (!templateDirExists) issues.push('Template directory does not exist');
  if (!outputDirExists) issues.push('Output directory does not exist');
  if (!templateExists) issues.push('Template file does not exist');

  const health: HealthStatus = {
    healthy: issues.length === 0,
    issues,
    templateExists,
    templateDirExists,
    outputDirExists,
  };

  if (health.healthy) {
    logger?.debug('Health check passed', paths);
  } else {
    logger?.warn('Health check found issues', { issues });
  }

  return health;
}
