import { readFile } from 'fs/promises';
import type { Logger } from '../types.js';
import { TemplateNotFoundError, TemplateReadError } from './errors.js';

/**
 * Template Loader - Reads template Markdown from the filesystem
 */
export class TemplateLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load template text from file
   *
   * @param filePath - Path to the Markdown template
   * @returns Raw UTF-8 template content
   * @throws TemplateNotFoundError if the path does not exist
   * @throws TemplateReadError for any other I/O failure
   */
  async load(filePath: string): Promise<string> {
    try {
      const content = await readFile(filePath, 'utf-8');

      this.logger?.debug(`Loaded template from ${filePath}`, { bytes: Buffer.byteLength(content) });

      return content;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger?.warn(`Template file not found: ${filePath}`);
        throw new TemplateNotFoundError(filePath);
      }

      this.logger?.warn(`Failed to read template from ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw new TemplateReadError(filePath, error);
    }
  }
}
