import { ConfigError, loadConfig } from '../config.js';
import { createConsoleLogger } from '../logger.js';
import { DocsPipeline } from '../pipeline.js';
import type { DocsConfig, Logger } from '../types.js';
import { CliUsageError, USAGE, parseCliArgs } from './args.js';
import type { CliArgs } from './args.js';

export interface CliIO {
  /** Directory relative paths are resolved against */
  cwd?: string;
  /** Receives the JSON payload and help text */
  stdout?: (text: string) => void;
  /** Receives usage errors */
  stderr?: (text: string) => void;
  /** Replaces the console logger built from the configured level */
  logger?: Logger;
}

/**
 * Run the command line and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO = {}): Promise<number> {
  const stdout = io.stdout ?? ((text: string) => console.log(text));
  const stderr = io.stderr ?? ((text: string) => console.error(text));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (args.help) {
    stdout(USAGE);
    return 0;
  }

  let config: DocsConfig;
  try {
    config = await loadConfig({ cwd: io.cwd, configPath: args.configPath, overrides: args.overrides });
  } catch (error) {
    if (error instanceof ConfigError) {
      const message = error.errors ? `${error.message}: ${error.getDetails()}` : error.message;
      stdout(JSON.stringify({ success: false, message }, null, 2));
      return 1;
    }
    throw error;
  }

  const logger = io.logger ?? createConsoleLogger(config.logLevel);
  const pipeline = new DocsPipeline(config, { logger });

  pipeline.on('progress', ({ stage, message }) => {
    logger.debug(`[${stage}] ${message}`);
  });

  const outcome = await pipeline.run(args.mode);
  stdout(JSON.stringify(outcome.payload, null, 2));

  return outcome.exitCode;
}
