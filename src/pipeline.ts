import { EventEmitter } from 'eventemitter3';
import type {
  DocsConfig,
  GeneratedValidationResult,
  GenerationMetadata,
  HealthStatus,
  Logger,
  ReportSummary,
  TemplateValidationResult,
} from './types.js';
import {
  DocumentGenerator,
  TemplateLoader,
  ValidationFailedError,
  WriteError,
  buildReport,
  checkHealth,
  validateTemplate,
} from './templates/index.js';

export type PipelineMode = 'full' | 'generate' | 'validate' | 'validate-output' | 'health';

export type PipelineStage = 'load' | 'validate' | 'generate' | 'verify' | 'report' | 'health';

export interface ProgressEvent {
  stage: PipelineStage;
  message: string;
}

export interface PipelineEvents {
  progress: (event: ProgressEvent) => void;
  failed: (error: Error) => void;
}

/**
 * Result of a generation-style run, printed as JSON by the CLI
 */
export interface RunSummary {
  success: boolean;
  message: string;
  templateFile?: string;
  outputFile?: string;
  reportFile?: string;
  validation?: TemplateValidationResult;
  generatedValidation?: GeneratedValidationResult;
  summary?: ReportSummary;
}

export type PipelinePayload = RunSummary | TemplateValidationResult | HealthStatus;

export interface PipelineOutcome {
  mode: PipelineMode;
  exitCode: 0 | 1;
  payload: PipelinePayload;
}

export interface PipelineOptions {
  logger?: Logger;
  /** Clock for metadata and report timestamps */
  now?: () => Date;
}

/**
 * DocsPipeline - Runs one batch of Load → Validate → Generate → Verify → Report
 *
 * Every error raised along the way is caught here and turned into a failed
 * payload with exit code 1.
 *
 * @example
 * ```typescript
 * const pipeline = new DocsPipeline(await loadConfig(), { logger });
 * pipeline.on('progress', ({ stage, message }) => logger.debug(`[${stage}] ${message}`));
 *
 * const outcome = await pipeline.run('full');
 * process.exitCode = outcome.exitCode;
 * ```
 */
export class DocsPipeline extends EventEmitter<PipelineEvents> {
  private config: DocsConfig;
  private logger?: Logger;
  private now: () => Date;
  private loader: TemplateLoader;
  private generator: DocumentGenerator;

  constructor(config: DocsConfig, options?: PipelineOptions) {
    super();
    this.config = config;
    this.logger = options?.logger;
    this.now = options?.now ?? (() => new Date());
    this.loader = new TemplateLoader(this.logger);
    this.generator = new DocumentGenerator({
      logger: this.logger,
      metadataPlacement: config.metadataPlacement,
    });
  }

  /**
   * Run the pipeline in the given mode
   */
  async run(mode: PipelineMode = 'full'): Promise<PipelineOutcome> {
    this.logger?.debug('Starting run', { mode });

    try {
      switch (mode) {
        case 'health':
          return await this.runHealth();
        case 'validate':
          return await this.runValidate();
        case 'generate':
          return await this.runGenerate();
        case 'validate-output':
          return await this.runValidateOutput();
        case 'full':
          return await this.runFull();
      }
    } catch (error) {
      return this.fail(mode, error);
    }
  }

  private async runHealth(): Promise<PipelineOutcome> {
    this.progress('health', 'Checking template and output paths');

    const health = await checkHealth(
      {
        templatePath: this.config.templatePath,
        templateDir: this.config.templateDir,
        outputDir: this.config.outputDir,
      },
      this.logger
    );

    return { mode: 'health', exitCode: health.healthy ? 0 : 1, payload: health };
  }

  private async runValidate(): Promise<PipelineOutcome> {
    const { validation } = await this.loadAndValidate();

    return { mode: 'validate', exitCode: validation.valid ? 0 : 1, payload: validation };
  }

  private async runGenerate(): Promise<PipelineOutcome> {
    const { content, validation } = await this.loadValidTemplate();

    const message = await this.writeDocument(content);

    return {
      mode: 'generate',
      exitCode: 0,
      payload: {
        success: true,
        message,
        templateFile: this.config.templatePath,
        outputFile: this.config.outputPath,
        validation,
      },
    };
  }

  private async runValidateOutput(): Promise<PipelineOutcome> {
    const result = await this.verifyOutput();
    const summary = await this.report(result);

    return {
      mode: 'validate-output',
      exitCode: result.validationPassed ? 0 : 1,
      payload: {
        success: result.validationPassed,
        message: result.validationPassed
          ? `Generated document passed validation: ${this.config.outputPath}`
          : 'Generated document failed validation',
        outputFile: this.config.outputPath,
        reportFile: this.config.reportPath,
        generatedValidation: result,
        summary,
      },
    };
  }

  private async runFull(): Promise<PipelineOutcome> {
    const { content, validation } = await this.loadValidTemplate();

    const message = await this.writeDocument(content);
    const result = await this.verifyOutput();
    const summary = await this.report(result, validation);

    return {
      mode: 'full',
      exitCode: result.validationPassed ? 0 : 1,
      payload: {
        success: result.validationPassed,
        message: result.validationPassed ? message : 'Generated document failed validation',
        templateFile: this.config.templatePath,
        outputFile: this.config.outputPath,
        reportFile: this.config.reportPath,
        validation,
        generatedValidation: result,
        summary,
      },
    };
  }

  private async loadAndValidate(): Promise<{ content: string; validation: TemplateValidationResult }> {
    const content = await this.loader.load(this.config.templatePath);
    this.progress('load', `Loaded template ${this.config.templatePath}`);

    return { content, validation: this.validate(content) };
  }

  private async loadValidTemplate(): Promise<{ content: string; validation: TemplateValidationResult }> {
    const loaded = await this.loadAndValidate();
    if (!loaded.validation.valid) {
      throw new ValidationFailedError(loaded.validation);
    }

    return loaded;
  }

  private validate(content: string): TemplateValidationResult {
    const validation = validateTemplate(content, { minCodeExamples: this.config.minCodeExamples });

    for (const warning of validation.warnings) {
      this.logger?.warn(warning);
    }

    this.progress(
      'validate',
      validation.valid
        ? `Template has all ${validation.sectionsFound.length} required sections`
        : `Template is missing ${validation.errors.length} required section(s)`
    );

    return validation;
  }

  private async writeDocument(content: string): Promise<string> {
    const metadata: GenerationMetadata | undefined = this.config.includeMetadata
      ? { generatedAt: this.now(), version: this.config.docVersion }
      : undefined;

    const generation = await this.generator.generate(content, this.config.outputPath, metadata);
    if (!generation.success) {
      throw generation.error ?? new WriteError(this.config.outputPath);
    }

    this.progress('generate', generation.message);
    return generation.message;
  }

  private async verifyOutput(): Promise<GeneratedValidationResult> {
    const result = await this.generator.validateGenerated(this.config.outputPath);

    this.progress(
      'verify',
      `Generated document ${result.validationPassed ? 'passed' : 'failed'} validation`
    );

    return result;
  }

  private async report(
    result: GeneratedValidationResult,
    templateValidation?: TemplateValidationResult
  ): Promise<ReportSummary> {
    const report = buildReport({
      templateFile: this.config.templatePath,
      outputFile: this.config.outputPath,
      result,
      templateValidation,
      timestamp: this.now(),
    });

    await this.generator.writeReport(report, this.config.reportPath);
    this.progress('report', `Wrote report ${this.config.reportPath}`);

    return report.summary;
  }

  private progress(stage: PipelineStage, message: string): void {
    this.emit('progress', { stage, message });
  }

  private fail(mode: PipelineMode, error: unknown): PipelineOutcome {
    const failure = error instanceof Error ? error : new Error(String(error));

    this.logger?.error(failure.message, { error: failure.name });
    this.emit('failed', failure);

    const payload: RunSummary = { success: false, message: failure.message };
    if (failure instanceof ValidationFailedError) {
      payload.validation = failure.validation;
    }

    return { mode, exitCode: 1, payload };
  }
}
