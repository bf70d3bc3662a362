import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomInt } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import {
  GradientTestMode,
  WorkflowRunOptions,
  WorkflowRunResult,
  WorkflowStepName,
  WorkflowStepResult,
} from './workflow.types';
import { ForecastDownloadService } from '../download/forecast-download.service';
import { ForecastSourceService } from '../forecast/forecast-source.service';
import { EmailService } from '../email/email.service';
import { ImageAssemblerService } from '../render/image-assembler.service';
import { RENDER_SPEC, RenderSpec } from '../render/render-spec.types';
import {
  WEATHER_CODE_MAPPING,
  WeatherCodeMapping,
} from '../render/icons/weather-code-mapping';
import { randomSeed, seedForDate } from '../render/seeded-random';
import { GradientSeedPolicy } from '../../config/environment.validation';
import { addDays, isIsoDate, todayIn } from '../utils/dates';
import {
  describeError,
  EncodingFailureError,
  ForecastSourceError,
  ValidationWarning,
} from '../utils/errors';

export const OUTPUT_FILE = 'daily_forecast.jpg';

type StepOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * The daily run: download the feed, extract the target date, render the
 * image and email it. Only a failed download is tolerated, since extraction
 * can still use the previous or archived XML.
 */
@Injectable()
export class ForecastWorkflowService {
  private readonly logger = new Logger(ForecastWorkflowService.name);
  private readonly timezone: string;
  private readonly abortOnWarning: boolean;
  private readonly seedPolicy: GradientSeedPolicy;
  private readonly fixedSeed?: number;
  private lastRun: WorkflowRunResult | null = null;
  readonly outputPath: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly downloadService: ForecastDownloadService,
    private readonly sourceService: ForecastSourceService,
    private readonly assembler: ImageAssemblerService,
    private readonly emailService: EmailService,
    @Inject(RENDER_SPEC) private readonly renderSpec: RenderSpec,
    @Inject(WEATHER_CODE_MAPPING) private readonly mapping: WeatherCodeMapping,
  ) {
    this.timezone = this.configService.get<string>(
      'FORECAST_TIMEZONE',
      'Asia/Jerusalem',
    );
    this.abortOnWarning = this.configService.get<boolean>(
      'ABORT_ON_VALIDATION_WARNING',
      false,
    );
    this.seedPolicy = this.configService.get<GradientSeedPolicy>(
      'GRADIENT_SEED_POLICY',
      'date',
    );
    this.fixedSeed = this.configService.get<number>('GRADIENT_SEED');
    this.outputPath = join(
      resolve(this.configService.get<string>('OUTPUT_DIR', 'output')),
      OUTPUT_FILE,
    );
  }

  getLastRun(): WorkflowRunResult | null {
    return this.lastRun;
  }

  seedFor(date: string): number {
    if (this.fixedSeed !== undefined) return this.fixedSeed;
    return this.seedPolicy === 'random' ? randomSeed() : seedForDate(date);
  }

  async run(options: WorkflowRunOptions = {}): Promise<WorkflowRunResult> {
    const dryRun = options.dryRun ?? false;
    const startedAt = new Date();
    const steps: WorkflowStepResult[] = [];
    const result: WorkflowRunResult = {
      success: false,
      dryRun,
      targetDate: options.targetDate ?? todayIn(this.timezone, startedAt),
      warnings: [],
      steps,
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      durationMs: 0,
    };

    this.logger.log(`Forecast workflow started (${dryRun ? 'DRY RUN' : 'production run'})`);

    try {
      result.targetDate = await this.resolveTargetDate(options, startedAt);
    } catch (error) {
      return this.finish(result, startedAt, describeError(error));
    }
    this.logger.log(`Target date: ${result.targetDate}`);

    // Extraction needs the file on disk, so the download is real even in a dry run
    const download = await this.runStep(steps, 'download', async () => {
      const outcome = await this.downloadService.downloadAndConvert({ dryRun: false });
      if (!outcome.success) {
        throw new ForecastSourceError(outcome.error ?? 'Download failed');
      }
      return `${outcome.bytes ?? 0} bytes, ${outcome.prunedArchives} old archives pruned`;
    });
    if (!download.ok) {
      this.logger.warn('Download failed, extraction will use existing or archived XML');
    }

    const extract = await this.runStep(steps, 'extract', async () => {
      const extracted = await this.sourceService.extract(result.targetDate);
      this.applyWarnings(result, extracted.resolved.warnings);
      return extracted;
    });
    if (!extract.ok) {
      return this.finish(result, startedAt, `Extraction failed: ${describeError(extract.error)}`);
    }

    const { forecast, resolved } = extract.value;
    result.effectiveDate = resolved.effectiveDate;
    result.usedFallback = resolved.usedFallback;
    result.cityCount = forecast.records.length;

    if (dryRun) {
      this.skipStep(
        steps,
        'render',
        `Would render ${forecast.records.length} cities to ${this.outputPath}`,
      );
    } else {
      const render = await this.runStep(steps, 'render', async () => {
        const seed = this.seedFor(forecast.date);
        const image = await this.assembler.render({
          forecast,
          spec: this.renderSpec,
          mapping: this.mapping,
          seed,
        });
        await this.writeOutput(image.data);
        result.seed = seed;
        result.palette = image.palette.name;
        result.outputPath = this.outputPath;
        return `${image.width}x${image.height} JPEG, palette '${image.palette.name}'`;
      });
      if (!render.ok) {
        return this.finish(result, startedAt, `Image generation failed: ${describeError(render.error)}`);
      }
    }

    const email = await this.runStep(steps, 'email', async () => {
      const sent = await this.emailService.send({
        imagePath: this.outputPath,
        forecastDate: forecast.date,
        dryRun,
      });
      return sent.sent ? `Sent to ${sent.recipient}` : 'Validated (dry run)';
    });
    if (!email.ok) {
      return this.finish(result, startedAt, `Email delivery failed: ${describeError(email.error)}`);
    }

    result.success = true;
    return this.finish(result, startedAt);
  }

  private async resolveTargetDate(
    options: WorkflowRunOptions,
    now: Date,
  ): Promise<string> {
    if (options.gradientTest) {
      const date = await this.gradientTestDate(options.gradientTest, now);
      this.logger.log(`Gradient test mode '${options.gradientTest}': ${date}`);
      return date;
    }

    if (options.targetDate !== undefined) {
      if (!isIsoDate(options.targetDate)) {
        throw new RangeError(`Target date must be YYYY-MM-DD, got '${options.targetDate}'`);
      }
      return options.targetDate;
    }
    return todayIn(this.timezone, now);
  }

  private async gradientTestDate(mode: GradientTestMode, now: Date): Promise<string> {
    const today = todayIn(this.timezone, now);
    if (mode === 'today') return today;
    if (mode === 'tomorrow') return addDays(today, 1);

    const { document } = await this.sourceService.load();
    if (document.availableDates.length === 0) {
      throw new ForecastSourceError('No forecast dates available to pick from');
    }
    return document.availableDates[randomInt(document.availableDates.length)];
  }

  private applyWarnings(result: WorkflowRunResult, warnings: ValidationWarning[]): void {
    result.warnings.push(...warnings);
    if (warnings.length > 0 && this.abortOnWarning) {
      throw new Error(
        `Aborting on ${warnings.length} validation warning(s): ${warnings
          .map((warning) => warning.message)
          .join('; ')}`,
      );
    }
  }

  private async writeOutput(data: Buffer): Promise<void> {
    try {
      await mkdir(dirname(this.outputPath), { recursive: true });
      await writeFile(this.outputPath, data);
    } catch (error) {
      throw new EncodingFailureError(`Could not write ${this.outputPath}`, error);
    }
    this.logger.log(`Saved image to ${this.outputPath} (${data.length} bytes)`);
  }

  private async runStep<T>(
    steps: WorkflowStepResult[],
    name: WorkflowStepName,
    action: () => Promise<T>,
  ): Promise<StepOutcome<T>> {
    this.logger.log(`Step: ${name}`);
    const started = Date.now();
    try {
      const value = await action();
      steps.push({
        name,
        status: 'success',
        durationMs: Date.now() - started,
        ...(typeof value === 'string' ? { message: value } : {}),
      });
      this.logger.log(`Step ${name} completed`);
      return { ok: true, value };
    } catch (error) {
      steps.push({
        name,
        status: 'failed',
        durationMs: Date.now() - started,
        message: describeError(error),
      });
      this.logger.error(
        `Step ${name} failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { ok: false, error };
    }
  }

  private skipStep(
    steps: WorkflowStepResult[],
    name: WorkflowStepName,
    message: string,
  ): void {
    this.logger.log(`[DRY RUN] Skipping ${name}: ${message}`);
    steps.push({ name, status: 'skipped', durationMs: 0, message });
  }

  private finish(
    result: WorkflowRunResult,
    startedAt: Date,
    error?: string,
  ): WorkflowRunResult {
    const finishedAt = new Date();
    result.finishedAt = finishedAt.toISOString();
    result.durationMs = finishedAt.getTime() - startedAt.getTime();
    if (error !== undefined) {
      result.success = false;
      result.error = error;
    }

    if (result.success) {
      this.logger.log(
        `Workflow succeeded for ${result.effectiveDate ?? result.targetDate} in ${(
          result.durationMs / 1000
        ).toFixed(1)}s`,
      );
    } else {
      this.logger.error(`Workflow failed: ${result.error ?? 'unknown error'}`);
    }

    this.lastRun = result;
    return result;
  }
}
