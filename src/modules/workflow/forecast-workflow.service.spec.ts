import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ForecastWorkflowService, OUTPUT_FILE } from './forecast-workflow.service';
import { ForecastDownloadService } from '../download/forecast-download.service';
import { EmailService } from '../email/email.service';
import { ForecastSourceService } from '../forecast/forecast-source.service';
import { ImageAssemblerService } from '../render/image-assembler.service';
import { createWeatherCodeMapping, WEATHER_CODE_MAPPING } from '../render/icons/weather-code-mapping';
import { loadRenderSpec } from '../render/render-spec.loader';
import { RENDER_SPEC } from '../render/render-spec.types';
import { seedForDate } from '../render/seeded-random';
import { recordsFor, RENDER_SPEC_FILE } from '../../testing/fixtures';
import { addDays, todayIn } from '../utils/dates';
import { DataUnavailableError, ValidationWarning } from '../utils/errors';

describe('ForecastWorkflowService', () => {
  let outputDir: string;
  const download = { downloadAndConvert: jest.fn() };
  const source = { extract: jest.fn(), load: jest.fn() };
  const assembler = { render: jest.fn() };
  const email = { send: jest.fn() };

  async function createService(config: Record<string, unknown> = {}) {
    const module = await Test.createTestingModule({
      providers: [
        ForecastWorkflowService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            FORECAST_TIMEZONE: 'UTC',
            OUTPUT_DIR: outputDir,
            GRADIENT_SEED: 11,
            ...config,
          }),
        },
        { provide: ForecastDownloadService, useValue: download },
        { provide: ForecastSourceService, useValue: source },
        { provide: ImageAssemblerService, useValue: assembler },
        { provide: EmailService, useValue: email },
        { provide: RENDER_SPEC, useValue: loadRenderSpec(RENDER_SPEC_FILE, '/assets') },
        { provide: WEATHER_CODE_MAPPING, useValue: createWeatherCodeMapping('1250_clear', []) },
      ],
    }).compile();
    return module.get(ForecastWorkflowService);
  }

  function extracted(effectiveDate: string, warnings: ValidationWarning[] = []) {
    const records = recordsFor(effectiveDate).slice(0, 3);
    return {
      source: { path: '/data/isr_cities_utf8.xml', fromArchive: false },
      resolved: {
        requestedDate: '2025-10-15',
        effectiveDate,
        usedFallback: effectiveDate !== '2025-10-15',
        records,
        warnings,
      },
      forecast: { date: effectiveDate, records },
    };
  }

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'workflow-'));
    jest.resetAllMocks();
    download.downloadAndConvert.mockResolvedValue({
      success: true,
      attempts: 1,
      bytes: 2048,
      prunedArchives: 0,
    });
    source.extract.mockResolvedValue(extracted('2025-10-15'));
    assembler.render.mockResolvedValue({
      width: 1080,
      height: 1920,
      format: 'jpeg',
      data: Buffer.from('jpeg-bytes'),
      date: '2025-10-15',
      palette: { name: 'sky', stops: [] },
    });
    email.send.mockResolvedValue({
      sent: true,
      subject: 'subject',
      recipient: 'recipient@example.com',
      attachmentBytes: 10,
    });
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('downloads, extracts, renders and emails', async () => {
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.success).toBe(true);
    expect(result.steps.map((step) => [step.name, step.status])).toEqual([
      ['download', 'success'],
      ['extract', 'success'],
      ['render', 'success'],
      ['email', 'success'],
    ]);
    expect(result).toMatchObject({
      targetDate: '2025-10-15',
      effectiveDate: '2025-10-15',
      usedFallback: false,
      cityCount: 3,
      seed: 11,
      palette: 'sky',
      outputPath: join(outputDir, OUTPUT_FILE),
    });
    expect(download.downloadAndConvert).toHaveBeenCalledWith({ dryRun: false });
    expect(source.extract).toHaveBeenCalledWith('2025-10-15');
    expect(assembler.render).toHaveBeenCalledWith(expect.objectContaining({ seed: 11 }));
    expect(await readFile(join(outputDir, OUTPUT_FILE), 'utf8')).toBe('jpeg-bytes');
    expect(email.send).toHaveBeenCalledWith({
      imagePath: join(outputDir, OUTPUT_FILE),
      forecastDate: '2025-10-15',
      dryRun: false,
    });
    expect(service.getLastRun()).toBe(result);
  });

  it('labels the email with the effective date after a fallback', async () => {
    source.extract.mockResolvedValue(extracted('2025-10-16'));
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.usedFallback).toBe(true);
    expect(email.send).toHaveBeenCalledWith(
      expect.objectContaining({ forecastDate: '2025-10-16' }),
    );
  });

  it('continues with existing data when the download fails', async () => {
    download.downloadAndConvert.mockResolvedValue({
      success: false,
      attempts: 3,
      prunedArchives: 0,
      error: 'Failed to download forecast after 3 attempts',
    });
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.success).toBe(true);
    expect(result.steps[0]).toMatchObject({
      name: 'download',
      status: 'failed',
      message: 'Failed to download forecast after 3 attempts',
    });
  });

  it('stops when no forecast data is available', async () => {
    source.extract.mockRejectedValue(new DataUnavailableError('2025-10-15', ['2025-10-15']));
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.success).toBe(false);
    expect(result.error).toBe(
      'Extraction failed: No forecast records for 2025-10-15 or any later date (tried: 2025-10-15)',
    );
    expect(assembler.render).not.toHaveBeenCalled();
    expect(email.send).not.toHaveBeenCalled();
  });

  it('aborts on validation warnings when configured to', async () => {
    source.extract.mockResolvedValue(
      extracted('2025-10-15', [
        { kind: 'city-count', message: 'Expected 15 cities, found 3', expected: 15, actual: 3 },
      ]),
    );
    const service = await createService({ ABORT_ON_VALIDATION_WARNING: true });

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.success).toBe(false);
    expect(result.error).toBe(
      'Extraction failed: Aborting on 1 validation warning(s): Expected 15 cities, found 3',
    );
  });

  it('keeps warnings on a successful run', async () => {
    const warning: ValidationWarning = {
      kind: 'city-count',
      message: 'Expected 15 cities, found 3',
    };
    source.extract.mockResolvedValue(extracted('2025-10-15', [warning]));
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([warning]);
  });

  it('reports render failures without emailing', async () => {
    assembler.render.mockRejectedValue(new Error('icon missing'));
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.error).toBe('Image generation failed: icon missing');
    expect(result.steps.map((step) => step.status)).toEqual(['success', 'success', 'failed']);
    expect(email.send).not.toHaveBeenCalled();
  });

  it('reports email failures', async () => {
    email.send.mockRejectedValue(new Error('Invalid login'));
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15' });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Email delivery failed: Invalid login');
  });

  it('skips rendering in a dry run', async () => {
    const service = await createService();

    const result = await service.run({ targetDate: '2025-10-15', dryRun: true });

    expect(result.success).toBe(true);
    expect(result.steps[2]).toEqual({
      name: 'render',
      status: 'skipped',
      durationMs: 0,
      message: `Would render 3 cities to ${join(outputDir, OUTPUT_FILE)}`,
    });
    expect(assembler.render).not.toHaveBeenCalled();
    expect(email.send).toHaveBeenCalledWith(expect.objectContaining({ dryRun: true }));
  });

  it('rejects a malformed target date before downloading', async () => {
    const service = await createService();

    const result = await service.run({ targetDate: '2025-13-01' });

    expect(result.success).toBe(false);
    expect(result.error).toBe("Target date must be YYYY-MM-DD, got '2025-13-01'");
    expect(download.downloadAndConvert).not.toHaveBeenCalled();
  });

  describe('gradient test modes', () => {
    it('renders tomorrow', async () => {
      const service = await createService();

      const result = await service.run({ gradientTest: 'tomorrow' });

      expect(result.targetDate).toBe(addDays(todayIn('UTC'), 1));
    });

    it('picks a random date from the feed', async () => {
      source.load.mockResolvedValue({
        path: '/data/isr_cities_utf8.xml',
        fromArchive: false,
        document: { availableDates: ['2025-10-15', '2025-10-16'] },
      });
      const service = await createService();

      const result = await service.run({ gradientTest: 'random' });

      expect(['2025-10-15', '2025-10-16']).toContain(result.targetDate);
      expect(source.extract).toHaveBeenCalledWith(result.targetDate);
    });

    it('fails when the feed has no dates', async () => {
      source.load.mockResolvedValue({
        path: '/data/isr_cities_utf8.xml',
        fromArchive: false,
        document: { availableDates: [] },
      });
      const service = await createService();

      const result = await service.run({ gradientTest: 'random' });

      expect(result.error).toBe('No forecast dates available to pick from');
    });
  });

  describe('seedFor', () => {
    it('uses a fixed seed when configured', async () => {
      const service = await createService();

      expect(service.seedFor('2025-10-15')).toBe(11);
    });

    it('derives the seed from the date by default', async () => {
      const service = await createService({ GRADIENT_SEED: undefined });

      expect(service.seedFor('2025-10-15')).toBe(seedForDate('2025-10-15'));
    });
  });
});
