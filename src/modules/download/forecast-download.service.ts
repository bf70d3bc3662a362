import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { ForecastArchiveService } from './forecast-archive.service';
import { todayIn } from '../utils/dates';
import { describeError } from '../utils/errors';

export const CURRENT_FORECAST_FILE = 'isr_cities_utf8.xml';

// The feed is published in Hebrew ISO-8859-8
const SOURCE_ENCODING = 'iso-8859-8';

export interface DownloadResult {
  success: boolean;
  attempts: number;
  bytes?: number;
  currentPath?: string;
  archivePath?: string;
  prunedArchives: number;
  error?: string;
}

@Injectable()
export class ForecastDownloadService {
  private readonly logger = new Logger(ForecastDownloadService.name);
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly timezone: string;
  readonly currentPath: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly archiveService: ForecastArchiveService,
  ) {
    this.url = this.configService.get<string>(
      'FORECAST_URL',
      'https://ims.gov.il/sites/default/files/ims_data/xml_files/isr_cities.xml',
    );
    this.timeoutMs = this.configService.get<number>('DOWNLOAD_TIMEOUT_MS', 30000);
    this.maxRetries = this.configService.get<number>('DOWNLOAD_MAX_RETRIES', 3);
    this.retryDelayMs = this.configService.get<number>(
      'DOWNLOAD_RETRY_DELAY_MS',
      2000,
    );
    this.timezone = this.configService.get<string>(
      'FORECAST_TIMEZONE',
      'Asia/Jerusalem',
    );
    this.currentPath = join(
      resolve(this.configService.get<string>('DATA_DIR', 'data')),
      CURRENT_FORECAST_FILE,
    );
  }

  /**
   * Download the feed, convert it to UTF-8, store the current copy plus a dated
   * archive copy and prune old archives. Failures are reported in the result.
   */
  async downloadAndConvert(options: { dryRun?: boolean } = {}): Promise<DownloadResult> {
    const dryRun = options.dryRun ?? false;
    const { data, attempts } = await this.fetchWithRetry();

    if (!data) {
      return {
        success: false,
        attempts,
        prunedArchives: 0,
        error: `Failed to download forecast after ${attempts} attempts`,
      };
    }

    let xml: string;
    try {
      xml = this.convertEncoding(data);
    } catch (error) {
      this.logger.error(`Encoding conversion failed: ${describeError(error)}`);
      return {
        success: false,
        attempts,
        bytes: data.length,
        prunedArchives: 0,
        error: `Encoding conversion failed: ${describeError(error)}`,
      };
    }

    try {
      await this.saveCurrent(xml, dryRun);
    } catch (error) {
      this.logger.error(
        `Failed to save XML to ${this.currentPath}: ${describeError(error)}`,
      );
      return {
        success: false,
        attempts,
        bytes: data.length,
        prunedArchives: 0,
        error: `Failed to save current XML: ${describeError(error)}`,
      };
    }

    let archivePath: string | undefined;
    try {
      archivePath = await this.archiveService.save(todayIn(this.timezone), xml, dryRun);
    } catch (error) {
      // The current copy is what extraction reads; a missing archive copy is tolerable
      this.logger.warn(`Failed to save archive copy: ${describeError(error)}`);
    }

    const prunedArchives = await this.archiveService.cleanup(new Date(), dryRun);

    return {
      success: true,
      attempts,
      bytes: data.length,
      currentPath: this.currentPath,
      archivePath,
      prunedArchives,
    };
  }

  /**
   * Decode the raw feed and point its XML declaration at UTF-8
   */
  convertEncoding(raw: Buffer): string {
    const text = new TextDecoder(SOURCE_ENCODING, { fatal: true }).decode(raw);
    return text.replace(/encoding=(["'])iso-8859-8\1/i, 'encoding="UTF-8"');
  }

  private async fetchWithRetry(): Promise<{ data: Buffer | null; attempts: number }> {
    this.logger.log(`Downloading forecast XML from ${this.url}`);

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await axios.get<ArrayBuffer>(this.url, {
          responseType: 'arraybuffer',
          timeout: this.timeoutMs,
        });
        const data = Buffer.from(response.data);
        this.logger.log(
          `Download successful (attempt ${attempt}/${this.maxRetries}, ${data.length} bytes)`,
        );
        return { data, attempts: attempt };
      } catch (error) {
        this.logger.error(
          `Attempt ${attempt}/${this.maxRetries}: ${this.describeRequestError(error)}`,
        );
      }

      if (attempt < this.maxRetries) {
        this.logger.log(`Retrying in ${this.retryDelayMs} ms...`);
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }

    return { data: null, attempts: this.maxRetries };
  }

  private describeRequestError(error: unknown): string {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return `Request timed out after ${this.timeoutMs} ms`;
      }
      if (error.response) {
        return `HTTP error ${error.response.status}`;
      }
      return `Connection error: ${error.message}`;
    }
    return `Request failed: ${describeError(error)}`;
  }

  private async saveCurrent(xml: string, dryRun: boolean): Promise<void> {
    if (dryRun) {
      this.logger.log(`[DRY RUN] Would save XML to ${this.currentPath}`);
      return;
    }
    await mkdir(dirname(this.currentPath), { recursive: true });
    await writeFile(this.currentPath, xml, 'utf8');
    this.logger.log(`Saved XML to ${this.currentPath} (${Buffer.byteLength(xml)} bytes)`);
  }
}
