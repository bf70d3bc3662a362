import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { ForecastXmlParserService } from './forecast-xml-parser.service';
import { ForecastDateResolverService } from './forecast-date-resolver.service';
import { GeographicSorterService } from './geographic-sorter.service';
import {
  CityForecastSet,
  ParsedForecastDocument,
  ResolvedForecast,
} from './forecast.types';
import { ForecastArchiveService } from '../download/forecast-archive.service';
import { CURRENT_FORECAST_FILE } from '../download/forecast-download.service';
import { describeError, ForecastSourceError, isNotFoundError } from '../utils/errors';

export interface LoadedForecastDocument {
  path: string;
  fromArchive: boolean;
  document: ParsedForecastDocument;
}

export interface ExtractedForecast {
  source: LoadedForecastDocument;
  resolved: ResolvedForecast;
  forecast: CityForecastSet;
}

/**
 * Reads the stored forecast XML (current copy first, newest archive second)
 * and turns it into the ordered city set for a target date.
 */
@Injectable()
export class ForecastSourceService {
  private readonly logger = new Logger(ForecastSourceService.name);
  private readonly currentPath: string;
  private readonly expectedCityCount: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly parser: ForecastXmlParserService,
    private readonly dateResolver: ForecastDateResolverService,
    private readonly sorter: GeographicSorterService,
    private readonly archiveService: ForecastArchiveService,
  ) {
    this.currentPath = join(
      resolve(this.configService.get<string>('DATA_DIR', 'data')),
      CURRENT_FORECAST_FILE,
    );
    this.expectedCityCount = this.configService.get<number>(
      'EXPECTED_CITY_COUNT',
      15,
    );
  }

  async load(): Promise<LoadedForecastDocument> {
    const current = await this.readIfPresent(this.currentPath);
    if (current === null) {
      this.logger.warn(
        `Current forecast ${this.currentPath} not found, trying the archive`,
      );
    } else {
      try {
        return {
          path: this.currentPath,
          fromArchive: false,
          document: this.parser.parse(current),
        };
      } catch (error) {
        if (!(error instanceof ForecastSourceError)) throw error;
        this.logger.warn(`${error.message}, trying the archive`);
      }
    }

    const latest = await this.archiveService.findLatest();
    if (!latest) {
      throw new ForecastSourceError(
        `No forecast XML available: ${this.currentPath} is missing and the archive is empty`,
      );
    }

    const archived = await this.readIfPresent(latest.path);
    if (archived === null) {
      throw new ForecastSourceError(`Archived forecast ${latest.path} disappeared`);
    }

    this.logger.log(`Using archived forecast from ${latest.date}`);
    return {
      path: latest.path,
      fromArchive: true,
      document: this.parser.parse(archived),
    };
  }

  async extract(targetDate: string): Promise<ExtractedForecast> {
    const source = await this.load();
    if (source.document.skipped.length > 0) {
      this.logger.warn(
        `${source.document.skipped.length} forecast entries were skipped during parsing`,
      );
    }

    const resolved = this.dateResolver.resolve(
      source.document.dataset,
      targetDate,
      this.expectedCityCount,
    );
    const forecast = this.sorter.toCityForecastSet(
      resolved.effectiveDate,
      resolved.records,
    );

    this.logger.log(
      `Extracted ${forecast.records.length} cities for ${forecast.date}`,
    );
    return { source, resolved, forecast };
  }

  private async readIfPresent(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw new ForecastSourceError(
        `Failed to read ${path}: ${describeError(error)}`,
        error,
      );
    }
  }
}
