import { Injectable, Logger } from '@nestjs/common';
import { ForecastDataset, ForecastRecord, ResolvedForecast } from './forecast.types';
import { DataUnavailableError, ValidationWarning } from '../utils/errors';
import { isIsoDate } from '../utils/dates';

@Injectable()
export class ForecastDateResolverService {
  private readonly logger = new Logger(ForecastDateResolverService.name);

  /**
   * Pick the date to render. The requested date wins if it has any records;
   * otherwise the later dates present in the dataset are tried in chronological
   * order. A count mismatch against `expectedCityCount` is reported as a warning,
   * never thrown - the caller decides whether a partial set is acceptable.
   */
  resolve(
    dataset: ForecastDataset,
    requestedDate: string,
    expectedCityCount: number,
  ): ResolvedForecast {
    if (!isIsoDate(requestedDate)) {
      throw new RangeError(`Requested date must be YYYY-MM-DD, got '${requestedDate}'`);
    }

    const candidates = [
      requestedDate,
      ...[...dataset.keys()]
        .filter((date) => date > requestedDate)
        .sort(),
    ];
    const tried: string[] = [];

    for (const date of candidates) {
      tried.push(date);
      const records = dataset.get(date) ?? [];

      if (records.length === 0) {
        this.logger.warn(`No forecast records for ${date}`);
        continue;
      }

      const usedFallback = date !== requestedDate;
      if (usedFallback) {
        this.logger.warn(
          `Using forecast date ${date} instead of requested ${requestedDate}`,
        );
      } else {
        this.logger.log(`Using requested forecast date ${date}`);
      }

      const { unique, warnings } = this.dropDuplicateCities(records);
      if (unique.length !== expectedCityCount) {
        const message = `City count mismatch for ${date}: expected ${expectedCityCount}, got ${unique.length}`;
        this.logger.warn(message);
        warnings.push({
          kind: 'city-count',
          message,
          expected: expectedCityCount,
          actual: unique.length,
        });
      }

      return {
        requestedDate,
        effectiveDate: date,
        usedFallback,
        records: unique,
        warnings,
      };
    }

    throw new DataUnavailableError(requestedDate, tried);
  }

  private dropDuplicateCities(records: readonly ForecastRecord[]): {
    unique: ForecastRecord[];
    warnings: ValidationWarning[];
  } {
    const seen = new Set<string>();
    const unique: ForecastRecord[] = [];
    const warnings: ValidationWarning[] = [];

    for (const record of records) {
      if (seen.has(record.cityId)) {
        warnings.push({
          kind: 'duplicate-city',
          message: `Duplicate record for city ${record.cityId} on ${record.date} dropped`,
          cityId: record.cityId,
        });
        continue;
      }
      seen.add(record.cityId);
      unique.push(record);
    }

    return { unique, warnings };
  }
}
