import { Injectable } from '@nestjs/common';
import { CityForecastSet, ForecastRecord } from './forecast.types';

@Injectable()
export class GeographicSorterService {
  /**
   * Sort records north to south (latitude descending). The sort is stable, so
   * cities on the same latitude keep their input order; the input is not mutated.
   */
  sortByLatitude(records: readonly ForecastRecord[]): ForecastRecord[] {
    return [...records].sort((a, b) => b.latitude - a.latitude);
  }

  toCityForecastSet(
    date: string,
    records: readonly ForecastRecord[],
  ): CityForecastSet {
    return Object.freeze({
      date,
      records: Object.freeze(this.sortByLatitude(records)),
    });
  }
}
