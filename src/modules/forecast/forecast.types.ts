import { ValidationWarning } from '../utils/errors';

export interface CityName {
  latin: string;
  hebrew: string;
}

export interface HumidityRange {
  min: number;
  max: number;
}

/**
 * One city's forecast for one date. Instances are frozen on creation.
 */
export interface ForecastRecord {
  readonly cityId: string;
  readonly name: Readonly<CityName>;
  readonly latitude: number;
  readonly longitude: number;
  readonly date: string; // YYYY-MM-DD
  readonly maxTemperature: number;
  readonly minTemperature: number;
  readonly weatherCode: number;
  readonly humidity?: Readonly<HumidityRange>;
  readonly wind?: string;
}

/**
 * Parsed forecast data keyed by date (YYYY-MM-DD). A dataset usually covers
 * several consecutive days.
 */
export type ForecastDataset = ReadonlyMap<string, readonly ForecastRecord[]>;

/**
 * Records for a single effective date, one per city, ordered north to south
 */
export interface CityForecastSet {
  readonly date: string;
  readonly records: readonly ForecastRecord[];
}

export interface ResolvedForecast {
  requestedDate: string;
  effectiveDate: string;
  usedFallback: boolean;
  records: readonly ForecastRecord[];
  warnings: ValidationWarning[];
}

export interface ParsedForecastDocument {
  issuedAt: string | null;
  locationCount: number;
  availableDates: string[];
  dataset: ForecastDataset;
  /** Entries dropped during validation, as `<city>@<date>` */
  skipped: string[];
}

export function createForecastRecord(input: ForecastRecord): ForecastRecord {
  return Object.freeze({
    ...input,
    name: Object.freeze({ ...input.name }),
    ...(input.humidity ? { humidity: Object.freeze({ ...input.humidity }) } : {}),
  });
}
