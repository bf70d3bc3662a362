import { readFileSync } from 'fs';
import { join } from 'path';
import { createForecastRecord, ForecastRecord } from '../modules/forecast/forecast.types';

export const FIXTURES_DIR = join(__dirname, '..', '..', 'test', 'fixtures');
export const CONFIG_DIR = join(__dirname, '..', '..', 'config');

/** Two Hebrew glyphs (alef, bet) with `wght` then `wdth` axes; bet widens at full weight */
export const VARIABLE_FONT_FILE = join(FIXTURES_DIR, 'FixtureSans-Variable.ttf');

export interface CityFixture {
  cityId: string;
  latin: string;
  hebrew: string;
  latitude: number;
  longitude: number;
}

function isCityFixture(value: unknown): value is CityFixture {
  return (
    typeof value === 'object' &&
    value !== null &&
    'cityId' in value &&
    typeof value.cityId === 'string' &&
    'latin' in value &&
    typeof value.latin === 'string' &&
    'hebrew' in value &&
    typeof value.hebrew === 'string' &&
    'latitude' in value &&
    typeof value.latitude === 'number' &&
    'longitude' in value &&
    typeof value.longitude === 'number'
  );
}

/** The fifteen forecast cities, deliberately not in latitude order */
export function loadCities(): CityFixture[] {
  const parsed: unknown = JSON.parse(
    readFileSync(join(FIXTURES_DIR, 'cities.json'), 'utf8'),
  );
  if (!Array.isArray(parsed) || !parsed.every(isCityFixture)) {
    throw new Error('cities.json fixture is malformed');
  }
  return parsed;
}

export function readFixture(name: string): string {
  return readFileSync(join(FIXTURES_DIR, name), 'utf8');
}

export function makeRecord(
  city: CityFixture,
  date: string,
  overrides: Partial<ForecastRecord> = {},
): ForecastRecord {
  return createForecastRecord({
    cityId: city.cityId,
    name: { latin: city.latin, hebrew: city.hebrew },
    latitude: city.latitude,
    longitude: city.longitude,
    date,
    maxTemperature: 28,
    minTemperature: 18,
    weatherCode: 1250,
    ...overrides,
  });
}

export function recordsFor(date: string, cities: CityFixture[] = loadCities()): ForecastRecord[] {
  return cities.map((city) => makeRecord(city, date));
}

export const RENDER_SPEC_FILE = join(CONFIG_DIR, 'render-spec.json');

/** render-spec.json as a plain object, for tests that alter one field */
export function readRenderSpecJson(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(RENDER_SPEC_FILE, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('render-spec.json is not an object');
  }
  return { ...parsed };
}
