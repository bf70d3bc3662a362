import { readFileSync } from 'fs';
import { ConfigurationError, describeError } from '../../utils/errors';

export const WEATHER_CODE_MAPPING = Symbol('WEATHER_CODE_MAPPING');

export interface WeatherCodeMapping {
  readonly fallback: string;
  readonly icons: ReadonlyMap<number, string>;
}

export function createWeatherCodeMapping(
  fallback: string,
  icons: Iterable<readonly [number, string]>,
): WeatherCodeMapping {
  if (fallback.trim().length === 0) {
    throw new ConfigurationError('Weather code mapping needs a fallback icon id');
  }
  return Object.freeze({ fallback, icons: new Map(icons) });
}

/**
 * Load `{ "fallback": "<iconId>", "icons": { "<code>": "<iconId>" } }`
 */
export function loadWeatherCodeMapping(file: string): WeatherCodeMapping {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read weather code mapping ${file}: ${describeError(error)}`,
    );
  }

  if (typeof parsed !== 'object' || parsed === null || !('fallback' in parsed)) {
    throw new ConfigurationError(`Weather code mapping ${file} has no fallback entry`);
  }
  const { fallback } = parsed;
  if (typeof fallback !== 'string') {
    throw new ConfigurationError(`Weather code mapping ${file}: fallback must be a string`);
  }

  const icons: Array<[number, string]> = [];
  const table = 'icons' in parsed ? parsed.icons : {};
  if (typeof table !== 'object' || table === null) {
    throw new ConfigurationError(`Weather code mapping ${file}: icons must be an object`);
  }

  for (const [code, iconId] of Object.entries(table)) {
    const numeric = Number(code);
    if (!Number.isInteger(numeric) || typeof iconId !== 'string' || iconId.length === 0) {
      throw new ConfigurationError(
        `Weather code mapping ${file}: invalid entry '${code}'`,
      );
    }
    icons.push([numeric, iconId]);
  }

  return createWeatherCodeMapping(fallback, icons);
}
