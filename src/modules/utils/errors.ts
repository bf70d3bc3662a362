/**
 * Error taxonomy for the forecast pipeline.
 *
 * Every fatal condition carries a stable `code` so callers (the workflow, the CLI)
 * can branch on it without matching messages. Non-fatal findings are returned as
 * `ValidationWarning` data instead of being thrown.
 */

export type ForecastErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'ASSET_MISSING'
  | 'UNSUPPORTED_AXIS'
  | 'ENCODING_FAILURE'
  | 'INVALID_LAYOUT'
  | 'SOURCE_UNAVAILABLE'
  | 'INVALID_CONFIGURATION';

export abstract class ForecastImageError extends Error {
  abstract readonly code: ForecastErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DataUnavailableError extends ForecastImageError {
  readonly code = 'DATA_UNAVAILABLE';

  constructor(
    readonly requestedDate: string,
    readonly triedDates: readonly string[],
  ) {
    super(
      `No forecast records for ${requestedDate} or any later date (tried: ${
        triedDates.length > 0 ? triedDates.join(', ') : 'none'
      })`,
    );
  }
}

export type AssetKind = 'font' | 'icon' | 'logo' | 'template' | 'image';

export class AssetMissingError extends ForecastImageError {
  readonly code = 'ASSET_MISSING';

  constructor(
    readonly kind: AssetKind,
    readonly path: string,
    cause?: unknown,
  ) {
    super(`Could not load ${kind} asset: ${path}`, { cause });
  }
}

export class UnsupportedAxisError extends ForecastImageError {
  readonly code = 'UNSUPPORTED_AXIS';

  constructor(
    readonly fontFile: string,
    readonly axis: string,
    readonly availableAxes: readonly string[],
  ) {
    super(
      `Font ${fontFile} has no '${axis}' axis (available: ${
        availableAxes.length > 0 ? availableAxes.join(', ') : 'none'
      })`,
    );
  }
}

export class EncodingFailureError extends ForecastImageError {
  readonly code = 'ENCODING_FAILURE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class LayoutError extends ForecastImageError {
  readonly code = 'INVALID_LAYOUT';
}

export class ForecastSourceError extends ForecastImageError {
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class ConfigurationError extends ForecastImageError {
  readonly code = 'INVALID_CONFIGURATION';
}

export type ValidationWarningKind = 'city-count' | 'duplicate-city';

export interface ValidationWarning {
  kind: ValidationWarningKind;
  message: string;
  expected?: number;
  actual?: number;
  cityId?: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// fs errors raised in another realm (Jest's sandbox) fail `instanceof Error`
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}
