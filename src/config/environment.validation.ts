import { plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const TEXT_SHAPING_MODES = ['auto', 'native', 'pre-shaped'] as const;
export type TextShapingMode = (typeof TEXT_SHAPING_MODES)[number];

export const GRADIENT_SEED_POLICIES = ['date', 'random'] as const;
export type GradientSeedPolicy = (typeof GRADIENT_SEED_POLICIES)[number];

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  LOG_LEVEL: string = 'log';

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsUrl({ require_tld: false })
  FORECAST_URL: string =
    'https://ims.gov.il/sites/default/files/ims_data/xml_files/isr_cities.xml';

  @IsOptional()
  @IsInt()
  @Min(1000)
  DOWNLOAD_TIMEOUT_MS: number = 30000;

  @IsOptional()
  @IsInt()
  @Min(1)
  DOWNLOAD_MAX_RETRIES: number = 3;

  @IsOptional()
  @IsInt()
  @Min(0)
  DOWNLOAD_RETRY_DELAY_MS: number = 2000;

  @IsOptional()
  @IsString()
  DATA_DIR: string = 'data';

  @IsOptional()
  @IsString()
  ARCHIVE_DIR: string = 'archive';

  @IsOptional()
  @IsString()
  OUTPUT_DIR: string = 'output';

  @IsOptional()
  @IsInt()
  @Min(1)
  ARCHIVE_RETENTION_DAYS: number = 14;

  @IsOptional()
  @IsInt()
  @Min(1)
  EXPECTED_CITY_COUNT: number = 15;

  @IsOptional()
  @IsBoolean()
  ABORT_ON_VALIDATION_WARNING: boolean = false;

  @IsOptional()
  @IsString()
  RENDER_SPEC_FILE: string = 'config/render-spec.json';

  @IsOptional()
  @IsString()
  WEATHER_CODES_FILE: string = 'config/weather-codes.json';

  @IsOptional()
  @IsString()
  ASSETS_DIR: string = 'assets';

  @IsOptional()
  @IsIn(TEXT_SHAPING_MODES)
  TEXT_SHAPING: TextShapingMode = 'auto';

  @IsOptional()
  @IsIn(GRADIENT_SEED_POLICIES)
  GRADIENT_SEED_POLICY: GradientSeedPolicy = 'date';

  @IsOptional()
  @IsInt()
  GRADIENT_SEED?: number;

  @IsOptional()
  @IsString()
  FORECAST_TIMEZONE: string = 'Asia/Jerusalem';

  @IsOptional()
  @IsString()
  EMAIL_TEMPLATE_FILE: string = 'templates/email.html';

  // Delivery settings are checked when an email is sent, not at startup
  @IsOptional()
  @IsEmail()
  EMAIL_ADDRESS?: string;

  @IsOptional()
  @IsString()
  EMAIL_PASSWORD?: string;

  @IsOptional()
  @IsEmail()
  RECIPIENT_EMAIL?: string;

  @IsOptional()
  @IsString()
  SMTP_SERVER?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  SMTP_PORT?: number;
}

function toBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no', ''].includes(normalized)) return false;
  return value;
}

/**
 * `validate` hook for ConfigModule: converts the raw environment into typed
 * values (the returned object becomes the config ConfigService reads from).
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const raw = { ...config };
  if (raw.ABORT_ON_VALIDATION_WARNING !== undefined) {
    raw.ABORT_ON_VALIDATION_WARNING = toBoolean(raw.ABORT_ON_VALIDATION_WARNING);
  }

  const validated = plainToInstance(EnvironmentVariables, raw, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join('; '))
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return validated;
}
