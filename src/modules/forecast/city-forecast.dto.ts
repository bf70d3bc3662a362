import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';

/**
 * One location/date entry as read from the forecast XML, before it becomes a
 * ForecastRecord. Numeric fields arrive as strings and are converted here.
 */
export class CityForecastDto {
  @IsString()
  @IsNotEmpty()
  cityId!: string;

  @IsString()
  @IsNotEmpty()
  nameLatin!: string;

  @IsString()
  @IsNotEmpty()
  nameHebrew!: string;

  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude!: number;

  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  date!: string;

  @Type(() => Number)
  @IsNumber()
  maxTemperature!: number;

  @Type(() => Number)
  @IsNumber()
  minTemperature!: number;

  @Type(() => Number)
  @IsInt()
  weatherCode!: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  maxHumidity?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  minHumidity?: number;

  @IsOptional()
  @IsString()
  wind?: string;
}
