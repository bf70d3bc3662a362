import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsHexColor,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class CanvasDto {
  @IsInt()
  @Min(1)
  width!: number;

  @IsInt()
  @Min(1)
  height!: number;
}

export class HeaderDto {
  @IsInt()
  @Min(0)
  height!: number;

  @IsHexColor()
  color!: string;
}

export class RowsDto {
  @IsInt()
  @Min(1)
  height!: number;

  @IsInt()
  @Min(1)
  minCount!: number;

  @IsInt()
  @Min(1)
  maxCount!: number;

  @IsHexColor()
  separatorColor!: string;

  @IsInt()
  @Min(1)
  separatorThickness!: number;
}

export class LogoDto {
  @IsString()
  @IsNotEmpty()
  path!: string;

  @IsInt()
  @Min(1)
  height!: number;

  @IsInt()
  @Min(0)
  marginTop!: number;
}

export class AxisValuesDto {
  @IsOptional()
  @IsNumber()
  weight?: number;

  @IsOptional()
  @IsNumber()
  width?: number;

  @IsOptional()
  @IsNumber()
  slant?: number;

  @IsOptional()
  @IsNumber()
  italic?: number;

  @IsOptional()
  @IsNumber()
  opticalSize?: number;
}

export class TextRoleDto {
  @IsNumber()
  @Min(1)
  size!: number;

  @ValidateNested()
  @Type(() => AxisValuesDto)
  axes!: AxisValuesDto;

  @IsHexColor()
  color!: string;
}

export class FontsDto {
  @IsString()
  @IsNotEmpty()
  file!: string;

  @ValidateNested()
  @Type(() => TextRoleDto)
  cityName!: TextRoleDto;

  @ValidateNested()
  @Type(() => TextRoleDto)
  temperature!: TextRoleDto;

  @ValidateNested()
  @Type(() => TextRoleDto)
  date!: TextRoleDto;
}

export class PaletteDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsArray()
  @ArrayMinSize(2)
  @IsHexColor({ each: true })
  stops!: string[];
}

export class RenderSpecDto {
  @ValidateNested()
  @Type(() => CanvasDto)
  canvas!: CanvasDto;

  @ValidateNested()
  @Type(() => HeaderDto)
  header!: HeaderDto;

  @ValidateNested()
  @Type(() => RowsDto)
  rows!: RowsDto;

  @IsInt()
  @Min(0)
  padding!: number;

  @IsInt()
  @Min(0)
  spacing!: number;

  @IsInt()
  @Min(0)
  nameColumnWidth!: number;

  @IsInt()
  @Min(1)
  iconSize!: number;

  @IsString()
  @IsNotEmpty()
  iconsDir!: string;

  @ValidateNested()
  @Type(() => LogoDto)
  logo!: LogoDto;

  @ValidateNested()
  @Type(() => FontsDto)
  fonts!: FontsDto;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => PaletteDto)
  palettes!: PaletteDto[];

  @IsInt()
  @Min(1)
  @Max(100)
  jpegQuality!: number;
}
