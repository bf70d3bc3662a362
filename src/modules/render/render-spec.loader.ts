import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { RenderSpecDto, TextRoleDto } from './render-spec.dto';
import { RenderSpec, TextRoleSpec } from './render-spec.types';
import { parseHexColor, parseRgb } from './colors';
import { ConfigurationError, describeError } from '../utils/errors';

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function toTextRole(dto: TextRoleDto): TextRoleSpec {
  const { weight, width, slant, italic, opticalSize } = dto.axes;
  return {
    size: dto.size,
    axes: { weight, width, slant, italic, opticalSize },
    color: parseRgb(dto.color),
  };
}

/**
 * Validate a plain render spec object and build the frozen RenderSpec.
 * Relative asset paths are resolved against `assetsDir`.
 */
export function createRenderSpec(plain: object, assetsDir: string): RenderSpec {
  const dto = plainToInstance(RenderSpecDto, plain);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid render spec:\n${flattenErrors(errors).join('\n')}`,
    );
  }

  if (dto.rows.minCount > dto.rows.maxCount) {
    throw new ConfigurationError(
      `Invalid render spec: rows.minCount (${dto.rows.minCount}) exceeds rows.maxCount (${dto.rows.maxCount})`,
    );
  }

  const rowsHeight = dto.rows.maxCount * dto.rows.height;
  if (dto.header.height + rowsHeight > dto.canvas.height) {
    throw new ConfigurationError(
      `Invalid render spec: ${dto.rows.maxCount} rows of ${dto.rows.height}px do not fit below the header`,
    );
  }

  const asset = (path: string) => (isAbsolute(path) ? path : resolve(assetsDir, path));

  return deepFreeze<RenderSpec>({
    canvas: { width: dto.canvas.width, height: dto.canvas.height },
    header: { height: dto.header.height, color: parseRgb(dto.header.color) },
    rows: {
      height: dto.rows.height,
      minCount: dto.rows.minCount,
      maxCount: dto.rows.maxCount,
      separatorColor: parseHexColor(dto.rows.separatorColor),
      separatorThickness: dto.rows.separatorThickness,
    },
    padding: dto.padding,
    spacing: dto.spacing,
    nameColumnWidth: dto.nameColumnWidth,
    iconSize: dto.iconSize,
    iconsDir: asset(dto.iconsDir),
    logo: {
      path: asset(dto.logo.path),
      height: dto.logo.height,
      marginTop: dto.logo.marginTop,
    },
    fonts: {
      file: asset(dto.fonts.file),
      cityName: toTextRole(dto.fonts.cityName),
      temperature: toTextRole(dto.fonts.temperature),
      date: toTextRole(dto.fonts.date),
    },
    palettes: dto.palettes.map((palette) => ({
      name: palette.name,
      stops: palette.stops.map(parseRgb),
    })),
    jpegQuality: dto.jpegQuality,
  });
}

export function loadRenderSpec(file: string, assetsDir: string): RenderSpec {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read render spec ${file}: ${describeError(error)}`,
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Render spec ${file} must contain a JSON object`);
  }
  return createRenderSpec(parsed, assetsDir);
}
