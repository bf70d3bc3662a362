import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AxisRequests,
  FONT_SOURCE,
  FontAxisInfo,
  FontSource,
  FontVariation,
  LoadedFont,
  SEMANTIC_AXIS_TAGS,
  SemanticAxis,
} from './font.types';
import { UnsupportedAxisError } from '../../utils/errors';

function isSemanticAxis(name: string): name is SemanticAxis {
  return Object.prototype.hasOwnProperty.call(SEMANTIC_AXIS_TAGS, name);
}

/**
 * Applies semantic axis values (weight, width, ...) to variable fonts.
 * Axis order is read from each font file the first time it is used; nothing
 * assumes two font families share an order.
 */
@Injectable()
export class FontAxisService {
  private readonly logger = new Logger(FontAxisService.name);
  private readonly fonts = new Map<string, LoadedFont>();

  constructor(@Inject(FONT_SOURCE) private readonly fontSource: FontSource) {}

  discover(file: string): readonly FontAxisInfo[] {
    return this.load(file).axes;
  }

  resolve(file: string, requests: AxisRequests): FontVariation {
    const font = this.load(file);
    const requested = new Map<string, number>();

    for (const [name, value] of Object.entries(requests)) {
      if (value === undefined || !isSemanticAxis(name)) continue;
      const tag = SEMANTIC_AXIS_TAGS[name];
      const axis = font.axes.find((candidate) => candidate.tag === tag);
      if (!axis) {
        throw new UnsupportedAxisError(
          file,
          tag,
          font.axes.map((candidate) => candidate.tag),
        );
      }
      requested.set(tag, this.clamp(file, axis, value));
    }

    const coordinates: number[] = [];
    const settings: Record<string, number> = {};
    for (const axis of font.axes) {
      const value = requested.get(axis.tag) ?? axis.default;
      coordinates.push(value);
      settings[axis.tag] = value;
    }

    return Object.freeze({
      file,
      familyName: font.familyName,
      axes: font.axes,
      coordinates: Object.freeze(coordinates),
      settings: Object.freeze(settings),
      font,
    });
  }

  private load(file: string): LoadedFont {
    const cached = this.fonts.get(file);
    if (cached) return cached;

    const font = this.fontSource.load(file);
    this.fonts.set(file, font);
    this.logger.debug(
      `Discovered axes for ${file}: ${
        font.axes.length > 0
          ? font.axes.map((axis) => `${axis.tag} ${axis.min}-${axis.max}`).join(', ')
          : 'none'
      }`,
    );
    return font;
  }

  private clamp(file: string, axis: FontAxisInfo, value: number): number {
    if (value >= axis.min && value <= axis.max) return value;

    const clamped = Math.min(axis.max, Math.max(axis.min, value));
    this.logger.warn(
      `Axis ${axis.tag}=${value} is outside ${axis.min}-${axis.max} for ${file}, using ${clamped}`,
    );
    return clamped;
  }
}
