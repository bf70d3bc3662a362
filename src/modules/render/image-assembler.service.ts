import { Inject, Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import { Canvas } from './canvas';
import { GradientService } from './gradient.service';
import { LayoutService } from './layout.service';
import { FontAxisService } from './fonts/font-axis.service';
import { FontVariation } from './fonts/font.types';
import { IconCompositorService } from './icons/icon-compositor.service';
import { WeatherCodeMapping } from './icons/weather-code-mapping';
import {
  RenderedText,
  TEXT_SHAPING_STRATEGY,
  TextDirection,
  TextShapingStrategy,
} from './text-shaping/text-shaping.strategy';
import { GradientPalette, RenderSpec, TextRoleSpec } from './render-spec.types';
import { CityForecastSet } from '../forecast/forecast.types';
import { AssetMissingError } from '../utils/errors';
import { formatDisplayDate } from '../utils/dates';

export interface RenderRequest {
  forecast: CityForecastSet;
  spec: RenderSpec;
  mapping: WeatherCodeMapping;
  seed: number;
}

export interface RenderedImage {
  readonly width: number;
  readonly height: number;
  readonly format: 'jpeg';
  readonly data: Buffer;
  readonly date: string;
  readonly palette: GradientPalette;
}

interface RoleFonts {
  cityName: FontVariation;
  temperature: FontVariation;
  date: FontVariation;
}

export function formatTemperatureRange(min: number, max: number): string {
  return `${min}-${max}°C`;
}

/**
 * Composes the forecast image: gradient, header, then one row per city in
 * the order given, then JPEG encoding. Fonts, logo and icons are all loaded
 * before the first pixel is drawn, so a missing asset aborts with no output.
 */
@Injectable()
export class ImageAssemblerService {
  private readonly logger = new Logger(ImageAssemblerService.name);

  constructor(
    private readonly layoutService: LayoutService,
    private readonly gradientService: GradientService,
    private readonly fontAxisService: FontAxisService,
    private readonly iconCompositor: IconCompositorService,
    @Inject(TEXT_SHAPING_STRATEGY)
    private readonly textShaping: TextShapingStrategy,
  ) {}

  async render({ forecast, spec, mapping, seed }: RenderRequest): Promise<RenderedImage> {
    const { records } = forecast;
    const layout = this.layoutService.compute(spec, records.length);

    const fonts: RoleFonts = {
      cityName: this.fontAxisService.resolve(spec.fonts.file, spec.fonts.cityName.axes),
      temperature: this.fontAxisService.resolve(
        spec.fonts.file,
        spec.fonts.temperature.axes,
      ),
      date: this.fontAxisService.resolve(spec.fonts.file, spec.fonts.date.axes),
    };
    const logo = await this.loadLogo(spec);
    const icons: Buffer[] = [];
    for (const record of records) {
      const iconId = this.iconCompositor.resolveIconId(record.weatherCode, mapping);
      icons.push(await this.iconCompositor.load(iconId, spec.iconsDir, spec.iconSize));
    }

    // 1. background
    const gradient = this.gradientService.synthesize(spec, seed);
    const canvas = new Canvas(gradient.width, gradient.height, gradient.raw);

    // 2. header
    canvas.fill(
      { left: 0, top: 0, width: layout.width, height: layout.header.height },
      spec.header.color,
    );
    canvas.draw(logo, layout.header.logoX, layout.header.logoY);

    const date = await this.renderText(
      formatDisplayDate(forecast.date),
      'ltr',
      fonts.date,
      spec.fonts.date,
    );
    canvas.draw(
      date.input,
      layout.header.dateRightX - date.width,
      layout.header.dateCenterY - date.height / 2,
    );

    // 3. rows
    for (const row of layout.rows) {
      const record = records[row.index];

      const separator = row.index > 0 ? layout.separators[row.index - 1] : undefined;
      if (separator) {
        canvas.fill(
          {
            left: separator.x1,
            top: separator.y,
            width: separator.x2 - separator.x1,
            height: spec.rows.separatorThickness,
          },
          spec.rows.separatorColor,
        );
      }

      this.iconCompositor.composite(canvas, icons[row.index], row.iconX, row.iconY);

      const temperature = await this.renderText(
        formatTemperatureRange(record.minTemperature, record.maxTemperature),
        'ltr',
        fonts.temperature,
        spec.fonts.temperature,
      );
      canvas.draw(
        temperature.input,
        row.temperatureCenterX - temperature.width / 2,
        row.centerY - temperature.height / 2,
      );

      const name = await this.renderText(
        record.name.hebrew,
        'rtl',
        fonts.cityName,
        spec.fonts.cityName,
      );
      canvas.draw(
        name.input,
        row.nameRightX - name.width,
        row.centerY - name.height / 2,
      );
    }

    // 4. encode
    const data = await canvas.encode(spec.jpegQuality);
    this.logger.log(
      `Rendered ${records.length} cities for ${forecast.date} (${data.length} bytes, ${this.textShaping.kind} text)`,
    );

    const image: RenderedImage = {
      width: layout.width,
      height: layout.height,
      format: 'jpeg',
      data,
      date: forecast.date,
      palette: gradient.palette,
    };
    return Object.freeze(image);
  }

  private renderText(
    text: string,
    direction: TextDirection,
    font: FontVariation,
    role: TextRoleSpec,
  ): Promise<RenderedText> {
    return this.textShaping.render({
      text,
      direction,
      font,
      size: role.size,
      color: role.color,
    });
  }

  private async loadLogo(spec: RenderSpec): Promise<Buffer> {
    try {
      return await sharp(spec.logo.path)
        .ensureAlpha()
        .resize({ height: spec.logo.height, kernel: sharp.kernel.lanczos3 })
        .png()
        .toBuffer();
    } catch (error) {
      throw new AssetMissingError('logo', spec.logo.path, error);
    }
  }
}
