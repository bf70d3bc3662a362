import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { FontAxisService } from './fonts/font-axis.service';
import { FONT_SOURCE } from './fonts/font.types';
import { FontkitFontSource } from './fonts/fontkit-font.source';
import { GradientService } from './gradient.service';
import { IconCompositorService } from './icons/icon-compositor.service';
import {
  loadWeatherCodeMapping,
  WEATHER_CODE_MAPPING,
} from './icons/weather-code-mapping';
import { ImageAssemblerService } from './image-assembler.service';
import { LayoutService } from './layout.service';
import { loadRenderSpec } from './render-spec.loader';
import { RENDER_SPEC } from './render-spec.types';
import { createTextShapingStrategy } from './text-shaping/text-shaping.factory';
import { TEXT_SHAPING_STRATEGY } from './text-shaping/text-shaping.strategy';
import { TextShapingMode } from '../../config/environment.validation';

@Module({
  providers: [
    LayoutService,
    GradientService,
    IconCompositorService,
    FontAxisService,
    ImageAssemblerService,
    {
      provide: FONT_SOURCE,
      useClass: FontkitFontSource,
    },
    {
      provide: TEXT_SHAPING_STRATEGY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createTextShapingStrategy(
          configService.get<TextShapingMode>('TEXT_SHAPING', 'auto'),
        ),
    },
    {
      provide: RENDER_SPEC,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        loadRenderSpec(
          resolve(configService.get<string>('RENDER_SPEC_FILE', 'config/render-spec.json')),
          resolve(configService.get<string>('ASSETS_DIR', 'assets')),
        ),
    },
    {
      provide: WEATHER_CODE_MAPPING,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        loadWeatherCodeMapping(
          resolve(
            configService.get<string>('WEATHER_CODES_FILE', 'config/weather-codes.json'),
          ),
        ),
    },
  ],
  exports: [
    ImageAssemblerService,
    IconCompositorService,
    GradientService,
    RENDER_SPEC,
    WEATHER_CODE_MAPPING,
    TEXT_SHAPING_STRATEGY,
  ],
})
export class RenderModule {}
