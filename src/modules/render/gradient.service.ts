import { Injectable, Logger } from '@nestjs/common';
import { createRandom } from './seeded-random';
import { GradientPalette, RenderSpec, RgbColor } from './render-spec.types';
import { ConfigurationError } from '../utils/errors';

export interface GradientRaster {
  palette: GradientPalette;
  width: number;
  height: number;
  /** Raw RGB, 3 bytes per pixel, row-major */
  raw: Buffer;
}

@Injectable()
export class GradientService {
  private readonly logger = new Logger(GradientService.name);

  pickPalette(palettes: readonly GradientPalette[], seed: number): GradientPalette {
    if (palettes.length === 0) {
      throw new ConfigurationError('No gradient palettes configured');
    }
    const random = createRandom(seed);
    return palettes[Math.floor(random() * palettes.length)];
  }

  /**
   * Full-canvas vertical gradient from a palette picked with `seed`.
   * The same seed and render spec always give the same raster.
   */
  synthesize(spec: RenderSpec, seed: number): GradientRaster {
    const palette = this.pickPalette(spec.palettes, seed);
    const { width, height } = spec.canvas;
    this.logger.log(`Gradient palette '${palette.name}' (seed ${seed})`);

    const raw = Buffer.alloc(width * height * 3);
    const rowBytes = width * 3;
    const line = Buffer.alloc(rowBytes);

    for (let y = 0; y < height; y++) {
      const [r, g, b] = this.colorAt(palette.stops, height > 1 ? y / (height - 1) : 0);
      for (let x = 0; x < rowBytes; x += 3) {
        line[x] = r;
        line[x + 1] = g;
        line[x + 2] = b;
      }
      line.copy(raw, y * rowBytes);
    }

    return { palette, width, height, raw };
  }

  /** Color at position t (0 = top, 1 = bottom) across evenly spaced stops */
  colorAt(stops: readonly RgbColor[], t: number): RgbColor {
    if (stops.length === 1) return stops[0];

    const position = Math.min(1, Math.max(0, t)) * (stops.length - 1);
    const index = Math.min(Math.floor(position), stops.length - 2);
    const fraction = position - index;
    const from = stops[index];
    const to = stops[index + 1];

    return [
      Math.round(from[0] + (to[0] - from[0]) * fraction),
      Math.round(from[1] + (to[1] - from[1]) * fraction),
      Math.round(from[2] + (to[2] - from[2]) * fraction),
    ];
  }
}
