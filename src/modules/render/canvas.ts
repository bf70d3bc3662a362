import sharp, { OverlayOptions } from 'sharp';
import { RgbaColor, RgbColor } from './render-spec.types';
import { EncodingFailureError } from '../utils/errors';

export interface Rect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Working canvas: an RGB background plus overlays composited in draw order.
 * Nothing is rasterised until `encode` or `toRaw`.
 */
export class Canvas {
  private readonly overlays: OverlayOptions[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
    private readonly background: Buffer,
  ) {
    if (background.length !== width * height * 3) {
      throw new RangeError(
        `Background has ${background.length} bytes, expected ${width * height * 3} for ${width}x${height} RGB`,
      );
    }
  }

  get overlayCount(): number {
    return this.overlays.length;
  }

  /** Alpha-over an encoded image (PNG, ...) with its top-left corner at (left, top) */
  draw(input: Buffer, left: number, top: number): void {
    this.overlays.push({
      input,
      left: Math.round(left),
      top: Math.round(top),
      blend: 'over',
    });
  }

  fill(rect: Rect, color: RgbColor | RgbaColor): void {
    const left = Math.round(rect.left);
    const top = Math.round(rect.top);
    const width = Math.round(rect.left + rect.width) - left;
    const height = Math.round(rect.top + rect.height) - top;
    if (width <= 0 || height <= 0) return;

    this.overlays.push({
      input: {
        create: {
          width,
          height,
          channels: 4,
          background: {
            r: color[0],
            g: color[1],
            b: color[2],
            alpha: color.length === 4 ? color[3] / 255 : 1,
          },
        },
      },
      left,
      top,
      blend: 'over',
    });
  }

  async encode(quality: number): Promise<Buffer> {
    try {
      return await this.composite().jpeg({ quality }).toBuffer();
    } catch (error) {
      throw new EncodingFailureError(
        `Failed to encode ${this.width}x${this.height} canvas as JPEG`,
        error,
      );
    }
  }

  /** Composited pixels as raw RGB */
  async toRaw(): Promise<Buffer> {
    return this.composite().removeAlpha().raw().toBuffer();
  }

  private composite(): sharp.Sharp {
    return sharp(this.background, {
      raw: { width: this.width, height: this.height, channels: 3 },
    }).composite(this.overlays);
  }
}
