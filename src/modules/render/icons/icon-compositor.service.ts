import { Injectable, Logger } from '@nestjs/common';
import { access } from 'fs/promises';
import { join } from 'path';
import sharp from 'sharp';
import { WeatherCodeMapping } from './weather-code-mapping';
import { Canvas } from '../canvas';
import { AssetMissingError } from '../../utils/errors';

@Injectable()
export class IconCompositorService {
  private readonly logger = new Logger(IconCompositorService.name);

  resolveIconId(weatherCode: number, mapping: WeatherCodeMapping): string {
    const iconId = mapping.icons.get(weatherCode);
    if (iconId !== undefined) return iconId;

    this.logger.warn(
      `No icon for weather code ${weatherCode}, using ${mapping.fallback}`,
    );
    return mapping.fallback;
  }

  iconPath(iconId: string, iconsDir: string): string {
    return join(iconsDir, `${iconId}.png`);
  }

  /**
   * Load an icon as RGBA and scale it to `size` x `size` with Lanczos-3
   */
  async load(iconId: string, iconsDir: string, size: number): Promise<Buffer> {
    const path = this.iconPath(iconId, iconsDir);
    try {
      return await sharp(path)
        .ensureAlpha()
        .resize(size, size, { kernel: sharp.kernel.lanczos3, fit: 'fill' })
        .png()
        .toBuffer();
    } catch (error) {
      throw new AssetMissingError('icon', path, error);
    }
  }

  composite(canvas: Canvas, icon: Buffer, x: number, y: number): void {
    canvas.draw(icon, x, y);
  }

  /**
   * Icon ids referenced by the mapping (fallback included) whose files are missing
   */
  async findMissingIcons(
    mapping: WeatherCodeMapping,
    iconsDir: string,
  ): Promise<string[]> {
    const iconIds = new Set([mapping.fallback, ...mapping.icons.values()]);
    const missing: string[] = [];
    for (const iconId of iconIds) {
      try {
        await access(this.iconPath(iconId, iconsDir));
      } catch {
        missing.push(iconId);
      }
    }
    return missing;
  }
}
