import { mkdir, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { IconCompositorService } from './icon-compositor.service';
import { createWeatherCodeMapping } from './weather-code-mapping';
import { Canvas } from '../canvas';
import { writePng } from '../../../testing/images';
import { AssetMissingError } from '../../utils/errors';

describe('IconCompositorService', () => {
  const service = new IconCompositorService();
  const mapping = createWeatherCodeMapping('1250_clear', [
    [1220, '1220_partly_cloudy'],
    [1250, '1250_clear'],
  ]);
  let iconsDir: string;

  beforeEach(async () => {
    iconsDir = await mkdtemp(join(tmpdir(), 'icons-'));
    await mkdir(iconsDir, { recursive: true });
    await writePng(join(iconsDir, '1250_clear.png'), 128, 128, {
      r: 255,
      g: 200,
      b: 0,
      alpha: 1,
    });
  });

  afterEach(async () => {
    await rm(iconsDir, { recursive: true, force: true });
  });

  it('maps known codes to their icon', () => {
    expect(service.resolveIconId(1220, mapping)).toBe('1220_partly_cloudy');
  });

  it('falls back for unknown codes', () => {
    expect(service.resolveIconId(9999, mapping)).toBe('1250_clear');
  });

  it('scales icons to the configured size with alpha', async () => {
    const icon = await service.load('1250_clear', iconsDir, 65);
    const metadata = await sharp(icon).metadata();

    expect(metadata.format).toBe('png');
    expect([metadata.width, metadata.height]).toEqual([65, 65]);
    expect(metadata.channels).toBe(4);
  });

  it('fails on a missing icon file', async () => {
    const path = join(iconsDir, '1220_partly_cloudy.png');

    await expect(service.load('1220_partly_cloudy', iconsDir, 65)).rejects.toThrow(
      AssetMissingError,
    );
    await expect(service.load('1220_partly_cloudy', iconsDir, 65)).rejects.toThrow(
      `Could not load icon asset: ${path}`,
    );
    await expect(service.load('1220_partly_cloudy', iconsDir, 65)).rejects.toMatchObject({
      code: 'ASSET_MISSING',
      kind: 'icon',
      path,
    });
  });

  it('composites onto the canvas at the given position', async () => {
    const canvas = new Canvas(100, 100, Buffer.alloc(100 * 100 * 3));
    const icon = await service.load('1250_clear', iconsDir, 10);

    service.composite(canvas, icon, 20, 30);

    const raw = await canvas.toRaw();
    const at = (x: number, y: number) => [...raw.subarray((y * 100 + x) * 3, (y * 100 + x) * 3 + 3)];
    expect(at(25, 35)).toEqual([255, 200, 0]);
    expect(at(19, 35)).toEqual([0, 0, 0]);
  });

  it('lists icons the mapping needs but the directory lacks', async () => {
    expect(await service.findMissingIcons(mapping, iconsDir)).toEqual(['1220_partly_cloudy']);
  });
});
