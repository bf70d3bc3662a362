import sharp from 'sharp';
import { Canvas } from './canvas';

async function pixel(width: number, height: number, color: { r: number; g: number; b: number; alpha: number }) {
  return sharp({ create: { width, height, channels: 4, background: color } })
    .png()
    .toBuffer();
}

function solid(width: number, height: number, rgb: [number, number, number]): Buffer {
  const raw = Buffer.alloc(width * height * 3);
  for (let i = 0; i < raw.length; i += 3) {
    raw[i] = rgb[0];
    raw[i + 1] = rgb[1];
    raw[i + 2] = rgb[2];
  }
  return raw;
}

function at(raw: Buffer, width: number, x: number, y: number): number[] {
  const offset = (y * width + x) * 3;
  return [...raw.subarray(offset, offset + 3)];
}

describe('Canvas', () => {
  it('rejects a background of the wrong size', () => {
    expect(() => new Canvas(2, 2, Buffer.alloc(11))).toThrow(
      'Background has 11 bytes, expected 12 for 2x2 RGB',
    );
  });

  it('fills rectangles with opaque colors', async () => {
    const canvas = new Canvas(3, 2, solid(3, 2, [255, 0, 0]));

    canvas.fill({ left: 1, top: 0, width: 2, height: 1 }, [0, 0, 255]);
    const raw = await canvas.toRaw();

    expect(at(raw, 3, 0, 0)).toEqual([255, 0, 0]);
    expect(at(raw, 3, 1, 0)).toEqual([0, 0, 255]);
    expect(at(raw, 3, 2, 0)).toEqual([0, 0, 255]);
    expect(at(raw, 3, 1, 1)).toEqual([255, 0, 0]);
  });

  it('keeps the background under fully transparent fills and images', async () => {
    const canvas = new Canvas(2, 2, solid(2, 2, [10, 20, 30]));

    canvas.fill({ left: 0, top: 0, width: 2, height: 2 }, [255, 255, 255, 0]);
    canvas.draw(await pixel(2, 2, { r: 0, g: 0, b: 0, alpha: 0 }), 0, 0);
    const raw = await canvas.toRaw();

    expect(raw.equals(solid(2, 2, [10, 20, 30]))).toBe(true);
  });

  it('rounds positions to whole pixels', async () => {
    const canvas = new Canvas(3, 3, solid(3, 3, [0, 0, 0]));

    canvas.draw(await pixel(1, 1, { r: 0, g: 255, b: 0, alpha: 1 }), 1.4, 0.6);
    const raw = await canvas.toRaw();

    expect(at(raw, 3, 1, 1)).toEqual([0, 255, 0]);
    expect(at(raw, 3, 1, 0)).toEqual([0, 0, 0]);
  });

  it('skips empty rectangles', () => {
    const canvas = new Canvas(2, 2, solid(2, 2, [0, 0, 0]));

    canvas.fill({ left: 0, top: 0.2, width: 2, height: 0.2 }, [255, 255, 255]);

    expect(canvas.overlayCount).toBe(0);
  });

  it('encodes a JPEG of the canvas size', async () => {
    const canvas = new Canvas(8, 4, solid(8, 4, [200, 100, 50]));

    const data = await canvas.encode(90);
    const metadata = await sharp(data).metadata();

    expect(metadata.format).toBe('jpeg');
    expect([metadata.width, metadata.height]).toEqual([8, 4]);
  });
});
