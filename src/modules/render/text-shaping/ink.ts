import sharp from 'sharp';
import { RenderedText } from './text-shaping.strategy';

/**
 * Rasterises a text image cropped to the pixels its glyphs cover, so every
 * strategy hands the assembler the same box for the same glyphs. Blank text
 * has no ink and keeps its raster as is.
 */
export async function rasterizeToInk(image: sharp.Sharp, text: string): Promise<RenderedText> {
  const pipeline = text.trim().length > 0 ? image.trim({ threshold: 0 }) : image;
  const { data, info } = await pipeline.png().toBuffer({ resolveWithObject: true });
  return { input: data, width: info.width, height: info.height };
}
