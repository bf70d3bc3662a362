import sharp from 'sharp';
import {
  RenderedText,
  TextDirection,
  TextRenderRequest,
  TextShapingStrategy,
} from './text-shaping.strategy';
import { toVisualOrder } from './bidi';
import { rasterizeToInk } from './ink';
import { toHex } from '../colors';

function formatNumber(value: number): string {
  return Number(value.toFixed(4)).toString();
}

/**
 * Reorders text to visual order with the Unicode bidi algorithm, then draws
 * the glyph outlines left to right through an SVG rasterised by sharp.
 */
export class PreShapedStrategy implements TextShapingStrategy {
  readonly kind = 'pre-shaped';

  shape(text: string, direction: TextDirection): { text: string } {
    return { text: toVisualOrder(text, direction) };
  }

  svg(request: TextRenderRequest): { svg: string; width: number; height: number } {
    const { font } = request.font;
    const { text } = this.shape(request.text, request.direction);
    const line = font.layoutLine(text, request.font.settings);

    const scale = request.size / font.unitsPerEm;
    const baseline = font.ascent * scale;
    const width = Math.max(1, Math.ceil(line.advanceWidth * scale));
    const height = Math.max(1, Math.ceil((font.ascent - font.descent) * scale));

    // Font units are y-up; SVG is y-down
    const paths = line.glyphs
      .map(
        (glyph) =>
          `<path transform="translate(${formatNumber(glyph.x * scale)} ${formatNumber(
            baseline - glyph.y * scale,
          )}) scale(${formatNumber(scale)} ${formatNumber(-scale)})" d="${glyph.pathData}"/>`,
      )
      .join('');

    const svg =
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<g fill="${toHex(request.color)}">${paths}</g></svg>`;
    return { svg, width, height };
  }

  render(request: TextRenderRequest): Promise<RenderedText> {
    const { svg } = this.svg(request);
    return rasterizeToInk(sharp(Buffer.from(svg)), request.text);
  }
}
