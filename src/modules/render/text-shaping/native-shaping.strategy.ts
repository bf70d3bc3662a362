import sharp from 'sharp';
import {
  RenderedText,
  TextDirection,
  TextRenderRequest,
  TextShapingStrategy,
} from './text-shaping.strategy';
import { rasterizeToInk } from './ink';
import { FontVariation } from '../fonts/font.types';
import { toHex } from '../colors';

const RIGHT_TO_LEFT_EMBEDDING = '\u202B';
const POP_DIRECTIONAL_FORMATTING = '\u202C';

export function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Pango font description, e.g. `Open Sans 40 @wdth=100,wght=600`.
 * Variations are listed in the font's own axis order.
 */
export function fontDescription(font: FontVariation, size: number): string {
  const variations = Object.entries(font.settings)
    .map(([tag, value]) => `${tag}=${value}`)
    .join(',');
  return variations.length > 0
    ? `${font.familyName} ${size} @${variations}`
    : `${font.familyName} ${size}`;
}

/**
 * Hands logical-order text to libvips/Pango, which shapes it and runs the
 * bidi algorithm itself. Right-to-left runs are wrapped in an explicit RLE/PDF pair.
 */
export class NativeShapingStrategy implements TextShapingStrategy {
  readonly kind = 'native';

  shape(text: string, direction: TextDirection): { text: string; direction: TextDirection } {
    return { text, direction };
  }

  markup(request: TextRenderRequest): string {
    const { text, direction } = this.shape(request.text, request.direction);
    const body =
      direction === 'rtl'
        ? `${RIGHT_TO_LEFT_EMBEDDING}${escapeMarkup(text)}${POP_DIRECTIONAL_FORMATTING}`
        : escapeMarkup(text);
    return `<span foreground="${toHex(request.color)}">${body}</span>`;
  }

  render(request: TextRenderRequest): Promise<RenderedText> {
    const image = sharp({
      text: {
        text: this.markup(request),
        font: fontDescription(request.font, request.size),
        fontfile: request.font.file,
        rgba: true,
        dpi: 72,
      },
    });
    return rasterizeToInk(image, request.text);
  }
}
