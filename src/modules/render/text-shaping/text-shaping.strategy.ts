import { FontVariation } from '../fonts/font.types';
import { RgbColor } from '../render-spec.types';

export const TEXT_SHAPING_STRATEGY = Symbol('TEXT_SHAPING_STRATEGY');

export type TextDirection = 'ltr' | 'rtl';

export type TextShapingKind = 'native' | 'pre-shaped';

export interface TextRenderRequest {
  text: string;
  direction: TextDirection;
  font: FontVariation;
  size: number;
  color: RgbColor;
}

export interface RenderedText {
  /** PNG with transparent background, cropped to the glyph ink */
  input: Buffer;
  width: number;
  height: number;
}

/**
 * How logical-order text reaches pixels. `shape` shows what the renderer is
 * handed; `render` rasterises it.
 */
export interface TextShapingStrategy {
  readonly kind: TextShapingKind;
  shape(text: string, direction: TextDirection): { text: string; direction?: TextDirection };
  render(request: TextRenderRequest): Promise<RenderedText>;
}
