export const FONT_SOURCE = Symbol('FONT_SOURCE');

/** Semantic axis names accepted in configuration, mapped to OpenType axis tags */
export const SEMANTIC_AXIS_TAGS = {
  weight: 'wght',
  width: 'wdth',
  slant: 'slnt',
  italic: 'ital',
  opticalSize: 'opsz',
} as const;

export type SemanticAxis = keyof typeof SEMANTIC_AXIS_TAGS;

export type AxisRequests = Readonly<Partial<Record<SemanticAxis, number>>>;

export interface FontAxisInfo {
  tag: string;
  name: string;
  min: number;
  default: number;
  max: number;
}

/** A glyph outline as SVG path data in font units, positioned on the pen line */
export interface PositionedGlyph {
  pathData: string;
  x: number;
  y: number;
}

export interface LineLayout {
  glyphs: PositionedGlyph[];
  advanceWidth: number;
}

export interface LoadedFont {
  readonly file: string;
  readonly familyName: string;
  readonly unitsPerEm: number;
  readonly ascent: number;
  readonly descent: number;
  /** Variation axes in the order the font's fvar table registers them */
  readonly axes: readonly FontAxisInfo[];
  /**
   * Lay out a single line left to right at the given axis coordinates
   * (tag -> value). No bidi reordering is applied.
   */
  layoutLine(text: string, coordinates: Readonly<Record<string, number>>): LineLayout;
}

export interface FontSource {
  load(file: string): LoadedFont;
}

/**
 * A font file pinned to concrete axis coordinates. `coordinates` and the key
 * order of `settings` follow the font's own axis order.
 */
export interface FontVariation {
  readonly file: string;
  readonly familyName: string;
  readonly axes: readonly FontAxisInfo[];
  readonly coordinates: readonly number[];
  readonly settings: Readonly<Record<string, number>>;
  readonly font: LoadedFont;
}
