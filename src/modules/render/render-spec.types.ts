import { AxisRequests } from './fonts/font.types';

export type RgbColor = readonly [number, number, number];
export type RgbaColor = readonly [number, number, number, number];

export const RENDER_SPEC = Symbol('RENDER_SPEC');

export interface TextRoleSpec {
  readonly size: number;
  readonly axes: AxisRequests;
  readonly color: RgbColor;
}

export interface GradientPalette {
  readonly name: string;
  readonly stops: readonly RgbColor[];
}

/**
 * Every design parameter of a render. Loaded once, deep-frozen, and passed to
 * each component explicitly; asset paths are absolute.
 */
export interface RenderSpec {
  readonly canvas: { readonly width: number; readonly height: number };
  readonly header: { readonly height: number; readonly color: RgbColor };
  readonly rows: {
    readonly height: number;
    readonly minCount: number;
    readonly maxCount: number;
    readonly separatorColor: RgbaColor;
    readonly separatorThickness: number;
  };
  readonly padding: number;
  readonly spacing: number;
  readonly nameColumnWidth: number;
  readonly iconSize: number;
  readonly iconsDir: string;
  readonly logo: {
    readonly path: string;
    readonly height: number;
    readonly marginTop: number;
  };
  readonly fonts: {
    readonly file: string;
    readonly cityName: TextRoleSpec;
    readonly temperature: TextRoleSpec;
    readonly date: TextRoleSpec;
  };
  readonly palettes: readonly GradientPalette[];
  readonly jpegQuality: number;
}
