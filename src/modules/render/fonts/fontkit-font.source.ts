import { Injectable } from '@nestjs/common';
import { readFileSync } from 'fs';
import * as fontkit from 'fontkit';
import {
  FontAxisInfo,
  FontSource,
  LineLayout,
  LoadedFont,
  PositionedGlyph,
} from './font.types';
import { AssetMissingError } from '../../utils/errors';

class FontkitLoadedFont implements LoadedFont {
  readonly familyName: string;
  readonly unitsPerEm: number;
  readonly ascent: number;
  readonly descent: number;
  readonly axes: readonly FontAxisInfo[];

  constructor(
    readonly file: string,
    private readonly font: fontkit.Font,
  ) {
    this.familyName = font.familyName;
    this.unitsPerEm = font.unitsPerEm;
    this.ascent = font.ascent;
    this.descent = font.descent;
    // fontkit keys variationAxes in fvar order
    this.axes = Object.freeze(
      Object.entries(font.variationAxes).flatMap(([tag, axis]) =>
        axis
          ? [
              Object.freeze({
                tag,
                name: axis.name,
                min: axis.min,
                default: axis.default,
                max: axis.max,
              }),
            ]
          : [],
      ),
    );
  }

  layoutLine(text: string, coordinates: Readonly<Record<string, number>>): LineLayout {
    const instance =
      this.axes.length > 0 ? this.font.getVariation({ ...coordinates }) : this.font;
    const run = instance.layout(text, undefined, undefined, undefined, 'ltr');

    const glyphs: PositionedGlyph[] = [];
    let penX = 0;
    run.glyphs.forEach((glyph, index) => {
      const position = run.positions[index];
      const pathData = glyph.path.toSVG();
      if (pathData.length > 0) {
        glyphs.push({
          pathData,
          x: penX + position.xOffset,
          y: position.yOffset,
        });
      }
      penX += position.xAdvance;
    });

    return { glyphs, advanceWidth: penX };
  }
}

@Injectable()
export class FontkitFontSource implements FontSource {
  load(file: string): LoadedFont {
    let opened: fontkit.Font | fontkit.FontCollection;
    try {
      opened = fontkit.create(readFileSync(file));
    } catch (error) {
      throw new AssetMissingError('font', file, error);
    }

    if ('fonts' in opened) {
      const first = opened.fonts[0];
      if (!first) throw new AssetMissingError('font', file);
      return new FontkitLoadedFont(file, first);
    }
    return new FontkitLoadedFont(file, opened);
  }
}
