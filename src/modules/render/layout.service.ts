import { Injectable } from '@nestjs/common';
import { RenderSpec } from './render-spec.types';
import { LayoutError } from '../utils/errors';

export interface HeaderLayout {
  height: number;
  logoX: number;
  logoY: number;
  logoHeight: number;
  /** Date text is right-aligned to this x */
  dateRightX: number;
  dateCenterY: number;
}

export interface RowLayout {
  index: number;
  top: number;
  centerY: number;
  iconX: number;
  iconY: number;
  temperatureCenterX: number;
  /** City names are right-aligned to this x */
  nameRightX: number;
}

export interface SeparatorLayout {
  y: number;
  x1: number;
  x2: number;
}

export interface FrameLayout {
  width: number;
  height: number;
  rowCount: number;
  rowHeight: number;
  topPadding: number;
  bottomPadding: number;
  header: HeaderLayout;
  rows: RowLayout[];
  separators: SeparatorLayout[];
}

/**
 * Row and header geometry for a given number of cities. Values are exact;
 * a centered odd free space yields half-pixel paddings, and drawing code
 * rounds when it places pixels.
 */
@Injectable()
export class LayoutService {
  compute(spec: RenderSpec, rowCount: number): FrameLayout {
    const { minCount, maxCount, height: rowHeight } = spec.rows;
    if (!Number.isInteger(rowCount) || rowCount < minCount || rowCount > maxCount) {
      throw new LayoutError(
        `Row count ${rowCount} is outside the supported range ${minCount}-${maxCount}`,
      );
    }

    const { width, height } = spec.canvas;
    const freeSpace = height - spec.header.height - rowCount * rowHeight;
    if (freeSpace < 0) {
      throw new LayoutError(
        `${rowCount} rows of ${rowHeight}px do not fit below a ${spec.header.height}px header on a ${height}px canvas`,
      );
    }

    const left = spec.padding;
    const right = width - spec.padding;
    const temperatureStart = left + spec.iconSize + spec.spacing;
    const temperatureEnd = right - spec.nameColumnWidth - spec.spacing;
    if (temperatureEnd < temperatureStart) {
      throw new LayoutError(
        `Canvas width ${width} leaves no room for the temperature column`,
      );
    }

    const padding = freeSpace / 2;
    const rowsTop = spec.header.height + padding;
    const temperatureCenterX = (temperatureStart + temperatureEnd) / 2;

    const rows: RowLayout[] = [];
    const separators: SeparatorLayout[] = [];
    for (let index = 0; index < rowCount; index++) {
      const top = rowsTop + index * rowHeight;
      const centerY = top + rowHeight / 2;
      rows.push({
        index,
        top,
        centerY,
        iconX: left,
        iconY: centerY - spec.iconSize / 2,
        temperatureCenterX,
        nameRightX: right,
      });
      if (index > 0) {
        separators.push({ y: top, x1: left, x2: right });
      }
    }

    return {
      width,
      height,
      rowCount,
      rowHeight,
      topPadding: padding,
      bottomPadding: padding,
      header: {
        height: spec.header.height,
        logoX: left,
        logoY: spec.logo.marginTop,
        logoHeight: spec.logo.height,
        dateRightX: right,
        dateCenterY: spec.header.height / 2,
      },
      rows,
      separators,
    };
  }
}
