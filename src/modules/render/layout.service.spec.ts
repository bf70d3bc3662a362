import { LayoutService } from './layout.service';
import { loadRenderSpec } from './render-spec.loader';
import { RenderSpec } from './render-spec.types';
import { RENDER_SPEC_FILE } from '../../testing/fixtures';
import { LayoutError } from '../utils/errors';

describe('LayoutService', () => {
  const service = new LayoutService();
  const spec = loadRenderSpec(RENDER_SPEC_FILE, '/assets');

  function withRows(rows: Partial<RenderSpec['rows']>): RenderSpec {
    return { ...spec, rows: { ...spec.rows, ...rows } };
  }

  it('centers fifteen rows between the header and the bottom edge', () => {
    const layout = service.compute(spec, 15);

    expect(layout.topPadding).toBe(82.5);
    expect(layout.bottomPadding).toBe(82.5);
    expect(layout.rows).toHaveLength(15);
    expect(layout.rows[0]).toEqual({
      index: 0,
      top: 262.5,
      centerY: 315,
      iconX: 160,
      iconY: 282.5,
      temperatureCenterX: 422.5,
      nameRightX: 920,
    });
    expect(layout.rows[14].top).toBe(262.5 + 14 * 105);
  });

  it('aligns the header with the row edges', () => {
    const layout = service.compute(spec, 15);

    expect(layout.header).toEqual({
      height: 180,
      logoX: 160,
      logoY: 30,
      logoHeight: 120,
      dateRightX: 920,
      dateCenterY: 90,
    });
  });

  it('places a separator above every row but the first', () => {
    const layout = service.compute(spec, 3);

    expect(layout.separators).toEqual([
      { y: layout.rows[1].top, x1: 160, x2: 920 },
      { y: layout.rows[2].top, x1: 160, x2: 920 },
    ]);
  });

  it('fills the canvas exactly for every supported row count', () => {
    const compact = withRows({ height: 80, maxCount: 20 });

    for (const candidate of [spec, compact]) {
      for (let count = candidate.rows.minCount; count <= candidate.rows.maxCount; count++) {
        const layout = service.compute(candidate, count);
        expect(
          layout.header.height +
            count * layout.rowHeight +
            layout.topPadding +
            layout.bottomPadding,
        ).toBe(candidate.canvas.height);
      }
    }
  });

  it('rejects row counts outside the configured range', () => {
    expect(() => service.compute(spec, 0)).toThrow(LayoutError);
    expect(() => service.compute(spec, 17)).toThrow(
      'Row count 17 is outside the supported range 1-16',
    );
    expect(() => service.compute(spec, 2.5)).toThrow(LayoutError);
  });

  it('rejects rows that overflow the canvas', () => {
    const tall = withRows({ height: 200, maxCount: 20 });

    expect(() => service.compute(tall, 9)).toThrow(
      '9 rows of 200px do not fit below a 180px header on a 1920px canvas',
    );
  });

  it('rejects a canvas too narrow for the temperature column', () => {
    const narrow: RenderSpec = { ...spec, canvas: { width: 600, height: 1920 } };

    expect(() => service.compute(narrow, 5)).toThrow(
      'Canvas width 600 leaves no room for the temperature column',
    );
  });
});
