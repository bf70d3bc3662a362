import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { GradientService } from './gradient.service';
import { ImageAssemblerService, formatTemperatureRange } from './image-assembler.service';
import { LayoutService } from './layout.service';
import { loadRenderSpec } from './render-spec.loader';
import { RenderSpec } from './render-spec.types';
import { FontAxisService } from './fonts/font-axis.service';
import { IconCompositorService } from './icons/icon-compositor.service';
import { createWeatherCodeMapping } from './icons/weather-code-mapping';
import { PreShapedStrategy } from './text-shaping/pre-shaped.strategy';
import { CityForecastSet } from '../forecast/forecast.types';
import { GeographicSorterService } from '../forecast/geographic-sorter.service';
import { FakeFont, FakeFontSource } from '../../testing/fake-font';
import { makeRecord, RENDER_SPEC_FILE } from '../../testing/fixtures';
import { writeTestAssets } from '../../testing/images';
import { LayoutError } from '../utils/errors';

const ZEFAT = { cityId: '520', latin: 'Zefat', hebrew: 'צפת', latitude: 33.0, longitude: 35.5 };
const TEL_AVIV = {
  cityId: '402',
  latin: 'Tel Aviv - Yafo',
  hebrew: 'תל אביב',
  latitude: 32.08,
  longitude: 34.78,
};
const ELAT = { cityId: '512', latin: 'Elat', hebrew: 'אילת', latitude: 29.55, longitude: 34.95 };

describe('ImageAssemblerService', () => {
  const mapping = createWeatherCodeMapping('1250_clear', [
    [1220, '1220_partly_cloudy'],
    [1250, '1250_clear'],
  ]);
  let assetsDir: string;
  let spec: RenderSpec;
  let font: FakeFont;
  let assembler: ImageAssemblerService;
  let forecast: CityForecastSet;

  beforeEach(async () => {
    assetsDir = await mkdtemp(join(tmpdir(), 'assembler-'));
    await writeTestAssets(assetsDir, ['1250_clear', '1220_partly_cloudy']);
    spec = loadRenderSpec(RENDER_SPEC_FILE, assetsDir);

    font = new FakeFont(spec.fonts.file);
    assembler = new ImageAssemblerService(
      new LayoutService(),
      new GradientService(),
      new FontAxisService(new FakeFontSource([font])),
      new IconCompositorService(),
      new PreShapedStrategy(),
    );

    // Deliberately south to north; the sorter restores north to south
    forecast = new GeographicSorterService().toCityForecastSet('2025-10-15', [
      makeRecord(ELAT, '2025-10-15', { maxTemperature: 34, minTemperature: 24, weatherCode: 9999 }),
      makeRecord(TEL_AVIV, '2025-10-15', {
        maxTemperature: 29,
        minTemperature: 21,
        weatherCode: 1220,
      }),
      makeRecord(ZEFAT, '2025-10-15', { maxTemperature: 24, minTemperature: 15 }),
    ]);
  });

  afterEach(async () => {
    await rm(assetsDir, { recursive: true, force: true });
  });

  it('formats temperature ranges as min-max', () => {
    expect(formatTemperatureRange(21, 29)).toBe('21-29°C');
    expect(formatTemperatureRange(-3, 4)).toBe('-3-4°C');
  });

  it('renders a portrait JPEG', async () => {
    const image = await assembler.render({ forecast, spec, mapping, seed: 0 });
    const metadata = await sharp(image.data).metadata();

    expect(image.format).toBe('jpeg');
    expect(image.date).toBe('2025-10-15');
    expect(image.palette.name).toBe('lagoon');
    expect([image.width, image.height]).toEqual([1080, 1920]);
    expect(metadata.format).toBe('jpeg');
    expect([metadata.width, metadata.height]).toEqual([1080, 1920]);
    expect(Object.isFrozen(image)).toBe(true);
  });

  it('draws the date, then each row north to south', async () => {
    await assembler.render({ forecast, spec, mapping, seed: 0 });

    expect(font.laidOut).toEqual([
      '15/10/2025',
      '15-24°C',
      'תפצ',
      '21-29°C',
      'ביבא לת',
      '24-34°C',
      'תליא',
    ]);
  });

  it('paints the header band', async () => {
    const image = await assembler.render({ forecast, spec, mapping, seed: 0 });
    const { data } = await sharp(image.data)
      .extract({ left: 5, top: 5, width: 1, height: 1 })
      .raw()
      .toBuffer({ resolveWithObject: true });

    for (const channel of data) {
      expect(channel).toBeGreaterThan(245);
    }
  });

  it('produces identical bytes for the same seed', async () => {
    const first = await assembler.render({ forecast, spec, mapping, seed: 7 });
    const second = await assembler.render({ forecast, spec, mapping, seed: 7 });

    expect(second.data.equals(first.data)).toBe(true);
  });

  it('aborts when an icon is missing', async () => {
    const incomplete = createWeatherCodeMapping('1250_clear', [[1220, '1230_cloudy']]);

    await expect(
      assembler.render({ forecast, spec, mapping: incomplete, seed: 0 }),
    ).rejects.toMatchObject({
      code: 'ASSET_MISSING',
      kind: 'icon',
      path: join(assetsDir, 'weather_icons', '1230_cloudy.png'),
    });
    expect(font.laidOut).toEqual([]);
  });

  it('aborts when the logo is missing', async () => {
    const noLogo: RenderSpec = {
      ...spec,
      logo: { ...spec.logo, path: join(assetsDir, 'logos', 'missing.png') },
    };

    await expect(
      assembler.render({ forecast, spec: noLogo, mapping, seed: 0 }),
    ).rejects.toMatchObject({ code: 'ASSET_MISSING', kind: 'logo' });
  });

  it('rejects an empty forecast', async () => {
    await expect(
      assembler.render({ forecast: { date: '2025-10-15', records: [] }, spec, mapping, seed: 0 }),
    ).rejects.toThrow(LayoutError);
  });
});
