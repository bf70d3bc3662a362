import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { CityForecastDto } from './city-forecast.dto';
import {
  createForecastRecord,
  ForecastRecord,
  ParsedForecastDocument,
} from './forecast.types';
import { ForecastSourceError } from '../utils/errors';

type XmlNode = Record<string, unknown>;

// ElementName values used by the forecast feed
const ELEMENT_FIELDS: Record<string, keyof CityForecastDto> = {
  'Maximum temperature': 'maxTemperature',
  'Minimum temperature': 'minTemperature',
  'Weather code': 'weatherCode',
  'Maximum relative humidity': 'maxHumidity',
  'Minimum relative humidity': 'minHumidity',
  'Wind direction and speed': 'wind',
};

const ARRAY_TAGS = new Set(['Location', 'TimeUnitData', 'Element']);

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childNode(node: XmlNode, key: string): XmlNode | undefined {
  const value = node[key];
  return isNode(value) ? value : undefined;
}

function childNodes(node: XmlNode, key: string): XmlNode[] {
  const value = node[key];
  if (Array.isArray(value)) return value.filter(isNode);
  return isNode(value) ? [value] : [];
}

function childText(node: XmlNode, key: string): string | undefined {
  const value = node[key];
  if (typeof value === 'string' || typeof value === 'number') {
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  }
  return undefined;
}

function findText(node: XmlNode, key: string, depth = 3): string | undefined {
  const direct = childText(node, key);
  if (direct !== undefined || depth === 0) return direct;

  for (const value of Object.values(node)) {
    if (isNode(value)) {
      const nested = findText(value, key, depth - 1);
      if (nested !== undefined) return nested;
    }
  }
  return undefined;
}

@Injectable()
export class ForecastXmlParserService {
  private readonly logger = new Logger(ForecastXmlParserService.name);
  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
  });

  /**
   * Parse the cities forecast XML into a dataset covering every date it contains.
   * Entries that fail validation are skipped and listed in `skipped`.
   */
  parse(xml: string): ParsedForecastDocument {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new ForecastSourceError(
        `Malformed forecast XML at line ${validation.err.line}: ${validation.err.msg}`,
      );
    }

    const document: unknown = this.parser.parse(xml);
    const root = this.findRoot(document);
    const locations = childNodes(root, 'Location');
    this.logger.log(`Found ${locations.length} city locations in XML`);

    const byDate = new Map<string, ForecastRecord[]>();
    const skipped: string[] = [];

    for (const location of locations) {
      const metadata = childNode(location, 'LocationMetaData');
      if (!metadata) {
        this.logger.warn('Location without LocationMetaData skipped');
        skipped.push('unknown@*');
        continue;
      }

      const nameLatin = childText(metadata, 'LocationNameEng');
      const base = {
        cityId: childText(metadata, 'LocationId') ?? nameLatin,
        nameLatin,
        nameHebrew: childText(metadata, 'LocationNameHeb'),
        latitude: childText(metadata, 'DisplayLat'),
        longitude: childText(metadata, 'DisplayLon'),
      };

      const locationData = childNode(location, 'LocationData');
      const timeUnits = locationData ? childNodes(locationData, 'TimeUnitData') : [];

      for (const timeUnit of timeUnits) {
        const date = childText(timeUnit, 'Date');
        const plain: Record<string, string | undefined> = { ...base, date };

        for (const element of childNodes(timeUnit, 'Element')) {
          const field = ELEMENT_FIELDS[childText(element, 'ElementName') ?? ''];
          if (field) {
            plain[field] = childText(element, 'ElementValue');
          }
        }

        const record = this.toRecord(plain);
        if (!record) {
          skipped.push(`${nameLatin ?? 'unknown'}@${date ?? '?'}`);
          continue;
        }

        const list = byDate.get(record.date) ?? [];
        list.push(record);
        byDate.set(record.date, list);
      }
    }

    const availableDates = [...byDate.keys()].sort();
    if (availableDates.length > 0) {
      this.logger.log(`Available forecast dates in XML: ${availableDates.join(', ')}`);
    } else {
      this.logger.warn('No forecast dates found in XML');
    }

    return {
      issuedAt: findText(root, 'IssueDateTime') ?? null,
      locationCount: locations.length,
      availableDates,
      dataset: byDate,
      skipped,
    };
  }

  private findRoot(document: unknown): XmlNode {
    if (isNode(document)) {
      for (const [key, value] of Object.entries(document)) {
        if (!key.startsWith('?') && isNode(value)) return value;
      }
    }
    throw new ForecastSourceError('Forecast XML has no root element');
  }

  private toRecord(plain: Record<string, string | undefined>): ForecastRecord | null {
    const dto = plainToInstance(CityForecastDto, plain);
    const errors = validateSync(dto);

    if (errors.length > 0) {
      const fields = errors.map((error) => error.property).join(', ');
      this.logger.warn(
        `Skipping ${plain.nameLatin ?? 'unknown city'} on ${plain.date ?? 'unknown date'}: invalid ${fields}`,
      );
      return null;
    }

    return createForecastRecord({
      cityId: dto.cityId,
      name: { latin: dto.nameLatin, hebrew: dto.nameHebrew },
      latitude: dto.latitude,
      longitude: dto.longitude,
      date: dto.date,
      maxTemperature: dto.maxTemperature,
      minTemperature: dto.minTemperature,
      weatherCode: dto.weatherCode,
      ...(dto.minHumidity !== undefined && dto.maxHumidity !== undefined
        ? { humidity: { min: dto.minHumidity, max: dto.maxHumidity } }
        : {}),
      ...(dto.wind !== undefined ? { wind: dto.wind } : {}),
    });
  }
}
