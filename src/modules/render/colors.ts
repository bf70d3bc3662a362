import { RgbaColor, RgbColor } from './render-spec.types';

const HEX_COLOR = /^#?([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse `#rgb`, `#rgba`, `#rrggbb` or `#rrggbbaa`. Missing alpha is opaque (255).
 */
export function parseHexColor(value: string): RgbaColor {
  const match = HEX_COLOR.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid hex color '${value}'`);
  }

  let digits = match[1];
  if (digits.length <= 4) {
    digits = [...digits].map((digit) => digit + digit).join('');
  }
  const channel = (index: number) => parseInt(digits.slice(index * 2, index * 2 + 2), 16);

  return [channel(0), channel(1), channel(2), digits.length === 8 ? channel(3) : 255];
}

export function parseRgb(value: string): RgbColor {
  const [r, g, b] = parseHexColor(value);
  return [r, g, b];
}

export function toHex([r, g, b]: RgbColor): string {
  return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}
