export const NO_DATA_LABEL = '無資料';

/** Upper bound (inclusive, m/s) of Beaufort scales 1 through 11; scale 0 is below 0.3. */
const BEAUFORT_UPPER_BOUNDS = [1.5, 3.3, 5.4, 7.9, 10.7, 13.8, 17.1, 20.7, 24.4, 28.4, 32.6] as const;

const BEAUFORT_DESCRIPTIONS = [
  '無風',
  '軟風',
  '輕風',
  '微風',
  '和風',
  '清風',
  '強風',
  '疾風',
  '大風',
  '烈風',
  '狂風',
  '暴風',
  '颶風',
] as const;

const COMPASS_LABELS = ['北', '東北', '東', '東南', '南', '西南', '西', '西北'] as const;

export type UvLabel = '低' | '中' | '高' | '過量' | '危險' | typeof NO_DATA_LABEL;

export interface UvCategory {
  /** Whole UV index, or -1 when unknown. */
  index: number;
  label: UvLabel;
}

export interface WindScale {
  scale: number;
  description: string;
}

export function windSpeedToBeaufort(speedMs: number): number {
  if (!Number.isFinite(speedMs) || speedMs < 0.3) {
    return 0;
  }
  const band = BEAUFORT_UPPER_BOUNDS.findIndex((upper) => speedMs <= upper);
  return band === -1 ? 12 : band + 1;
}

export function beaufortDescription(scale: number): string {
  if (!Number.isInteger(scale)) return NO_DATA_LABEL;
  return BEAUFORT_DESCRIPTIONS[scale] ?? NO_DATA_LABEL;
}

export function toWindScale(speedMs: number): WindScale {
  const scale = windSpeedToBeaufort(speedMs);
  return { scale, description: beaufortDescription(scale) };
}

export function degreesToCompass(deg: number | null | undefined): string {
  if (deg === null || deg === undefined || !Number.isFinite(deg)) {
    return NO_DATA_LABEL;
  }
  const normalized = ((deg % 360) + 360) % 360;
  return COMPASS_LABELS[Math.floor((normalized + 22.5) / 45) % 8] ?? NO_DATA_LABEL;
}

const COMPASS_POINT_LABELS: ReadonlyMap<string, string> = new Map([
  ['N', '北'],
  ['NNE', '北北東'],
  ['NE', '東北'],
  ['ENE', '東北東'],
  ['E', '東'],
  ['ESE', '東南東'],
  ['SE', '東南'],
  ['SSE', '南南東'],
  ['S', '南'],
  ['SSW', '南南西'],
  ['SW', '西南'],
  ['WSW', '西南西'],
  ['W', '西'],
  ['WNW', '西北西'],
  ['NW', '西北'],
  ['NNW', '北北西'],
  ['Varies', '不規則'],
]);

/** 16-point compass code from the typhoon datasets (`NNE`) → Chinese label. */
export function compassPointLabel(code: string | null | undefined): string {
  if (!code) return '不明';
  return COMPASS_POINT_LABELS.get(code.trim()) ?? code;
}

/** `('NE', 170)` → `東北170公里` */
export function quadrantRadiusLabel(direction: string, kilometres: number): string {
  return `${compassPointLabel(direction)}${kilometres}公里`;
}

function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * NOAA (Rothfusz) heat index. Only applies from 80 °F upward; returns the
 * input temperature when the formula does not apply or moves it by less
 * than 1 °C.
 */
export function approximateApparentTemperature(tempC: number, humidityPct: number): number {
  const t = (tempC * 9) / 5 + 32;
  if (t < 80) {
    return roundTo1(tempC);
  }
  const r = humidityPct;

  const heatIndexF =
    -42.379 +
    2.04901523 * t +
    10.14333127 * r -
    0.22475541 * t * r -
    6.83783e-3 * t * t -
    5.481717e-2 * r * r +
    1.22874e-3 * t * t * r +
    8.5282e-4 * t * r * r -
    1.99e-6 * t * t * r * r;

  const heatIndexC = ((heatIndexF - 32) * 5) / 9;
  if (Math.abs(heatIndexC - tempC) < 1) {
    return roundTo1(tempC);
  }
  return roundTo1(heatIndexC);
}

export function uvCategory(raw: number | null | undefined): UvCategory {
  if (raw === null || raw === undefined || !Number.isFinite(raw) || raw < 0) {
    return { index: -1, label: NO_DATA_LABEL };
  }
  const index = Math.floor(raw);
  if (index >= 11) return { index, label: '危險' };
  if (index >= 8) return { index, label: '過量' };
  if (index >= 6) return { index, label: '高' };
  if (index >= 3) return { index, label: '中' };
  return { index, label: '低' };
}
