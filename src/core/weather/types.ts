import type { UvCategory, WindScale } from './units.js';

/** One station snapshot from the current-observation dataset. */
export interface RawObservationRecord {
  stationName: string;
  /** Local observation time as reported, e.g. `2025-07-19T14:00:00+08:00`. */
  observedAt: string | null;
  weather: string | null;
  airTemperature: number | null;
  relativeHumidity: number | null;
  /** mm since local midnight */
  precipitation: number | null;
  /** m/s */
  windSpeed: number | null;
  /** degrees */
  windDirection: number | null;
  /** hPa */
  airPressure: number | null;
  uvIndex: number | null;
}

/** One forecast slice for one place. Adapters return these in chronological order. */
export interface RawForecastPeriod {
  startTime: string;
  endTime: string;
  weather: string | null;
  maxTemperature: number | null;
  minTemperature: number | null;
  maxApparentTemperature: number | null;
  minApparentTemperature: number | null;
  humidity: number | null;
  precipitationProbability: number | null;
  /** m/s */
  windSpeed: number | null;
  windDirection: string | null;
  maxComfort: string | null;
  minComfort: string | null;
  uvIndex: number | null;
}

export interface UvIndexRecord {
  stationId: string;
  date: string | null;
  uvIndex: number | null;
}

/** Analysed position and strength of a tropical cyclone at one fix time. */
export interface TyphoonFix {
  /** As reported, e.g. `2025-07-28T08:00:00+08:00` */
  fixTime: string | null;
  latitude: number | null;
  longitude: number | null;
  /** m/s */
  maxWindSpeed: number | null;
  /** m/s */
  maxGustSpeed: number | null;
  /** hPa */
  pressure: number | null;
  /** km/h */
  movingSpeed: number | null;
  movingDirection: string | null;
  /** Radius of winds at Beaufort 7 and above, km */
  stormRadius: number | null;
  /** Per-quadrant radii, e.g. `東北170公里` */
  stormRadiusByQuadrant: string[];
}

export interface TyphoonForecastPoint {
  /** Hours after the forecast's initial time */
  tau: number;
  /** Local `YYYY-MM-DD HH:MM` */
  forecastTime: string | null;
  latitude: number | null;
  longitude: number | null;
  maxWindSpeed: number | null;
  maxGustSpeed: number | null;
  pressure: number | null;
  stormRadius: number | null;
  /** km */
  probabilityRadius70: number | null;
}

export interface TyphoonRecord {
  /** `<year>_<international name>`; stable for the life of one storm. */
  id: string;
  name: string;
  englishName: string | null;
  depressionNumber: string | null;
  isTropicalDepression: boolean;
  current: TyphoonFix;
  /** Sorted by tau. */
  forecasts: TyphoonForecastPoint[];
}

/** One regional warning issued while a typhoon affects Taiwan. */
export interface HazardAlert {
  title: string;
  phenomena: string | null;
  significance: string | null;
  issueTime: string | null;
  startTime: string | null;
  endTime: string | null;
  /** Sorted, de-duplicated. */
  affectedAreas: string[];
  description: string | null;
}

export type NotFoundReason = 'place_not_found' | 'malformed_payload' | 'no_records';

export type AdapterResult<T> =
  | { status: 'found'; record: T }
  | { status: 'not_found'; reason: NotFoundReason };

/** Unrounded values the outfit rules compare against thresholds. */
export interface OutfitInputs {
  apparentTemperature: number | null;
  maxTemperature: number | null;
  minTemperature: number | null;
  humidity: number | null;
  precipitationProbability: number | null;
  /** Observed rainfall in mm; only the current-observation variant has it. */
  precipitationAmount: number | null;
  weather: string | null;
  windScale: number | null;
  uvIndex: number | null;
}

export interface DailyWeatherRecord {
  locationName: string;
  /** YYYY-MM-DD */
  date: string;
  dateLabel: string;
  dayLabel: string;
  /** 0 = Sunday */
  weekday: number;
  isWeekend: boolean;
  weather: string | null;
  maxTemperature: number | null;
  minTemperature: number | null;
  maxApparentTemperature: number | null;
  minApparentTemperature: number | null;
  humidity: number | null;
  precipitationProbability: number | null;
  wind: WindScale | null;
  windDirection: string | null;
  uv: UvCategory | null;
  maxComfort: string | null;
  minComfort: string | null;
  outfitInputs: OutfitInputs;
}

export const OUTFIT_IMAGES = [
  'DEFAULT',
  'HOT',
  'WARM',
  'COOL',
  'CHILLY',
  'COLD',
  'FREEZING',
  'HEAVY_RAIN',
  'RAINY',
  'LIGHT_RAIN',
  'WINDY',
  'HIGH_UVI',
  'COMFORTABLE',
] as const;

export type OutfitImage = (typeof OUTFIT_IMAGES)[number];

export interface OutfitAdvice {
  lines: string[];
  image: OutfitImage;
}
