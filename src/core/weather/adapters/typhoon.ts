import { z } from 'zod';
import { addHoursToLocalTimestamp } from '../../../utils/time.js';
import { parseCwaNumber, parseCwaText } from '../parse.js';
import type { AdapterResult, TyphoonFix, TyphoonForecastPoint, TyphoonRecord } from '../types.js';
import { compassPointLabel, quadrantRadiusLabel } from '../units.js';
import { notFound } from './shared.js';

const DATASET = 'W-C0034-005';

/** Below this a named-less system is reported as a tropical depression (m/s). */
const TROPICAL_STORM_WIND_SPEED = 17.2;

const idSchema = z.union([z.string(), z.number()]).optional();

const stormCircleSchema = z
  .object({
    radius: z.unknown(),
    quadrantRadii: z
      .object({ radius: z.array(z.object({ dir: z.string().optional(), value: z.unknown() })).optional() })
      .optional(),
  })
  .optional();

const analysisFixSchema = z.object({
  fixTime: z.string().optional(),
  coordinate: z.string().optional(),
  maxWindSpeed: z.unknown(),
  maxGustSpeed: z.unknown(),
  pressure: z.unknown(),
  movingSpeed: z.unknown(),
  movingDirection: z.string().optional(),
  circleOf15Ms: stormCircleSchema,
});

const forecastFixSchema = z.object({
  tau: idSchema,
  initTime: z.string().optional(),
  coordinate: z.string().optional(),
  maxWindSpeed: z.unknown(),
  maxGustSpeed: z.unknown(),
  pressure: z.unknown(),
  circleOf15Ms: stormCircleSchema,
  radiusOf70PercentProbability: z.unknown(),
});

const cycloneSchema = z.object({
  year: idSchema,
  typhoonName: z.string().optional(),
  cwaTyphoonName: z.string().optional(),
  cwaTdNo: idSchema,
  analysisData: z.object({ fix: z.array(analysisFixSchema).default([]) }).default({}),
  forecastData: z.object({ fix: z.array(forecastFixSchema).default([]) }).default({}),
});

const payloadSchema = z.object({
  success: z.string().optional(),
  records: z.object({
    tropicalCyclones: z.object({ tropicalCyclone: z.array(cycloneSchema).default([]) }).default({}),
  }),
});

type Cyclone = z.infer<typeof cycloneSchema>;
type AnalysisFix = z.infer<typeof analysisFixSchema>;
type ForecastFix = z.infer<typeof forecastFixSchema>;

function fixTimestamp(fix: AnalysisFix): number {
  return fix.fixTime ? Date.parse(fix.fixTime) : Number.NaN;
}

function latestFix(cyclone: Cyclone): { fix: AnalysisFix; at: number } | null {
  let latest: { fix: AnalysisFix; at: number } | null = null;
  for (const fix of cyclone.analysisData.fix) {
    const at = fixTimestamp(fix);
    if (Number.isNaN(at)) continue;
    if (!latest || at > latest.at) latest = { fix, at };
  }
  return latest;
}

/** `"121.5,23.4"` → longitude, latitude */
function parseCoordinate(coordinate: string | undefined): { longitude: number | null; latitude: number | null } {
  const parts = coordinate?.split(',') ?? [];
  if (parts.length !== 2) {
    return { longitude: null, latitude: null };
  }
  return {
    longitude: parseCwaNumber(parts[0], 'coordinate.longitude'),
    latitude: parseCwaNumber(parts[1], 'coordinate.latitude'),
  };
}

function toFix(fix: AnalysisFix): TyphoonFix {
  const quadrants = fix.circleOf15Ms?.quadrantRadii?.radius ?? [];
  const stormRadiusByQuadrant: string[] = [];
  for (const quadrant of quadrants) {
    const kilometres = parseCwaNumber(quadrant.value, 'quadrantRadii.value');
    if (quadrant.dir && kilometres !== null) {
      stormRadiusByQuadrant.push(quadrantRadiusLabel(quadrant.dir, kilometres));
    }
  }

  return {
    fixTime: fix.fixTime ?? null,
    ...parseCoordinate(fix.coordinate),
    maxWindSpeed: parseCwaNumber(fix.maxWindSpeed, 'maxWindSpeed'),
    maxGustSpeed: parseCwaNumber(fix.maxGustSpeed, 'maxGustSpeed'),
    pressure: parseCwaNumber(fix.pressure, 'pressure'),
    movingSpeed: parseCwaNumber(fix.movingSpeed, 'movingSpeed'),
    movingDirection: fix.movingDirection ? compassPointLabel(fix.movingDirection) : null,
    stormRadius: parseCwaNumber(fix.circleOf15Ms?.radius, 'circleOf15Ms.radius'),
    stormRadiusByQuadrant,
  };
}

function toForecastPoint(fix: ForecastFix): TyphoonForecastPoint | null {
  const tau = Number(fix.tau);
  if (!Number.isInteger(tau) || tau <= 0) {
    return null;
  }
  return {
    tau,
    forecastTime: fix.initTime ? addHoursToLocalTimestamp(fix.initTime, tau) : null,
    ...parseCoordinate(fix.coordinate),
    maxWindSpeed: parseCwaNumber(fix.maxWindSpeed, 'maxWindSpeed'),
    maxGustSpeed: parseCwaNumber(fix.maxGustSpeed, 'maxGustSpeed'),
    pressure: parseCwaNumber(fix.pressure, 'pressure'),
    stormRadius: parseCwaNumber(fix.circleOf15Ms?.radius, 'circleOf15Ms.radius'),
    probabilityRadius70: parseCwaNumber(fix.radiusOf70PercentProbability, 'radiusOf70PercentProbability'),
  };
}

function optionalId(value: string | number | undefined): string | null {
  return value === undefined ? null : parseCwaText(String(value));
}

/**
 * The tropical cyclone with the most recent analysis fix, with its forecast
 * track. `no_records` means no cyclone is being tracked.
 */
export function adaptTyphoon(payload: unknown): AdapterResult<TyphoonRecord> {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.success === 'false') {
    return notFound(DATASET, 'malformed_payload');
  }

  let selected: { cyclone: Cyclone; fix: AnalysisFix; at: number } | null = null;
  for (const cyclone of parsed.data.records.tropicalCyclones.tropicalCyclone) {
    const latest = latestFix(cyclone);
    if (latest && (!selected || latest.at > selected.at)) {
      selected = { cyclone, ...latest };
    }
  }
  if (!selected) {
    return notFound(DATASET, 'no_records');
  }

  const { cyclone } = selected;
  const current = toFix(selected.fix);
  const englishName = parseCwaText(cyclone.typhoonName);
  const chineseName = parseCwaText(cyclone.cwaTyphoonName);
  const depressionNumber = optionalId(cyclone.cwaTdNo);
  const year = optionalId(cyclone.year);

  const isTropicalDepression =
    chineseName === null && current.maxWindSpeed !== null && current.maxWindSpeed < TROPICAL_STORM_WIND_SPEED;
  let name: string;
  if (chineseName) {
    name = chineseName;
  } else if (isTropicalDepression) {
    name = depressionNumber ? `熱帶低氣壓 TD${depressionNumber}` : '熱帶低氣壓';
  } else {
    name = englishName ?? '未命名熱帶氣旋';
  }

  const key = englishName ?? (depressionNumber ? `TD${depressionNumber}` : name);
  const forecasts = cyclone.forecastData.fix
    .map(toForecastPoint)
    .filter((point): point is TyphoonForecastPoint => point !== null)
    .sort((a, b) => a.tau - b.tau);

  return {
    status: 'found',
    record: {
      id: year ? `${year}_${key}` : key,
      name,
      englishName,
      depressionNumber,
      isTropicalDepression,
      current,
      forecasts,
    },
  };
}
