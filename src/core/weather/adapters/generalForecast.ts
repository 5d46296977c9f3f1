import { z } from 'zod';
import type { AdapterResult, RawForecastPeriod } from '../types.js';
import { applyElementValue, notFound, PeriodCollector, type ElementMapping } from './shared.js';

const DATASET = 'F-C0032-001';

const ELEMENTS: Record<string, ElementMapping> = {
  Wx: { valueKey: 'Wx', text: ['weather'] },
  PoP: { valueKey: 'PoP', numeric: ['precipitationProbability'] },
  MinT: { valueKey: 'MinT', numeric: ['minTemperature'] },
  MaxT: { valueKey: 'MaxT', numeric: ['maxTemperature'] },
  CI: { valueKey: 'CI', text: ['maxComfort', 'minComfort'] },
};

const timeSchema = z.object({
  startTime: z.string(),
  endTime: z.string(),
  parameter: z.object({ parameterName: z.unknown() }).partial().optional(),
});

const payloadSchema = z.object({
  success: z.string().optional(),
  records: z.object({
    location: z.array(
      z.object({
        locationName: z.string().optional(),
        weatherElement: z
          .array(z.object({ elementName: z.string(), time: z.array(timeSchema).default([]) }))
          .default([]),
      })
    ),
  }),
});

/** 36-hour county forecast: three 12-hour periods per county. */
export function adaptGeneralForecast(
  payload: unknown,
  locationName: string
): AdapterResult<RawForecastPeriod[]> {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.success === 'false') {
    return notFound(DATASET, 'malformed_payload');
  }

  const location = parsed.data.records.location.find((entry) => entry.locationName === locationName);
  if (!location) {
    return notFound(DATASET, 'place_not_found', { locationName });
  }

  const collector = new PeriodCollector();
  for (const element of location.weatherElement) {
    const mapping = ELEMENTS[element.elementName];
    if (!mapping) continue;
    for (const slot of element.time) {
      applyElementValue(collector.at(slot.startTime, slot.endTime), mapping, slot.parameter?.parameterName);
    }
  }

  return { status: 'found', record: collector.toArray() };
}
