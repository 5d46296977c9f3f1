import { z } from 'zod';
import type { AdapterResult, RawForecastPeriod } from '../types.js';
import { applyElementValue, notFound, PeriodCollector, type ElementMapping } from './shared.js';

const timeSchema = z.object({
  StartTime: z.string().optional(),
  EndTime: z.string().optional(),
  DataTime: z.string().optional(),
  ElementValue: z.array(z.record(z.unknown())).default([]),
});

const payloadSchema = z.object({
  success: z.string().optional(),
  records: z.object({
    Locations: z
      .array(
        z.object({
          Location: z.array(
            z.object({
              LocationName: z.string().optional(),
              WeatherElement: z
                .array(z.object({ ElementName: z.string(), Time: z.array(timeSchema).default([]) }))
                .default([]),
            })
          ),
        })
      )
      .min(1),
  }),
});

/**
 * Shared reader for the township forecast datasets (F-D0047-*). Interval
 * elements carry StartTime/EndTime; point elements carry a single DataTime,
 * which becomes both the start and end of its period.
 */
export function adaptTownForecast(
  dataset: string,
  elements: Readonly<Record<string, ElementMapping>>,
  payload: unknown,
  locationName: string
): AdapterResult<RawForecastPeriod[]> {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success || parsed.data.success === 'false') {
    return notFound(dataset, 'malformed_payload');
  }

  const location = parsed.data.records.Locations.flatMap((group) => group.Location).find(
    (entry) => entry.LocationName === locationName
  );
  if (!location) {
    return notFound(dataset, 'place_not_found', { locationName });
  }

  const collector = new PeriodCollector();
  for (const element of location.WeatherElement) {
    const mapping = elements[element.ElementName];
    if (!mapping) continue;
    for (const slot of element.Time) {
      const start = slot.DataTime ?? slot.StartTime;
      const end = slot.DataTime ?? slot.EndTime ?? start;
      if (!start || !end) continue;
      applyElementValue(collector.at(start, end), mapping, slot.ElementValue[0]?.[mapping.valueKey]);
    }
  }

  return { status: 'found', record: collector.toArray() };
}
